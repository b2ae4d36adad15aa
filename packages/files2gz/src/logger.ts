/**
 * Logger construction.
 *
 * One pino logger is created at startup and passed to every component,
 * which derives its own child (`logger.child({ component })`). Output goes
 * to stderr and to a timestamped file in the log directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';
import { describeError } from './errors.js';
import type { LogFormat, LogLevel } from './types.js';
import { DEFAULT_LOG_DIR } from './types.js';

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
  fatal: 'fatal',
};

/**
 * Normalize a user-supplied level name. Unknown or missing values give `info`.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) return 'info';
  return LEVEL_ALIASES[raw.trim().toLowerCase()] ?? 'info';
}

/** Whether `raw` names a level parseLogLevel understands. */
export function isKnownLogLevel(raw: string): boolean {
  return raw.trim().toLowerCase() in LEVEL_ALIASES;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Log file name for a run started at `date`, in UTC: log_YYYYMMDD_HHMMSS.txt */
export function logFileName(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `log_${day}_${time}.txt`;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  /** Directory for the log file (default: ./logs) */
  logDir?: string;
  /** Start time used for the log file name */
  now?: Date;
  /** Console sink: file descriptor or file path (default: 2, stderr) */
  consoleDestination?: number | string;
}

export interface LoggerHandle {
  logger: Logger;
  /** Path of the log file, or null when only stderr is used */
  logFile: string | null;
  /** Flush buffered log lines */
  close(): Promise<void>;
}

export type LoggerFactory = (options: LoggerOptions) => LoggerHandle;

function consoleTarget(options: LoggerOptions): TransportTargetOptions {
  const destination = options.consoleDestination ?? 2;
  if (options.format === 'pretty') {
    return {
      target: 'pino-pretty',
      level: options.level,
      options: {
        destination,
        colorize: destination === 2,
        translateTime: 'UTC:yyyy-mm-dd HH:MM:ss.l',
      },
    };
  }
  return { target: 'pino/file', level: options.level, options: { destination } };
}

/**
 * Create the process logger.
 *
 * If the log directory or file cannot be opened the logger still writes to
 * the console and reports the problem as its first line. Failures of the
 * transport after startup are reported on stderr and do not throw.
 */
export function createLogger(options: LoggerOptions): LoggerHandle {
  const logDir = path.resolve(options.logDir ?? DEFAULT_LOG_DIR);
  const targets: TransportTargetOptions[] = [consoleTarget(options)];

  let logFile: string | null = path.join(logDir, logFileName(options.now ?? new Date()));
  let setupError: unknown = null;
  try {
    fs.mkdirSync(logDir, { recursive: true });
    // The transport opens the file in a worker thread, where a failure is fatal
    fs.closeSync(fs.openSync(logFile, 'a'));
    targets.push({
      target: 'pino/file',
      level: options.level,
      options: { destination: logFile, append: true },
    });
  } catch (err) {
    setupError = err;
    logFile = null;
  }

  const transport = pino.transport({ targets });
  transport.on('error', (err: Error) => {
    console.error(`files2gz: log sink failed: ${describeError(err)}`);
  });

  const logger = pino(
    {
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport
  );

  if (setupError !== null) {
    logger.error(
      { logDir, error: describeError(setupError) },
      'Unable to open a log file or directory'
    );
  }

  return {
    logger,
    logFile,
    close: () =>
      new Promise<void>((resolve, reject) => {
        logger.flush((err?: Error) => {
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}
