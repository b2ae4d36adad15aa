#!/usr/bin/env node

/**
 * files2gz - watch a directory and write gzip copies of new files elsewhere
 *
 * Every flag can also be given through a FILES2GZ_* environment variable,
 * which is why --source and --target are not marked required here.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { runDaemon } from './main.js';
import { isKnownLogLevel, parseLogLevel } from './logger.js';
import type { LogFormat, WatchOptions } from './types.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

interface CliOptions {
  source?: string;
  target?: string;
  logDir?: string;
  logLevel?: string;
  logFormat?: LogFormat;
  concurrency?: number;
  compressionLevel?: number;
  writeStability?: number;
  poll?: boolean;
  ignore?: string[];
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseFormat(value: string): LogFormat {
  if (value !== 'json' && value !== 'pretty') {
    throw new InvalidArgumentError('Expected "json" or "pretty".');
  }
  return value;
}

function toOverrides(opts: CliOptions): Partial<WatchOptions> {
  if (opts.logLevel !== undefined && !isKnownLogLevel(opts.logLevel)) {
    console.error(chalk.yellow(`Unknown log level "${opts.logLevel}", using info`));
  }

  return {
    sourceDir: opts.source,
    targetDir: opts.target,
    logDir: opts.logDir,
    logLevel: opts.logLevel !== undefined ? parseLogLevel(opts.logLevel) : undefined,
    logFormat: opts.logFormat,
    maxConcurrent: opts.concurrency,
    compressionLevel: opts.compressionLevel,
    writeStabilityMs: opts.writeStability,
    usePolling: opts.poll,
    ignoredPatterns: opts.ignore,
  };
}

const program = new Command();

program
  .name('files2gz')
  .description('Monitor files in a directory and send them to another directory compressed.')
  .version(pkg.version)
  .option('-s, --source <dir>', 'path to the directory being monitored')
  .option('-t, --target <dir>', 'path to the target directory for compressed files')
  .option('--log-dir <dir>', 'path to the directory in which the logs will be stored')
  .option('--log-level <level>', 'minimum log level (debug|info|warning|error|critical)')
  .option('--log-format <format>', 'console log format (json|pretty)', parseFormat)
  .option('--concurrency <n>', 'number of files compressed in parallel', parseInteger)
  .option('--compression-level <n>', 'gzip compression level (1-9)', parseInteger)
  .option('--write-stability <ms>', 'wait until a new file stops growing (0 disables)', parseInteger)
  .option('--poll', 'use polling instead of native file system events')
  .option('--ignore <patterns...>', 'glob patterns of files to ignore')
  .action(async (opts: CliOptions) => {
    const code = await runDaemon(toOverrides(opts));
    process.exit(code);
  });

await program.parseAsync();
