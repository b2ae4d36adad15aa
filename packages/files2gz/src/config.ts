/**
 * Configuration builder and startup validation.
 *
 * Reads from environment variables with defaults. All values can be
 * overridden programmatically (the CLI passes its flags as overrides).
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describeError, errorCode, EX_IOERR, EX_USAGE, StartupError } from './errors.js';
import { isSameOrDescendant } from './mirror/path-mapper.js';
import { parseLogLevel } from './logger.js';
import type { LogFormat, WatchConfig, WatchOptions } from './types.js';
import { DEFAULT_WATCH_OPTIONS } from './types.js';

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseLogFormat(raw: string | undefined): LogFormat {
  return raw?.trim().toLowerCase() === 'pretty' ? 'pretty' : DEFAULT_WATCH_OPTIONS.logFormat;
}

/**
 * Build watch options from environment variables and optional overrides.
 *
 * Environment variables:
 * - FILES2GZ_SOURCE_DIR: Directory to watch (required)
 * - FILES2GZ_TARGET_DIR: Directory for compressed copies (required)
 * - FILES2GZ_LOG_DIR: Directory for log files (default: ./logs)
 * - FILES2GZ_LOG_LEVEL: debug|info|warning|error|critical (default: info)
 * - FILES2GZ_LOG_FORMAT: json|pretty (default: json)
 * - FILES2GZ_MAX_CONCURRENT: Files compressed in parallel (default: 4)
 * - FILES2GZ_COMPRESSION_LEVEL: gzip level 1-9 (default: 9)
 * - FILES2GZ_WRITE_STABILITY_MS: Wait for writes to settle, 0 disables (default: 500)
 * - FILES2GZ_USE_POLLING: "true" to poll instead of native events (default: false)
 * - FILES2GZ_IGNORE: Comma-separated glob patterns to ignore
 * - FILES2GZ_POLL_INTERVAL_MS: Shutdown check interval (default: 1000)
 */
export function buildWatchOptions(overrides?: Partial<WatchOptions>): WatchOptions {
  const envIgnored = getEnv('FILES2GZ_IGNORE');
  const extraIgnored = envIgnored ? envIgnored.split(',').map((p) => p.trim()) : [];
  const ignoredPatterns = [
    ...new Set([...extraIgnored, ...(overrides?.ignoredPatterns ?? [])].filter(Boolean)),
  ];

  return {
    sourceDir: overrides?.sourceDir ?? getEnv('FILES2GZ_SOURCE_DIR') ?? '',
    targetDir: overrides?.targetDir ?? getEnv('FILES2GZ_TARGET_DIR') ?? '',
    logDir: overrides?.logDir ?? getEnv('FILES2GZ_LOG_DIR'),
    logLevel: overrides?.logLevel ?? parseLogLevel(getEnv('FILES2GZ_LOG_LEVEL')),
    logFormat: overrides?.logFormat ?? parseLogFormat(getEnv('FILES2GZ_LOG_FORMAT')),
    maxConcurrent:
      overrides?.maxConcurrent ??
      getEnvNumber('FILES2GZ_MAX_CONCURRENT', DEFAULT_WATCH_OPTIONS.maxConcurrent),
    compressionLevel:
      overrides?.compressionLevel ??
      getEnvNumber('FILES2GZ_COMPRESSION_LEVEL', DEFAULT_WATCH_OPTIONS.compressionLevel),
    chunkSize: overrides?.chunkSize ?? DEFAULT_WATCH_OPTIONS.chunkSize,
    writeStabilityMs:
      overrides?.writeStabilityMs ??
      getEnvNumber('FILES2GZ_WRITE_STABILITY_MS', DEFAULT_WATCH_OPTIONS.writeStabilityMs),
    usePolling: overrides?.usePolling ?? getEnv('FILES2GZ_USE_POLLING') === 'true',
    ignoredPatterns,
    pollIntervalMs:
      overrides?.pollIntervalMs ??
      getEnvNumber('FILES2GZ_POLL_INTERVAL_MS', DEFAULT_WATCH_OPTIONS.pollIntervalMs),
  };
}

/**
 * Validate watch options.
 * Returns an array of error messages (empty = valid).
 */
export function validateWatchOptions(options: WatchOptions): string[] {
  const errors: string[] = [];

  if (!options.sourceDir || !options.targetDir) {
    errors.push('the following arguments are required: --source, --target');
  }

  if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
    errors.push('maxConcurrent must be at least 1');
  }

  if (options.maxConcurrent > 64) {
    errors.push('maxConcurrent must not exceed 64');
  }

  if (!Number.isInteger(options.compressionLevel) || options.compressionLevel < 1 || options.compressionLevel > 9) {
    errors.push('compressionLevel must be between 1 and 9');
  }

  if (options.chunkSize < 1024) {
    errors.push('chunkSize must be at least 1024');
  }

  if (options.writeStabilityMs < 0) {
    errors.push('writeStabilityMs must not be negative');
  }

  if (options.writeStabilityMs > 60_000) {
    errors.push('writeStabilityMs must not exceed 60000');
  }

  if (options.pollIntervalMs < 1) {
    errors.push('pollIntervalMs must be at least 1');
  }

  return errors;
}

// ─── Path resolution ────────────────────────────────────────────────

function loopError(err: unknown): StartupError {
  return new StartupError(
    EX_IOERR,
    'Unable to resolve the paths, check paths for infinite loops.',
    err
  );
}

/**
 * Canonicalize a path that may not exist yet: the longest existing prefix
 * is resolved through realpath and the missing remainder appended.
 */
async function resolveLoose(target: string): Promise<string> {
  const absolute = path.resolve(target);
  try {
    return await fs.realpath(absolute);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ELOOP') throw loopError(err);
    if (code !== 'ENOENT') throw err;

    const parent = path.dirname(absolute);
    if (parent === absolute) return absolute;
    return path.join(await resolveLoose(parent), path.basename(absolute));
  }
}

async function resolveSource(sourceDir: string): Promise<string> {
  const absolute = path.resolve(sourceDir);
  let resolved: string;
  try {
    resolved = await fs.realpath(absolute);
  } catch (err) {
    if (errorCode(err) === 'ELOOP') throw loopError(err);
    throw new StartupError(
      EX_IOERR,
      `Unable to access directory "${absolute}": ${describeError(err)}`,
      err
    );
  }

  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch (err) {
    throw new StartupError(
      EX_IOERR,
      `Unable to access directory "${absolute}": ${describeError(err)}`,
      err
    );
  }
  if (!stats.isDirectory()) {
    throw new StartupError(EX_IOERR, `Unable to access directory "${absolute}": not a directory`);
  }
  return resolved;
}

/**
 * Resolve and check the directory layout before anything is watched.
 *
 * - the source directory must exist (EX_IOERR otherwise)
 * - the target and log directories must not be inside the source tree (EX_USAGE)
 * - the target directory is created if missing (EX_IOERR if impossible)
 *
 * @throws StartupError
 */
export async function resolveWatchConfig(options: WatchOptions): Promise<WatchConfig> {
  const errors = validateWatchOptions(options);
  if (errors.length > 0) {
    throw new StartupError(EX_USAGE, errors.join('; '));
  }

  const sourceRoot = await resolveSource(options.sourceDir);

  let targetRoot: string;
  let logDir: string | undefined;
  try {
    targetRoot = await resolveLoose(options.targetDir);
    logDir = options.logDir ? await resolveLoose(options.logDir) : undefined;
  } catch (err) {
    if (err instanceof StartupError) throw err;
    throw new StartupError(EX_IOERR, `Unable to resolve the paths: ${describeError(err)}`, err);
  }

  if (
    isSameOrDescendant(sourceRoot, targetRoot) ||
    (logDir !== undefined && isSameOrDescendant(sourceRoot, logDir))
  ) {
    throw new StartupError(
      EX_USAGE,
      'target or log directory can not be a subdirectory of the directory being watched'
    );
  }

  try {
    await fs.mkdir(targetRoot, { recursive: true });
  } catch (err) {
    throw new StartupError(
      EX_IOERR,
      `Unable to access directory "${targetRoot}": ${describeError(err)}`,
      err
    );
  }

  return { sourceRoot, targetRoot, logDir };
}
