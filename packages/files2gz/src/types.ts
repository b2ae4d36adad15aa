/**
 * Types for the files2gz mirror daemon.
 *
 * The daemon watches a source directory for new files and writes a
 * gzip-compressed copy of each one under a target directory.
 */

/** Daemon lifecycle states */
export type DaemonState = 'idle' | 'validating' | 'running' | 'draining' | 'stopped';

/** Log levels accepted by the logger after normalization */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Console output format */
export type LogFormat = 'json' | 'pretty';

/** Settings as supplied by the CLI and environment, before path resolution */
export interface WatchOptions {
  /** Directory to watch (required) */
  sourceDir: string;
  /** Directory receiving compressed copies (required) */
  targetDir: string;
  /** Directory for log files (default: ./logs, not checked against the source tree) */
  logDir?: string;
  /** Minimum log level */
  logLevel: LogLevel;
  /** Console log format */
  logFormat: LogFormat;
  /** Maximum number of files compressed at the same time */
  maxConcurrent: number;
  /** gzip compression level (1-9) */
  compressionLevel: number;
  /** Read/write chunk size in bytes */
  chunkSize: number;
  /** How long a file's size must stay unchanged before it is dispatched (0 disables) */
  writeStabilityMs: number;
  /** Use stat polling instead of native notifications */
  usePolling: boolean;
  /** Glob patterns of files to ignore */
  ignoredPatterns: string[];
  /** How often the lifecycle checks for a termination request */
  pollIntervalMs: number;
}

/** Canonical, validated directory layout. Immutable for the process lifetime. */
export interface WatchConfig {
  readonly sourceRoot: string;
  readonly targetRoot: string;
  readonly logDir?: string;
}

/** A single observed file creation */
export interface FileEvent {
  absoluteSourcePath: string;
}

/** Target locations derived from a FileEvent */
export interface MappedPaths {
  /** Path of the source file relative to the source root */
  relativePath: string;
  /** targetRoot/relativePath with ".gz" appended */
  targetFilePath: string;
  /** Parent directory of targetFilePath */
  targetParentDir: string;
}

/** Byte counts of one completed transfer */
export interface TransferResult {
  bytesRead: number;
  bytesWritten: number;
}

/** Outcome of handling one FileEvent */
export interface FileOutcome {
  /** Source path as received */
  sourcePath: string;
  /** Relative path, when mapping succeeded */
  relativePath?: string;
  success: boolean;
  /** Error message if handling failed */
  error?: string;
  bytesRead: number;
  bytesWritten: number;
}

/** Counters reported by the daemon */
export interface DaemonStats {
  state: DaemonState;
  /** Timestamp when watching started (or null) */
  startedAt: number | null;
  eventsDispatched: number;
  filesCompressed: number;
  failures: number;
  bytesRead: number;
  bytesWritten: number;
  /** Events admitted but not yet finished */
  pending: number;
}

/** Events emitted by the MirrorDaemon */
export interface MirrorDaemonEvents {
  stateChange: (newState: DaemonState, oldState: DaemonState) => void;
  fileProcessed: (outcome: FileOutcome) => void;
}

/** Default option values */
export const DEFAULT_WATCH_OPTIONS: Omit<WatchOptions, 'sourceDir' | 'targetDir' | 'logDir'> = {
  logLevel: 'info',
  logFormat: 'json',
  maxConcurrent: 4,
  compressionLevel: 9,
  chunkSize: 64 * 1024,
  writeStabilityMs: 500,
  usePolling: false,
  ignoredPatterns: [],
  pollIntervalMs: 1000,
};

/** Default directory for log files, relative to the working directory */
export const DEFAULT_LOG_DIR = './logs';

/** Suffix appended to every mirrored file */
export const GZIP_SUFFIX = '.gz';
