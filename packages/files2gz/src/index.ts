// Daemon module
export {
  MirrorDaemon,
  WatchLoop,
  TerminationFlag,
  waitForTermination,
  TERMINATION_SIGNALS,
} from './daemon/index.js';

export type {
  MirrorDaemonDependencies,
  TypedMirrorDaemonEmitter,
  FileEventHandler,
  WatchLoopOptions,
  WatchLoopStats,
  SignalSource,
} from './daemon/index.js';

// Mirror module (per-file pipeline)
export {
  CompressionHandler,
  DirectoryMaterializer,
  mapTargetPaths,
  isSameOrDescendant,
  compressFile,
  syncDirectory,
} from './mirror/index.js';

export type { TransferOptions } from './mirror/index.js';

// Configuration, logging, errors
export { buildWatchOptions, validateWatchOptions, resolveWatchConfig } from './config.js';
export { createLogger, parseLogLevel, isKnownLogLevel, logFileName } from './logger.js';
export type { LoggerOptions, LoggerHandle, LoggerFactory } from './logger.js';
export {
  MirrorError,
  OutsideWatchedTreeError,
  DirectoryCreateError,
  SourceUnreadableError,
  DestinationWriteError,
  StartupError,
  EX_USAGE,
  EX_IOERR,
} from './errors.js';
export { runDaemon } from './main.js';

export type {
  DaemonState,
  LogLevel,
  LogFormat,
  WatchOptions,
  WatchConfig,
  FileEvent,
  MappedPaths,
  TransferResult,
  FileOutcome,
  DaemonStats,
  MirrorDaemonEvents,
} from './types.js';
export { DEFAULT_WATCH_OPTIONS, DEFAULT_LOG_DIR, GZIP_SUFFIX } from './types.js';
