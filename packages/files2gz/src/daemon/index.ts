export { MirrorDaemon } from './mirror-daemon.js';
export type { MirrorDaemonDependencies, TypedMirrorDaemonEmitter } from './mirror-daemon.js';
export { WatchLoop } from './watch-loop.js';
export type { FileEventHandler, WatchLoopOptions, WatchLoopStats } from './watch-loop.js';
export { TerminationFlag, waitForTermination, TERMINATION_SIGNALS } from './termination.js';
export type { SignalSource } from './termination.js';
