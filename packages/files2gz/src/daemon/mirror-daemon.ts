/**
 * MirrorDaemon - watches a source tree and writes gzip copies of new files.
 *
 * Lifecycle: idle -> validating -> running -> draining -> stopped
 *
 * The daemon:
 * 1. Resolves and checks the directory layout (no watcher or log sink is
 *    created if this fails)
 * 2. Creates the logger and starts the WatchLoop
 * 3. Waits until SIGINT or SIGTERM sets the termination flag
 * 4. Stops the watcher, lets admitted transfers finish, flushes the logger
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { resolveWatchConfig } from '../config.js';
import { createLogger } from '../logger.js';
import type { LoggerFactory, LoggerHandle } from '../logger.js';
import { CompressionHandler } from '../mirror/event-handler.js';
import type {
  DaemonState,
  DaemonStats,
  FileEvent,
  FileOutcome,
  MirrorDaemonEvents,
  WatchConfig,
  WatchOptions,
} from '../types.js';
import { TerminationFlag, waitForTermination } from './termination.js';
import type { SignalSource } from './termination.js';
import { WatchLoop } from './watch-loop.js';

export interface MirrorDaemonDependencies {
  /** Builds the process logger (default: pino with stderr and file sinks) */
  createLogger?: LoggerFactory;
  /** Where termination signals come from (default: process) */
  signals?: SignalSource;
}

/**
 * Typed event emitter interface for the daemon.
 */
export interface TypedMirrorDaemonEmitter {
  on<K extends keyof MirrorDaemonEvents>(event: K, listener: MirrorDaemonEvents[K]): this;
  off<K extends keyof MirrorDaemonEvents>(event: K, listener: MirrorDaemonEvents[K]): this;
  emit<K extends keyof MirrorDaemonEvents>(
    event: K,
    ...args: Parameters<MirrorDaemonEvents[K]>
  ): boolean;
}

export class MirrorDaemon extends EventEmitter implements TypedMirrorDaemonEmitter {
  private _state: DaemonState = 'idle';
  private readonly options: WatchOptions;
  private readonly loggerFactory: LoggerFactory;
  private readonly signals: SignalSource;
  private readonly termination = new TerminationFlag();
  private _config: WatchConfig | null = null;
  private loggerHandle: LoggerHandle | null = null;
  private logger: Logger | null = null;
  private loop: WatchLoop | null = null;
  private _startedAt: number | null = null;

  constructor(options: WatchOptions, deps: MirrorDaemonDependencies = {}) {
    super();
    this.options = options;
    this.loggerFactory = deps.createLogger ?? createLogger;
    this.signals = deps.signals ?? process;
  }

  /** Current daemon state */
  get state(): DaemonState {
    return this._state;
  }

  /** Resolved directory layout, available once validation passed */
  get config(): WatchConfig | null {
    return this._config;
  }

  /** Whether a termination signal has been received */
  get terminationRequested(): boolean {
    return this.termination.requested;
  }

  /**
   * Validate the configuration and start watching.
   *
   * @throws StartupError if validation fails; the daemon is then stopped
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`Cannot start daemon from state: ${this._state}`);
    }

    this.setState('validating');

    let config: WatchConfig;
    try {
      config = await resolveWatchConfig(this.options);
    } catch (err) {
      this.setState('stopped');
      throw err;
    }
    this._config = config;

    const handle = this.loggerFactory({
      level: this.options.logLevel,
      format: this.options.logFormat,
      logDir: config.logDir,
    });
    this.loggerHandle = handle;
    const logger = handle.logger;
    this.logger = logger;

    const handler = new CompressionHandler(
      config,
      { compressionLevel: this.options.compressionLevel, chunkSize: this.options.chunkSize },
      logger
    );

    this.loop = new WatchLoop(
      {
        sourceRoot: config.sourceRoot,
        maxConcurrent: this.options.maxConcurrent,
        writeStabilityMs: this.options.writeStabilityMs,
        usePolling: this.options.usePolling,
        ignoredPatterns: this.options.ignoredPatterns,
      },
      (event: FileEvent) => this.handleEvent(handler, event),
      logger
    );

    this.termination.install(this.signals, (signal) => {
      logger.info({ signal }, `Received ${signal}`);
    });

    try {
      await this.loop.start();
    } catch (err) {
      this.termination.uninstall();
      this.loop = null;
      this.setState('stopped');
      await handle.close();
      throw err;
    }

    this._startedAt = Date.now();
    logger.info(
      { sourceRoot: config.sourceRoot, targetRoot: config.targetRoot, logFile: handle.logFile },
      `File watching started in "${config.sourceRoot}"`
    );
    this.setState('running');
  }

  /**
   * Stop watching, wait for admitted transfers and flush the logger.
   */
  async stop(): Promise<void> {
    if (this._state !== 'running') {
      return;
    }

    this.setState('draining');

    if (this.loop) {
      await this.loop.close();
    }

    this.termination.uninstall();

    if (this.logger) {
      this.logger.info({ stats: this.getStats() }, 'Shutting down');
    }
    if (this.loggerHandle) {
      await this.loggerHandle.close();
    }

    this.setState('stopped');
  }

  /**
   * Start, block until a termination signal arrives, then stop.
   * Resolves to the process exit status.
   *
   * @throws StartupError if validation fails
   */
  async run(): Promise<number> {
    await this.start();
    await waitForTermination(this.termination, this.options.pollIntervalMs);
    await this.stop();
    return 0;
  }

  /**
   * Request termination as if a signal had been received.
   */
  requestStop(signal: NodeJS.Signals = 'SIGTERM'): void {
    this.termination.request(signal);
  }

  getStats(): DaemonStats {
    const loopStats = this.loop?.getStats();
    return {
      state: this._state,
      startedAt: this._startedAt,
      eventsDispatched: loopStats?.eventsDispatched ?? 0,
      filesCompressed: loopStats?.filesCompressed ?? 0,
      failures: loopStats?.failures ?? 0,
      bytesRead: loopStats?.bytesRead ?? 0,
      bytesWritten: loopStats?.bytesWritten ?? 0,
      pending: loopStats?.pending ?? 0,
    };
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private setState(newState: DaemonState): void {
    const oldState = this._state;
    this._state = newState;
    this.emit('stateChange', newState, oldState);
  }

  private async handleEvent(handler: CompressionHandler, event: FileEvent): Promise<FileOutcome> {
    const outcome = await handler.handle(event);
    this.emit('fileProcessed', outcome);
    return outcome;
  }
}
