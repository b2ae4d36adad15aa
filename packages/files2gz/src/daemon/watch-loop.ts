/**
 * Watch loop wrapping chokidar.
 *
 * Subscribes to file creations under the source root (recursively),
 * adapts each one to a FileEvent and dispatches it to the handler
 * through a bounded worker pool.
 */

import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { Logger } from 'pino';
import { describeError } from '../errors.js';
import type { FileEvent, FileOutcome } from '../types.js';

export type FileEventHandler = (event: FileEvent) => Promise<FileOutcome>;

export interface WatchLoopOptions {
  /** Canonical directory to watch */
  sourceRoot: string;
  /** Maximum number of handlers running at the same time */
  maxConcurrent: number;
  /** Size stability threshold before a new file is reported (0 disables) */
  writeStabilityMs: number;
  /** Use stat polling instead of native notifications */
  usePolling: boolean;
  /** Glob patterns to ignore */
  ignoredPatterns: string[];
}

export interface WatchLoopStats {
  eventsDispatched: number;
  filesCompressed: number;
  failures: number;
  bytesRead: number;
  bytesWritten: number;
  pending: number;
}

export class WatchLoop {
  private watcher: FSWatcher | null = null;
  private readonly options: WatchLoopOptions;
  private readonly handler: FileEventHandler;
  private readonly logger: Logger;
  private readonly queue: FileEvent[] = [];
  private readonly inFlight: Set<Promise<void>> = new Set();
  private closing = false;

  // Stats
  private _eventsDispatched = 0;
  private _filesCompressed = 0;
  private _failures = 0;
  private _bytesRead = 0;
  private _bytesWritten = 0;

  constructor(options: WatchLoopOptions, handler: FileEventHandler, logger: Logger) {
    this.options = options;
    this.handler = handler;
    this.logger = logger.child({ component: 'watch-loop' });
  }

  /** Whether the chokidar subscription is active */
  get isWatching(): boolean {
    return this.watcher !== null && !this.closing;
  }

  /**
   * Start watching. Resolves once chokidar has finished its initial scan;
   * files present before that point are not dispatched.
   */
  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }
    this.closing = false;

    const stability = this.options.writeStabilityMs;

    return new Promise<void>((resolve, reject) => {
      try {
        const watcher = watch(this.options.sourceRoot, {
          ignored: this.options.ignoredPatterns,
          persistent: true,
          ignoreInitial: true,
          followSymlinks: false,
          usePolling: this.options.usePolling,
          interval: 1000,
          awaitWriteFinish:
            stability > 0 ? { stabilityThreshold: stability, pollInterval: 100 } : false,
        });
        this.watcher = watcher;

        watcher.on('ready', () => {
          resolve();
        });

        watcher.on('error', (error: Error) => {
          this.logger.error({ error: error.message }, 'Watcher error');
        });

        // Only file creations; directory creations arrive as 'addDir'
        watcher.on('add', (filePath: string) => {
          this.enqueue({ absoluteSourcePath: filePath });
        });
      } catch (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  /**
   * Stop the subscription and wait for every admitted event to finish.
   * Queued events are still processed; nothing new is admitted.
   */
  async close(): Promise<void> {
    this.closing = true;

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  getStats(): WatchLoopStats {
    return {
      eventsDispatched: this._eventsDispatched,
      filesCompressed: this._filesCompressed,
      failures: this._failures,
      bytesRead: this._bytesRead,
      bytesWritten: this._bytesWritten,
      pending: this.queue.length + this.inFlight.size,
    };
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private enqueue(event: FileEvent): void {
    if (this.closing) {
      return;
    }
    this.logger.debug({ path: event.absoluteSourcePath }, 'File created');
    this.queue.push(event);
    this.pump();
  }

  private pump(): void {
    while (this.inFlight.size < this.options.maxConcurrent) {
      const event = this.queue.shift();
      if (!event) return;

      this._eventsDispatched++;
      const task: Promise<void> = this.dispatch(event).finally(() => {
        this.inFlight.delete(task);
        this.pump();
      });
      this.inFlight.add(task);
    }
  }

  private async dispatch(event: FileEvent): Promise<void> {
    try {
      const outcome = await this.handler(event);
      if (outcome.success) {
        this._filesCompressed++;
        this._bytesRead += outcome.bytesRead;
        this._bytesWritten += outcome.bytesWritten;
      } else {
        this._failures++;
      }
    } catch (err) {
      this._failures++;
      this.logger.error(
        { path: event.absoluteSourcePath, error: describeError(err) },
        'Event handler failed'
      );
    }
  }
}
