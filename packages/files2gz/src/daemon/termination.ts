/**
 * Signal-driven termination flag.
 *
 * Signal listeners only set the flag (and report the signal); the
 * lifecycle polls it from its wait loop.
 */

import { setTimeout as sleep } from 'node:timers/promises';

/** Signals that request shutdown */
export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

/** Anything signal listeners can be attached to; `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export class TerminationFlag {
  private _requested = false;
  private source: SignalSource | null = null;
  private onSignal: ((signal: NodeJS.Signals) => void) | null = null;

  private readonly listener = (signal: NodeJS.Signals): void => {
    this.request(signal);
  };

  /** Whether termination has been requested */
  get requested(): boolean {
    return this._requested;
  }

  /**
   * Mark termination as requested. Later calls keep the flag set and are
   * still reported to the signal callback.
   */
  request(signal: NodeJS.Signals): void {
    this._requested = true;
    this.onSignal?.(signal);
  }

  /** Attach listeners for SIGTERM and SIGINT. */
  install(source: SignalSource, onSignal?: (signal: NodeJS.Signals) => void): void {
    if (this.source) {
      return;
    }
    this.source = source;
    this.onSignal = onSignal ?? null;
    for (const signal of TERMINATION_SIGNALS) {
      source.on(signal, this.listener);
    }
  }

  /** Remove the listeners added by install(). */
  uninstall(): void {
    if (!this.source) {
      return;
    }
    for (const signal of TERMINATION_SIGNALS) {
      this.source.off(signal, this.listener);
    }
    this.source = null;
    this.onSignal = null;
  }
}

/**
 * Resolve once `flag.requested` is observed, checking every `intervalMs`.
 */
export async function waitForTermination(flag: TerminationFlag, intervalMs: number): Promise<void> {
  while (!flag.requested) {
    await sleep(intervalMs);
  }
}
