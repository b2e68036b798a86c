/**
 * Signal Board — most recent error and most recent slow response seen
 * during a run, each stamped with the time it was reported.
 *
 * Holds one slot per channel; a new report overwrites the previous one.
 * Node runs every report on the event loop, so each read and write is
 * atomic from the callers' point of view. Once guarded, reports are
 * dropped so that shutdown traffic cannot overwrite the final diagnostics.
 */

import { EventEmitter } from 'eventemitter3';

export interface ErrorSignal {
  error: Error | null;
  observedAt: number;
}

export interface SlowPathSignal {
  path: string | null;
  observedAt: number;
}

export interface SignalBoardEvents {
  error: (error: Error, observedAt: number) => void;
  'slow-path': (path: string, observedAt: number) => void;
}

export class SignalBoard extends EventEmitter<SignalBoardEvents> {
  private lastError: ErrorSignal = { error: null, observedAt: 0 };
  private lastSlowPath: SlowPathSignal = { path: null, observedAt: 0 };
  private guarded = false;

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  reportError(error: Error): void {
    if (this.guarded) return;
    const observedAt = this.now();
    this.lastError = { error, observedAt };
    this.emit('error', error, observedAt);
  }

  reportSlowPath(path: string): void {
    if (this.guarded) return;
    const observedAt = this.now();
    this.lastSlowPath = { path, observedAt };
    this.emit('slow-path', path, observedAt);
  }

  getLastError(): ErrorSignal {
    return { ...this.lastError };
  }

  getLastSlowPath(): SlowPathSignal {
    return { ...this.lastSlowPath };
  }

  guard(enable: boolean): void {
    this.guarded = enable;
  }

  get isGuarded(): boolean {
    return this.guarded;
  }
}
