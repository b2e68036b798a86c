/**
 * Escalation Controller — raises the load level once per tick unless the
 * signal board saw an error or a slow response within the recent window.
 *
 * When the run is cancelled the controller guards the board, which is the
 * one place where signal recording is switched off.
 */

import { componentLogger } from '../core/logger.js';
import type { EventBus } from '../core/events.js';
import type { EscalationDecision } from '../core/types.js';
import type { RequestCounter } from '../metrics/counter.js';
import type { SignalBoard } from '../signals/signal-board.js';
import { formatClock, formatDuration, sleep } from '../utils/timer.js';

export const LEVEL_UP_COUNTER = 'load-level-up';

export interface LevelUpTarget {
  levelUp(n: number): number;
}

export interface EscalationOptions {
  tickIntervalMs: number;
  signalWindowMs: number;
  levelUpStep: number;
  disabled: boolean;
  now?: () => number;
  events?: EventBus;
}

export class EscalationController {
  private logger = componentLogger('escalation');
  private level = 0;
  private logs: string[] = [];
  private now: () => number;

  constructor(
    private readonly board: SignalBoard,
    private readonly pool: LevelUpTarget,
    private readonly counter: RequestCounter,
    private readonly options: EscalationOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Make one escalation decision and act on it.
   */
  tick(): EscalationDecision {
    const decision = this.decide();

    switch (decision.kind) {
      case 'disabled':
        break;
      case 'withheld':
        if (decision.reason === 'error') {
          this.journal(`Load level was not raised because an error occurred. ${decision.error.message}`);
          this.logger.info(
            { reason: 'recent-error', error: decision.error.message, age: formatDuration(decision.ageMs) },
            'Cannot increase load level',
          );
        } else {
          this.journal(`Load level was not raised because a response was slow. ${decision.path}`);
          this.logger.info(
            { reason: 'slow-path', path: decision.path, age: formatDuration(decision.ageMs) },
            'Cannot increase load level',
          );
        }
        break;
      case 'escalated':
        this.journal('Load level increased.');
        this.counter.increment(LEVEL_UP_COUNTER);
        this.logger.info({ level: decision.level }, 'Increase load level');
        this.pool.levelUp(this.options.levelUpStep);
        break;
    }

    this.options.events?.emit('escalation:decision', { decision });
    return decision;
  }

  /**
   * Tick every `tickIntervalMs` until the signal aborts, then guard the
   * signal board.
   */
  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await sleep(this.options.tickIntervalMs, signal);
        if (signal.aborted) break;
        this.tick();
      }
    } finally {
      this.board.guard(true);
      this.logger.debug({ level: this.level }, 'Escalation stopped, signal board guarded');
    }
  }

  get currentLevel(): number {
    return this.level;
  }

  /** Human-readable escalation log, oldest first. */
  get runLogs(): string[] {
    return [...this.logs];
  }

  private decide(): EscalationDecision {
    if (this.options.disabled) return { kind: 'disabled' };

    const now = this.now();
    const windowMs = this.options.signalWindowMs;

    const { error, observedAt: errorAt } = this.board.getLastError();
    if (error && now - errorAt < windowMs) {
      return { kind: 'withheld', reason: 'error', error, ageMs: now - errorAt };
    }

    const { path, observedAt: slowAt } = this.board.getLastSlowPath();
    if (path && now - slowAt < windowMs) {
      return { kind: 'withheld', reason: 'slow-path', path, ageMs: now - slowAt };
    }

    this.level++;
    return { kind: 'escalated', level: this.level };
  }

  private journal(message: string): void {
    this.logs.push(`${formatClock(this.now())} ${message}`);
  }
}
