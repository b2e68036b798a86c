/**
 * Check Sequencer — runs the registered checks once as a gate before any
 * load starts, then over and over in shuffled order while the run lasts.
 */

import { componentLogger } from '../core/logger.js';
import { FatalValidationError, GateFailure, isFatal, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import type { SignalBoard } from '../signals/signal-board.js';
import { defaultRandom, permutation, type RandomSource } from '../utils/random.js';
import { sleep, stopwatch, waitForAbort, yieldToEventLoop } from '../utils/timer.js';
import type { FunctionRegistry, RunContext } from './registry.js';

export interface CheckSequencerOptions {
  board: SignalBoard;
  /** Pause after a non-fatal failure. */
  penaltyMs: number;
  random?: RandomSource;
  events?: EventBus;
}

export class CheckSequencer<S> {
  private logger = componentLogger('checks');
  private random: RandomSource;
  private passes = 0;

  constructor(
    private readonly registry: FunctionRegistry<S>,
    private readonly options: CheckSequencerOptions,
  ) {
    this.random = options.random ?? defaultRandom;
  }

  /**
   * Run every check once in registration order. The first failure is
   * thrown as a GateFailure.
   */
  async preTest(ctx: RunContext, state: S): Promise<void> {
    for (const check of this.registry.checks) {
      const watch = stopwatch();
      try {
        await check.run(ctx, state);
      } catch (err) {
        const error = toError(err);
        this.options.board.reportError(error);
        this.logger.warn({ check: check.name, error: error.message }, 'Pre-test check failed');
        throw new GateFailure(check.name, error);
      }
      this.logger.debug({ check: check.name, elapsed: watch.formatted() }, 'Pre-test check passed');
    }
  }

  /**
   * One shuffled pass over all checks. Stops early, without error, when
   * the run is cancelled; a check already in flight is allowed to finish.
   * Returns the number of checks started.
   */
  async validationPass(ctx: RunContext, state: S): Promise<number> {
    const checks = this.registry.checks;
    let started = 0;

    for (const index of permutation(checks.length, this.random)) {
      if (ctx.signal.aborted) break;

      const check = checks[index];
      const watch = stopwatch();
      started++;

      let failure: Error | undefined;
      try {
        await check.run(ctx, state);
      } catch (err) {
        failure = toError(err);
      }

      const durationMs = watch.elapsed();
      this.logger.debug({ check: check.name, elapsed: watch.formatted() }, 'Validation check finished');
      this.options.events?.emit('check:completed', { name: check.name, durationMs, error: failure });

      if (!failure || ctx.signal.aborted) continue;

      this.options.board.reportError(failure);
      if (isFatal(failure)) {
        this.logger.error({ check: check.name, error: failure.message }, 'Fatal validation error');
        throw new FatalValidationError(check.name, failure);
      }

      this.logger.info({ check: check.name, error: failure.message }, 'Validation error, pausing');
      await sleep(this.options.penaltyMs, ctx.signal);
    }

    this.passes++;
    return started;
  }

  /**
   * Repeat validation passes until the run is cancelled. Rejects with
   * FatalValidationError on the first fatal failure.
   */
  async validationMain(ctx: RunContext, state: S): Promise<void> {
    if (this.registry.checks.length === 0) {
      this.logger.warn('No checks registered; continuous validation idle');
      await waitForAbort(ctx.signal);
      return;
    }

    while (!ctx.signal.aborted) {
      await this.validationPass(ctx, state);
      await yieldToEventLoop();
    }
  }

  get completedPasses(): number {
    return this.passes;
  }
}
