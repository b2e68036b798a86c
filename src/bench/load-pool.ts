/**
 * Load Generator Pool — sustained workers plus one-shot level-up bursts.
 *
 * Each worker picks a weighted-random load function and awaits it, over
 * and over, until the run is cancelled. A failing call stops only that
 * worker. Bursts run a level-up function once; their failures are logged
 * and reported to the signal board but never affect the worker count.
 * Every spawned task is tracked so shutdown can wait for in-flight calls.
 */

import { componentLogger } from '../core/logger.js';
import { EmptyRegistryError, LoadOperationError, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import type { SignalBoard } from '../signals/signal-board.js';
import { defaultRandom, type RandomSource } from '../utils/random.js';
import { yieldToEventLoop } from '../utils/timer.js';
import type { BenchFunction, FunctionRegistry, RunContext } from './registry.js';

export interface LoadPoolOptions {
  board: SignalBoard;
  random?: RandomSource;
  events?: EventBus;
}

export interface LoadPoolStats {
  workersStarted: number;
  workersActive: number;
  workersStopped: number;
  burstsSpawned: number;
  burstsActive: number;
  invocations: number;
}

export class LoadGeneratorPool<S> {
  private logger = componentLogger('load');
  private random: RandomSource;
  private tasks = new Set<Promise<void>>();
  private nextWorkerId = 0;
  private workersActive = 0;
  private workersStopped = 0;
  private burstsSpawned = 0;
  private burstsActive = 0;
  private invocations = 0;

  constructor(
    private readonly registry: FunctionRegistry<S>,
    private readonly ctx: RunContext,
    private readonly state: S,
    private readonly options: LoadPoolOptions,
  ) {
    this.random = options.random ?? defaultRandom;
  }

  /**
   * Spawn `workerCount` sustained workers. Throws EmptyRegistryError when
   * no load function is registered.
   */
  start(workerCount: number): void {
    if (!Number.isInteger(workerCount) || workerCount < 0) {
      throw new RangeError(`Worker count must be a non-negative integer, got ${workerCount}`);
    }
    if (this.registry.loads.length === 0) {
      throw new EmptyRegistryError('load');
    }

    for (let i = 0; i < workerCount; i++) {
      this.track(this.worker(this.nextWorkerId++));
    }
    this.logger.info({ workers: workerCount, total: this.nextWorkerId }, 'Load workers started');
  }

  /**
   * Spawn `n` one-shot invocations of every level-up function. Returns the
   * number of bursts spawned; nothing is spawned once the run is cancelled.
   */
  levelUp(n: number): number {
    if (this.ctx.signal.aborted) return 0;

    let spawned = 0;
    for (let i = 0; i < n; i++) {
      for (const fn of this.registry.levelUpLoads) {
        this.track(this.burst(fn));
        spawned++;
      }
    }
    this.burstsSpawned += spawned;
    this.logger.debug({ spawned, n }, 'Level-up bursts spawned');
    return spawned;
  }

  /**
   * Wait for every worker and burst to settle, including ones spawned
   * while waiting.
   */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  stats(): LoadPoolStats {
    return {
      workersStarted: this.nextWorkerId,
      workersActive: this.workersActive,
      workersStopped: this.workersStopped,
      burstsSpawned: this.burstsSpawned,
      burstsActive: this.burstsActive,
      invocations: this.invocations,
    };
  }

  private track(task: Promise<void>): void {
    const tracked = task.finally(() => {
      this.tasks.delete(tracked);
    });
    this.tasks.add(tracked);
  }

  private async worker(workerId: number): Promise<void> {
    this.workersActive++;
    try {
      while (!this.ctx.signal.aborted) {
        const fn = this.registry.pickLoad(this.random);
        this.invocations++;
        try {
          await fn.run(this.ctx, this.state);
        } catch (err) {
          if (this.ctx.signal.aborted) return;
          const error = new LoadOperationError(fn.name, toError(err));
          this.options.board.reportError(error);
          this.logger.info({ workerId, operation: fn.name, error: error.message }, 'Load worker stopped');
          this.options.events?.emit('worker:stopped', { workerId, operation: fn.name, error });
          return;
        }
        await yieldToEventLoop();
      }
    } finally {
      this.workersActive--;
      this.workersStopped++;
    }
  }

  private async burst(fn: BenchFunction<S>): Promise<void> {
    this.burstsActive++;
    this.invocations++;
    try {
      await fn.run(this.ctx, this.state);
    } catch (err) {
      if (!this.ctx.signal.aborted) {
        const error = new LoadOperationError(fn.name, toError(err));
        this.options.board.reportError(error);
        this.logger.debug({ operation: fn.name, error: error.message }, 'Level-up burst failed');
      }
    } finally {
      this.burstsActive--;
    }
  }
}
