/**
 * Function Registry — named check and load operations for a run.
 *
 * Load and level-up entries are replicated `weight` times so that a
 * uniform pick over the flat list is a weighted pick over functions.
 * Registration happens before a run starts; the lists are not guarded
 * against concurrent mutation.
 */

import { EmptyRegistryError } from '../core/errors.js';
import { randomIndex, type RandomSource } from '../utils/random.js';

export interface RunContext {
  /** Aborts when the run deadline passes or a fatal check fails. */
  signal: AbortSignal;
  /** Epoch milliseconds of the run deadline. */
  deadline: number;
}

export type BenchOperation<S> = (ctx: RunContext, state: S) => Promise<void>;

export interface BenchFunction<S> {
  readonly name: string;
  readonly run: BenchOperation<S>;
}

export class FunctionRegistry<S> {
  private checkFuncs: BenchFunction<S>[] = [];
  private loadFuncs: BenchFunction<S>[] = [];
  private levelUpFuncs: BenchFunction<S>[] = [];

  registerCheck(name: string, run: BenchOperation<S>): this {
    this.checkFuncs.push(Object.freeze({ name, run }));
    return this;
  }

  registerLoad(weight: number, name: string, run: BenchOperation<S>): this {
    replicate(this.loadFuncs, weight, { name, run });
    return this;
  }

  registerLevelUpLoad(weight: number, name: string, run: BenchOperation<S>): this {
    replicate(this.levelUpFuncs, weight, { name, run });
    return this;
  }

  get checks(): readonly BenchFunction<S>[] {
    return this.checkFuncs;
  }

  get loads(): readonly BenchFunction<S>[] {
    return this.loadFuncs;
  }

  get levelUpLoads(): readonly BenchFunction<S>[] {
    return this.levelUpFuncs;
  }

  pickLoad(random: RandomSource): BenchFunction<S> {
    if (this.loadFuncs.length === 0) {
      throw new EmptyRegistryError('load');
    }
    return this.loadFuncs[randomIndex(this.loadFuncs.length, random)];
  }
}

function replicate<S>(target: BenchFunction<S>[], weight: number, fn: BenchFunction<S>): void {
  if (!Number.isInteger(weight) || weight < 1) {
    throw new RangeError(`Weight for "${fn.name}" must be an integer >= 1, got ${weight}`);
  }
  const entry = Object.freeze({ ...fn });
  for (let i = 0; i < weight; i++) {
    target.push(entry);
  }
}
