import type { BenchConfig } from '../core/types.js';
import type { FunctionRegistry } from '../bench/registry.js';
import type { RequestCounter } from '../metrics/counter.js';
import type { SignalBoard } from '../signals/signal-board.js';
import type { HttpAgent } from '../target/http-agent.js';
import type { TargetPool } from '../target/target-pool.js';

/**
 * Everything a scenario needs to talk to the target and report back.
 */
export interface ScenarioKit {
  config: BenchConfig;
  agent: HttpAgent;
  targets: TargetPool;
  counter: RequestCounter;
  board: SignalBoard;
}

/**
 * A scenario owns the per-run state and registers the check and load
 * functions that exercise the target.
 */
export interface Scenario<S> {
  name: string;
  description?: string;
  createState(kit: ScenarioKit): S | Promise<S>;
  register(registry: FunctionRegistry<S>, kit: ScenarioKit): void;
}

export function defineScenario<S>(scenario: Scenario<S>): Scenario<S> {
  return scenario;
}
