/**
 * Wires a scenario to the target collaborators and an orchestrator, then
 * runs it.
 */

import type { BenchConfig, BenchResult } from '../core/types.js';
import { EventBus } from '../core/events.js';
import { RequestCounter, summarizeCounts, type CountSummary } from '../metrics/counter.js';
import type { Scenario, ScenarioKit } from '../scenarios/types.js';
import { SignalBoard } from '../signals/signal-board.js';
import { HttpAgent } from '../target/http-agent.js';
import { initializeTarget } from '../target/initialize.js';
import { TargetPool } from '../target/target-pool.js';
import type { RandomSource } from '../utils/random.js';
import { BenchOrchestrator } from './orchestrator.js';
import { FunctionRegistry } from './registry.js';

export interface LaunchOptions {
  fetchImpl?: typeof fetch;
  random?: RandomSource;
  events?: EventBus;
}

export interface LaunchOutcome {
  result: BenchResult;
  counts: CountSummary;
}

export async function launchBenchmark<S>(
  config: BenchConfig,
  scenario: Scenario<S>,
  options: LaunchOptions = {},
): Promise<LaunchOutcome> {
  const board = new SignalBoard();
  const counter = new RequestCounter();
  const targets = new TargetPool(config.target.remotes, options.random);
  const agent = new HttpAgent({
    targets,
    counter,
    board,
    userAgent: config.target.userAgent,
    timeoutMs: config.target.requestTimeoutMs,
    slowThresholdMs: config.target.slowThresholdMs,
    fetchImpl: options.fetchImpl,
  });
  const kit: ScenarioKit = { config, agent, targets, counter, board };

  const registry = new FunctionRegistry<S>();
  scenario.register(registry, kit);

  const orchestrator = new BenchOrchestrator(config, {
    registry,
    createState: () => scenario.createState(kit),
    initialize: () => initializeTarget({
      host: targets.pick(),
      path: config.target.initializePath,
      userAgent: config.target.userAgent,
      timeoutMs: config.target.initializeTimeoutMs,
      fetchImpl: options.fetchImpl,
    }),
    board,
    counter,
    events: options.events ?? new EventBus(),
    random: options.random,
  });

  const result = await orchestrator.run();
  return { result, counts: summarizeCounts(counter.snapshot()) };
}
