/**
 * Bench module — run orchestration, load generation and scoring.
 */

export { FunctionRegistry, type BenchFunction, type BenchOperation, type RunContext } from './registry.js';
export { CheckSequencer, type CheckSequencerOptions } from './check-sequencer.js';
export { LoadGeneratorPool, type LoadPoolOptions, type LoadPoolStats } from './load-pool.js';
export {
  EscalationController,
  LEVEL_UP_COUNTER,
  type EscalationOptions,
  type LevelUpTarget,
} from './escalation.js';
export { computeScore, readScoreInputs, SCORE_KEYS } from './score.js';
export { BenchOrchestrator, PRETEST_PASSED_MESSAGE, type BenchDependencies } from './orchestrator.js';
export { BenchReporter } from './reporter.js';
export { launchBenchmark, type LaunchOptions, type LaunchOutcome } from './launcher.js';
