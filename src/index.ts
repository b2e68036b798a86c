/**
 * surgebench — timed, self-escalating load tests with continuous validation
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, launchBenchmark, defineScenario } from 'surgebench';
 *
 * const scenario = defineScenario({
 *   name: 'orders',
 *   createState: () => ({ created: 0 }),
 *   register(registry, kit) {
 *     registry.registerCheck('list orders', async (ctx) => {
 *       await kit.agent.get('/orders', { signal: ctx.signal });
 *     });
 *     registry.registerLoad(3, 'create order', async (ctx, state) => {
 *       await kit.agent.post('/orders', { body: '{}', signal: ctx.signal });
 *       state.created++;
 *     });
 *   },
 * });
 *
 * const config = new ConfigManager().load({ bench: { durationMs: 30_000 } });
 * const { result } = await launchBenchmark(config, scenario);
 * ```
 */

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { EventBus } from './core/events.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  BenchError,
  ConfigError,
  ScenarioError,
  TransportInitError,
  CheckerError,
  GateFailure,
  FatalValidationError,
  LoadOperationError,
  EmptyRegistryError,
  fatalError,
  validationError,
  isFatal,
} from './core/errors.js';
export {
  BenchConfigSchema,
  type BenchConfig,
  type BenchConfigInput,
  type BenchEvents,
  type BenchPhase,
  type BenchResult,
  type EscalationDecision,
  type ScoreInputs,
} from './core/types.js';

// Bench
export * from './bench/index.js';

// Signals & metrics
export { SignalBoard, type ErrorSignal, type SlowPathSignal } from './signals/signal-board.js';
export { ErrorJournal } from './signals/error-journal.js';
export {
  RequestCounter,
  summarizeCounts,
  DEFAULT_SUMMARY_BUCKETS,
  type CountEntry,
  type CountSummary,
} from './metrics/counter.js';

// Target
export { HttpAgent, type AgentRequest, type AgentResponse, type HttpAgentOptions } from './target/http-agent.js';
export { initializeTarget, type InitializeOptions } from './target/initialize.js';
export { TargetPool } from './target/target-pool.js';

// Scenarios
export * from './scenarios/index.js';

// Utils
export { mulberry32, permutation, type RandomSource } from './utils/random.js';
export { formatDuration, parseDuration } from './utils/timer.js';

export { VERSION, NAME } from './version.js';
