/**
 * Bench Orchestrator — sequences one run:
 *
 *   initialize → pre-test gate → (load pool ‖ escalation ‖ continuous
 *   validation) until the deadline or a fatal check → score
 *
 * Every branch ends in a frozen BenchResult. A run that does not reach
 * its deadline cleanly scores 0 and does not pass.
 */

import { nanoid } from 'nanoid';
import { componentLogger } from '../core/logger.js';
import { BenchError, EmptyRegistryError, toError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import type { BenchConfig, BenchPhase, BenchResult } from '../core/types.js';
import { RequestCounter, summarizeCounts } from '../metrics/counter.js';
import { ErrorJournal } from '../signals/error-journal.js';
import { SignalBoard } from '../signals/signal-board.js';
import type { RandomSource } from '../utils/random.js';
import { CheckSequencer } from './check-sequencer.js';
import { EscalationController, LEVEL_UP_COUNTER } from './escalation.js';
import { LoadGeneratorPool } from './load-pool.js';
import type { FunctionRegistry, RunContext } from './registry.js';
import { computeScore, readScoreInputs } from './score.js';

export interface BenchDependencies<S> {
  registry: FunctionRegistry<S>;
  /** Builds the state shared by every operation for the whole run. */
  createState: () => S | Promise<S>;
  /** One-time request that prepares the target; a rejection ends the run. */
  initialize?: () => Promise<void>;
  board?: SignalBoard;
  counter?: RequestCounter;
  events?: EventBus;
  random?: RandomSource;
  now?: () => number;
}

export const PRETEST_PASSED_MESSAGE = 'preTest passed.';

type Outcome = Pick<BenchResult, 'score' | 'pass' | 'message'>;

export class BenchOrchestrator<S> {
  private logger = componentLogger('orchestrator');
  readonly board: SignalBoard;
  readonly counter: RequestCounter;
  readonly events: EventBus;
  private now: () => number;
  private started = false;

  constructor(
    private readonly config: BenchConfig,
    private readonly deps: BenchDependencies<S>,
  ) {
    this.board = deps.board ?? new SignalBoard(deps.now);
    this.counter = deps.counter ?? new RequestCounter();
    this.events = deps.events ?? new EventBus();
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run the benchmark once. An orchestrator owns its signal board and
   * counters for a single run; build a new one for the next run.
   */
  async run(): Promise<BenchResult> {
    if (this.started) {
      throw new BenchError('BenchOrchestrator.run() can only be called once', 'ALREADY_RUN');
    }
    this.started = true;

    if (!this.config.bench.preTestOnly && this.deps.registry.loads.length === 0) {
      throw new EmptyRegistryError('load');
    }

    const startTime = new Date(this.now()).toISOString();
    this.phase('initialize');
    const state = await this.deps.createState();

    const journal = new ErrorJournal(this.config.report.maxErrors);
    const detach = journal.attach(this.board);
    try {
      return await this.execute(state, journal, startTime);
    } finally {
      detach();
    }
  }

  private async execute(state: S, journal: ErrorJournal, startTime: string): Promise<BenchResult> {
    const { bench, load } = this.config;
    let logs: string[] = [];

    const finish = (outcome: Outcome): BenchResult => {
      const result: BenchResult = Object.freeze({
        jobId: bench.jobId ?? nanoid(),
        targets: [...this.config.target.remotes],
        loadLevel: this.counter.get(LEVEL_UP_COUNTER),
        errors: journal.messages(),
        logs,
        startTime,
        endTime: new Date(this.now()).toISOString(),
        ...outcome,
      });
      this.phase('done');
      this.events.emit('bench:complete', { result });
      this.logger.info({ score: result.score, pass: result.pass, message: result.message }, 'Benchmark finished');
      return result;
    };

    if (this.deps.initialize) {
      try {
        await this.deps.initialize();
      } catch (err) {
        const error = toError(err);
        this.logger.error({ error: error.message }, 'Initialize request failed');
        return finish({
          score: 0,
          pass: false,
          message: `Request to ${this.config.target.initializePath} failed. ${error.message}`,
        });
      }
    }

    const controller = new AbortController();
    const ctx: RunContext = { signal: controller.signal, deadline: this.now() + bench.durationMs };
    const deadlineTimer = setTimeout(() => controller.abort(), bench.durationMs);

    const sequencer = new CheckSequencer(this.deps.registry, {
      board: this.board,
      penaltyMs: this.config.validation.penaltyMs,
      random: this.deps.random,
      events: this.events,
    });

    try {
      this.phase('pretest');
      try {
        await sequencer.preTest(ctx, state);
      } catch (err) {
        return finish({
          score: 0,
          pass: false,
          message: `Validation before load failed. ${toError(err).message}`,
        });
      }

      if (bench.preTestOnly) {
        return finish({ score: 0, pass: false, message: PRETEST_PASSED_MESSAGE });
      }

      this.phase('load');
      const pool = new LoadGeneratorPool(this.deps.registry, ctx, state, {
        board: this.board,
        random: this.deps.random,
        events: this.events,
      });
      pool.start(load.initialWorkers);
      pool.levelUp(load.initialLevelUp);

      const escalation = new EscalationController(this.board, pool, this.counter, {
        tickIntervalMs: this.config.escalation.tickIntervalMs,
        signalWindowMs: this.config.escalation.signalWindowMs,
        levelUpStep: load.levelUpStep,
        disabled: bench.escalationDisabled,
        now: this.now,
        events: this.events,
      });
      const escalating = escalation.run(controller.signal);

      let fatal: Error | undefined;
      try {
        await sequencer.validationMain(ctx, state);
      } catch (err) {
        fatal = toError(err);
      }

      controller.abort();
      await escalating;
      await pool.drain();
      logs = escalation.runLogs;
      this.logger.info({ passes: sequencer.completedPasses, ...pool.stats() }, 'Load finished');

      if (fatal) {
        return finish({
          score: 0,
          pass: false,
          message: `Validation during load failed. ${fatal.message}`,
        });
      }

      this.phase('score');
      const summary = summarizeCounts(this.counter.snapshot());
      this.logger.info({ requests: summary.requests, other: summary.other }, 'Request counts');

      const inputs = readScoreInputs(this.counter);
      const score = computeScore(inputs);
      this.logger.info({ ...inputs, score }, 'Score computed');

      return finish({ score, pass: true, message: 'ok' });
    } finally {
      clearTimeout(deadlineTimer);
      controller.abort();
    }
  }

  private phase(phase: BenchPhase): void {
    this.logger.debug({ phase }, 'Benchmark phase');
    this.events.emit('bench:phase', { phase });
  }
}
