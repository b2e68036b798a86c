import { describe, it, expect, vi } from 'vitest';
import { EscalationController, LEVEL_UP_COUNTER, type EscalationOptions } from '../../../src/bench/escalation.js';
import { EventBus } from '../../../src/core/events.js';
import { RequestCounter } from '../../../src/metrics/counter.js';
import { SignalBoard } from '../../../src/signals/signal-board.js';
import { formatClock } from '../../../src/utils/timer.js';

function setup(overrides: Partial<EscalationOptions> = {}) {
  const clock = { now: 100_000 };
  const now = () => clock.now;
  const board = new SignalBoard(now);
  const pool = { levelUp: vi.fn((n: number) => n) };
  const counter = new RequestCounter();
  const controller = new EscalationController(board, pool, counter, {
    tickIntervalMs: 1000,
    signalWindowMs: 5000,
    levelUpStep: 5,
    disabled: false,
    now,
    ...overrides,
  });
  return { clock, board, pool, counter, controller };
}

describe('EscalationController', () => {
  it('should raise the level when the board is quiet', () => {
    const { clock, pool, counter, controller } = setup();

    const decision = controller.tick();

    expect(decision).toEqual({ kind: 'escalated', level: 1 });
    expect(controller.currentLevel).toBe(1);
    expect(counter.get(LEVEL_UP_COUNTER)).toBe(1);
    expect(pool.levelUp).toHaveBeenCalledWith(5);
    expect(controller.runLogs).toEqual([`${formatClock(clock.now)} Load level increased.`]);
  });

  it('should withhold escalation while an error is recent', () => {
    const { clock, board, pool, counter, controller } = setup();
    board.reportError(new Error('GET /: unexpected status code 500'));
    clock.now += 2000;

    const decision = controller.tick();

    expect(decision).toMatchObject({ kind: 'withheld', reason: 'error', ageMs: 2000 });
    expect(controller.currentLevel).toBe(0);
    expect(counter.get(LEVEL_UP_COUNTER)).toBe(0);
    expect(pool.levelUp).not.toHaveBeenCalled();
    expect(controller.runLogs).toEqual([
      `${formatClock(clock.now)} Load level was not raised because an error occurred. GET /: unexpected status code 500`,
    ]);
  });

  it('should withhold escalation while a slow response is recent', () => {
    const { clock, board, controller } = setup();
    board.reportSlowPath('/channel/4');
    clock.now += 4999;

    const decision = controller.tick();

    expect(decision).toEqual({ kind: 'withheld', reason: 'slow-path', path: '/channel/4', ageMs: 4999 });
    expect(controller.runLogs).toEqual([
      `${formatClock(clock.now)} Load level was not raised because a response was slow. /channel/4`,
    ]);
  });

  it('should prefer the error reason when both signals are recent', () => {
    const { board, controller } = setup();
    board.reportSlowPath('/fetch');
    board.reportError(new Error('boom'));

    expect(controller.tick()).toMatchObject({ kind: 'withheld', reason: 'error' });
  });

  it('should escalate once a signal is exactly one window old', () => {
    const { clock, board, controller } = setup();
    board.reportError(new Error('old'));
    clock.now += 5000;

    expect(controller.tick()).toEqual({ kind: 'escalated', level: 1 });
  });

  it('should do nothing when escalation is disabled', () => {
    const { pool, counter, controller } = setup({ disabled: true });

    expect(controller.tick()).toEqual({ kind: 'disabled' });
    expect(controller.currentLevel).toBe(0);
    expect(counter.get(LEVEL_UP_COUNTER)).toBe(0);
    expect(pool.levelUp).not.toHaveBeenCalled();
    expect(controller.runLogs).toEqual([]);
  });

  it('should never lower the level', () => {
    const { clock, board, controller } = setup();
    const levels: number[] = [];

    controller.tick();
    levels.push(controller.currentLevel);
    board.reportError(new Error('spike'));
    controller.tick();
    levels.push(controller.currentLevel);
    clock.now += 6000;
    controller.tick();
    levels.push(controller.currentLevel);

    expect(levels).toEqual([1, 1, 2]);
  });

  it('should emit each decision', () => {
    const events = new EventBus();
    const seen = vi.fn();
    events.on('escalation:decision', seen);
    const { controller } = setup({ events });

    controller.tick();

    expect(seen).toHaveBeenCalledWith({ decision: { kind: 'escalated', level: 1 } });
  });

  it('should return copies of the run log', () => {
    const { controller } = setup();
    controller.tick();
    const logs = controller.runLogs;
    logs.push('tampered');
    expect(controller.runLogs).toHaveLength(1);
  });

  describe('run', () => {
    it('should tick until cancelled and then guard the board', async () => {
      const board = new SignalBoard();
      const pool = { levelUp: vi.fn(() => 0) };
      const controller = new EscalationController(board, pool, new RequestCounter(), {
        tickIntervalMs: 10,
        signalWindowMs: 5000,
        levelUpStep: 2,
        disabled: false,
      });
      const abort = new AbortController();
      setTimeout(() => abort.abort(), 60);

      await controller.run(abort.signal);

      expect(controller.currentLevel).toBeGreaterThanOrEqual(1);
      expect(pool.levelUp).toHaveBeenCalledWith(2);
      expect(board.isGuarded).toBe(true);
    });

    it('should not tick when started after cancellation', async () => {
      const { board, pool, controller } = setup();
      const abort = new AbortController();
      abort.abort();

      await controller.run(abort.signal);

      expect(pool.levelUp).not.toHaveBeenCalled();
      expect(board.isGuarded).toBe(true);
      board.reportError(new Error('after shutdown'));
      expect(board.getLastError().error).toBeNull();
    });
  });
});
