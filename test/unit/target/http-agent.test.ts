import { describe, it, expect, vi } from 'vitest';
import { HttpAgent, type HttpAgentOptions } from '../../../src/target/http-agent.js';
import { TargetPool } from '../../../src/target/target-pool.js';
import { CheckerError, isFatal } from '../../../src/core/errors.js';
import { RequestCounter } from '../../../src/metrics/counter.js';
import { SignalBoard } from '../../../src/signals/signal-board.js';

function createAgent(fetchImpl: typeof fetch, overrides: Partial<HttpAgentOptions> = {}) {
  const counter = new RequestCounter();
  const board = new SignalBoard(() => 1);
  const agent = new HttpAgent({
    targets: new TargetPool(['app:8080']),
    counter,
    board,
    userAgent: 'test-agent',
    timeoutMs: 1000,
    slowThresholdMs: 1000,
    fetchImpl,
    now: () => 0,
    ...overrides,
  });
  return { agent, counter, board };
}

function respond(status: number, body: string | null = 'ok') {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

describe('HttpAgent', () => {
  it('should fetch from the target with the user agent and count the response', async () => {
    const fetchImpl = respond(200, 'hello');
    const { agent, counter } = createAgent(fetchImpl);

    const res = await agent.get('/channel/1');

    expect(res.status).toBe(200);
    expect(res.body).toBe('hello');
    expect(counter.get('GET|/channel/1')).toBe(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://app:8080/channel/1');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ 'User-Agent': 'test-agent' });
  });

  it('should send POST bodies and accept listed statuses', async () => {
    const fetchImpl = respond(303, null);
    const { agent, counter } = createAgent(fetchImpl);

    const res = await agent.post('/login', {
      body: new URLSearchParams({ name: 'tester' }),
      headers: { 'X-Trace': '1' },
      expectedStatus: [303],
    });

    expect(res.status).toBe(303);
    expect(counter.get('POST|/login')).toBe(1);
    const init = fetchImpl.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'User-Agent': 'test-agent', 'X-Trace': '1' });
    expect(String(init?.body)).toBe('name=tester');
  });

  it('should raise a non-fatal CheckerError for an unexpected status', async () => {
    const { agent, counter, board } = createAgent(respond(500));

    const err = await agent.get('/').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CheckerError);
    expect(err).toMatchObject({ message: 'GET /: unexpected status code 500', fatal: false });
    expect(counter.get('GET|/')).toBe(0);
    expect(board.getLastError().error).toBeNull();
  });

  it('should raise a fatal error when asked to', async () => {
    const { agent } = createAgent(respond(404));

    const err = await agent.get('/profile/1', { fatal: true }).catch((e: unknown) => e);

    expect(isFatal(err)).toBe(true);
  });

  it('should wrap transport failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const { agent } = createAgent(fetchImpl);

    await expect(agent.get('/fetch')).rejects.toThrow('GET /fetch: request failed (fetch failed)');
  });

  it('should time out slow requests', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const { agent } = createAgent(fetchImpl, { timeoutMs: 10 });

    await expect(agent.get('/history/1')).rejects.toThrow('GET /history/1: request failed (timed out)');
  });

  it('should abort with the caller signal', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('cancelled by run')));
        }),
    );
    const { agent } = createAgent(fetchImpl);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    await expect(agent.get('/', { signal: controller.signal })).rejects.toThrow(
      'GET /: request failed (cancelled by run)',
    );
  });

  it('should abort at once for a caller signal that is already aborted', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          if (init?.signal?.aborted) {
            reject(new Error('cancelled by run'));
            return;
          }
          init?.signal?.addEventListener('abort', () => reject(new Error('cancelled by run')));
        }),
    );
    const { agent } = createAgent(fetchImpl, { timeoutMs: 10_000 });
    const controller = new AbortController();
    controller.abort();

    const started = Date.now();
    await expect(agent.get('/', { signal: controller.signal })).rejects.toThrow(
      'GET /: request failed (cancelled by run)',
    );
    expect(Date.now() - started).toBeLessThan(1000);
    expect(fetchImpl.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });

  it('should report responses slower than the threshold', async () => {
    const ticks = [0, 1500];
    const { agent, board, counter } = createAgent(respond(200), { now: () => ticks.shift() ?? 0 });

    const res = await agent.get('/icons/a.png');

    expect(res.durationMs).toBe(1500);
    expect(board.getLastSlowPath()).toEqual({ path: '/icons/a.png', observedAt: 1 });
    expect(counter.get('GET|/icons/a.png')).toBe(1);
  });

  it('should not report fast responses', async () => {
    const { agent, board } = createAgent(respond(200));
    await agent.get('/');
    expect(board.getLastSlowPath().path).toBeNull();
  });
});
