/**
 * HttpAgent — fetch wrapper for scenario operations.
 *
 * Counts every response with an expected status under "METHOD|path",
 * reports responses slower than the threshold to the signal board and
 * turns transport failures or unexpected statuses into CheckerErrors.
 * Reporting errors to the board is left to whoever runs the operation.
 */

import { CheckerError, fatalError, validationError, toError } from '../core/errors.js';
import type { RequestCounter } from '../metrics/counter.js';
import type { SignalBoard } from '../signals/signal-board.js';
import type { TargetPool } from './target-pool.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

export interface HttpAgentOptions {
  targets: TargetPool;
  counter: RequestCounter;
  board: SignalBoard;
  userAgent: string;
  timeoutMs: number;
  slowThresholdMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export interface AgentRequest {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  /** Statuses accepted as success. Defaults to any 2xx. */
  expectedStatus?: readonly number[];
  /** Raise unexpected statuses as fatal errors. */
  fatal?: boolean;
  signal?: AbortSignal;
}

export interface AgentResponse {
  status: number;
  headers: Headers;
  body: string;
  durationMs: number;
}

export class HttpAgent {
  private doFetch: typeof fetch;
  private now: () => number;

  constructor(private readonly options: HttpAgentOptions) {
    this.doFetch = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => performance.now());
  }

  async request(path: string, request: AgentRequest = {}): Promise<AgentResponse> {
    const method = request.method ?? 'GET';
    const label = `${method} ${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const started = this.now();
    let status: number;
    let headers: Headers;
    let body: string;
    try {
      const response = await this.doFetch(this.options.targets.url(path), {
        method,
        headers: { 'User-Agent': this.options.userAgent, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      status = response.status;
      headers = response.headers;
      body = await response.text();
    } catch (err) {
      const cause = toError(err);
      const reason = controller.signal.aborted && !request.signal?.aborted ? 'timed out' : cause.message;
      throw new CheckerError(`${label}: request failed (${reason})`, false, cause);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', forwardAbort);
    }

    const durationMs = this.now() - started;
    if (durationMs > this.options.slowThresholdMs) {
      this.options.board.reportSlowPath(path);
    }

    const expected = request.expectedStatus;
    const accepted = expected ? expected.includes(status) : status >= 200 && status < 300;
    if (!accepted) {
      const message = `${label}: unexpected status code ${status}`;
      throw request.fatal ? fatalError(message) : validationError(message);
    }

    this.options.counter.increment(`${method}|${path}`);
    return { status, headers, body, durationMs };
  }

  get(path: string, request: Omit<AgentRequest, 'method'> = {}): Promise<AgentResponse> {
    return this.request(path, { ...request, method: 'GET' });
  }

  post(path: string, request: Omit<AgentRequest, 'method'> = {}): Promise<AgentResponse> {
    return this.request(path, { ...request, method: 'POST' });
  }
}
