import { TransportInitError, toError } from '../core/errors.js';
import { componentLogger } from '../core/logger.js';

export interface InitializeOptions {
  host: string;
  path: string;
  userAgent: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Ask the target to reset itself before a run. Any transport failure or
 * non-2xx status rejects with TransportInitError.
 */
export async function initializeTarget(options: InitializeOptions): Promise<void> {
  const logger = componentLogger('initialize');
  const doFetch = options.fetchImpl ?? fetch;
  const url = `http://${options.host}${options.path}`;

  logger.info({ url }, 'Requesting initialize');

  let response: Response;
  try {
    response = await doFetch(url, {
      method: 'GET',
      headers: { 'User-Agent': options.userAgent },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    await response.arrayBuffer();
  } catch (err) {
    const error = toError(err);
    throw new TransportInitError(error.message, options.host, error);
  }

  if (!response.ok) {
    throw new TransportInitError(`Unexpected status code: ${response.status}`, options.host);
  }

  logger.info({ url, status: response.status }, 'Initialize done');
}
