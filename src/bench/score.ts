import type { RequestCounter } from '../metrics/counter.js';
import type { ScoreInputs } from '../core/types.js';

export const SCORE_KEYS = {
  get: 'GET|/',
  fetch: 'GET|/fetch',
  post: 'POST|/',
  message: 'get-message-count',
  notModified: 'staticfile-304',
} as const;

export function readScoreInputs(counter: RequestCounter): ScoreInputs {
  return {
    getCount: counter.sum(SCORE_KEYS.get),
    fetchCount: counter.sum(SCORE_KEYS.fetch),
    postCount: counter.sum(SCORE_KEYS.post),
    messageCount: counter.sum(SCORE_KEYS.message),
    notModifiedCount: counter.get(SCORE_KEYS.notModified),
  };
}

/**
 * GET requests earn 1 point except polling fetches and 304 static files,
 * POSTs earn 3, retrieved messages 1 each, and every hundred 304s earn 1.
 */
export function computeScore(inputs: ScoreInputs): number {
  const { getCount, fetchCount, notModifiedCount, postCount, messageCount } = inputs;
  return (
    1 * (getCount - fetchCount - notModifiedCount) +
    3 * postCount +
    1 * messageCount +
    Math.floor(notModifiedCount / 100)
  );
}
