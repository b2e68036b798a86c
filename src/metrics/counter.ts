/**
 * Request counters — monotonically increasing integer counts keyed by a
 * free-form string such as "GET|/channel/3" or "staticfile-304".
 */

export class RequestCounter {
  private counts = new Map<string, number>();

  increment(key: string, by: number = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Counter increment must be a non-negative integer, got ${by}`);
    }
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  /** Sum of every key starting with `prefix`. */
  sum(prefix: string): number {
    let total = 0;
    for (const [key, count] of this.counts) {
      if (key.startsWith(prefix)) total += count;
    }
    return total;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

export interface CountEntry {
  key: string;
  count: number;
}

export interface CountSummary {
  requests: CountEntry[];
  other: CountEntry[];
}

/**
 * Prefixes folded into a single "<prefix>*" row when summarizing.
 */
export const DEFAULT_SUMMARY_BUCKETS: readonly string[] = [
  'GET|/history/',
  'GET|/message?',
  'GET|/icons/',
  'GET|/channel/',
  'GET|/profile/',
  'SKIP|/icons/',
];

const REQUEST_PREFIXES = ['GET|', 'POST|'];

/**
 * Fold parameterized keys into wildcard buckets, then split request
 * counts from the rest. Both lists are sorted by count, highest first,
 * with ties ordered by key.
 */
export function summarizeCounts(
  snapshot: Record<string, number>,
  buckets: readonly string[] = DEFAULT_SUMMARY_BUCKETS,
): CountSummary {
  const folded = new Map<string, number>();
  for (const [key, count] of Object.entries(snapshot)) {
    const bucket = buckets.find(prefix => key.startsWith(prefix));
    const name = bucket ? `${bucket}*` : key;
    folded.set(name, (folded.get(name) ?? 0) + count);
  }

  const entries = [...folded.entries()]
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || a.key.localeCompare(b.key));

  const isRequest = (key: string) => REQUEST_PREFIXES.some(p => key.startsWith(p));
  return {
    requests: entries.filter(e => isRequest(e.key)),
    other: entries.filter(e => !isRequest(e.key)),
  };
}
