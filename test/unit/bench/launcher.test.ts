import { describe, it, expect, vi } from 'vitest';
import { launchBenchmark } from '../../../src/bench/launcher.js';
import { BenchConfigSchema } from '../../../src/core/types.js';
import { httpSmokeScenario } from '../../../src/scenarios/index.js';

function config(durationMs: number) {
  return BenchConfigSchema.parse({
    bench: { durationMs, jobId: 'job-launch' },
    target: { remotes: ['app:8080'], userAgent: 'test-agent' },
    load: { initialWorkers: 2, initialLevelUp: 1, levelUpStep: 1 },
    escalation: { tickIntervalMs: 20 },
    validation: { penaltyMs: 5 },
    scenario: { paths: ['/'] },
  });
}

describe('launchBenchmark', () => {
  it('should initialize the target and score the smoke scenario', async () => {
    const urls: string[] = [];
    const fetchImpl = vi.fn<typeof fetch>(async input => {
      urls.push(String(input));
      await new Promise(resolve => setTimeout(resolve, 1));
      return new Response('ok', { status: 200 });
    });

    const { result, counts } = await launchBenchmark(config(100), httpSmokeScenario, { fetchImpl });

    expect(urls[0]).toBe('http://app:8080/initialize');
    expect(result.pass).toBe(true);
    expect(result.message).toBe('ok');
    const home = counts.requests.find(entry => entry.key === 'GET|/');
    expect(home?.count).toBeGreaterThan(0);
    expect(result.score).toBe(home?.count);
  });

  it('should report a failed initialize request', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('busy', { status: 503 }));

    const { result, counts } = await launchBenchmark(config(100), httpSmokeScenario, { fetchImpl });

    expect(result.pass).toBe(false);
    expect(result.score).toBe(0);
    expect(result.message).toBe('Request to /initialize failed. Unexpected status code: 503');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(counts.requests).toEqual([]);
  });
});
