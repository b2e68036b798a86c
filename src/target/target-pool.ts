import { defaultRandom, randomIndex, type RandomSource } from '../utils/random.js';

/**
 * The set of host:port targets under test. Each request goes to a host
 * picked at random.
 */
export class TargetPool {
  private readonly hosts: readonly string[];

  constructor(hosts: readonly string[], private readonly random: RandomSource = defaultRandom) {
    const cleaned = hosts.map(h => h.trim()).filter(h => h.length > 0);
    if (cleaned.length === 0) {
      throw new RangeError('At least one target host is required');
    }
    this.hosts = cleaned;
  }

  pick(): string {
    return this.hosts[randomIndex(this.hosts.length, this.random)];
  }

  url(path: string, host: string = this.pick()): string {
    return `http://${host}${path}`;
  }

  get all(): readonly string[] {
    return this.hosts;
  }
}
