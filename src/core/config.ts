import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { BenchConfigSchema, type BenchConfig, type BenchConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: BenchConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir || join(homedir(), '.surgebench');
    this.projectDir = options.projectDir || process.cwd();
    this.env = options.env || process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: BenchConfigInput): BenchConfig {
    let raw: Record<string, unknown> = {};

    raw = this.mergeFile(raw, join(this.globalDir, 'config.yaml'), 'global');
    raw = this.mergeFile(raw, join(this.projectDir, '.surgebench.yaml'), 'project');
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = BenchConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): BenchConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private mergeFile(
    raw: Record<string, unknown>,
    path: string,
    label: string,
  ): Record<string, unknown> {
    if (!existsSync(path)) return raw;

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (isRecord(parsed)) {
      return this.deepMerge(raw, parsed);
    }
    return raw;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const bench = isRecord(raw.bench) ? { ...raw.bench } : {};
    const target = isRecord(raw.target) ? { ...raw.target } : {};

    if (this.env.SURGEBENCH_DURATION_MS) {
      const duration = Number(this.env.SURGEBENCH_DURATION_MS);
      if (!Number.isFinite(duration)) {
        throw new ConfigError(`SURGEBENCH_DURATION_MS is not a number: ${this.env.SURGEBENCH_DURATION_MS}`);
      }
      bench.durationMs = duration;
    }
    if (this.env.SURGEBENCH_NO_LEVELUP) {
      bench.escalationDisabled = ['1', 'true', 'yes'].includes(this.env.SURGEBENCH_NO_LEVELUP.toLowerCase());
    }
    if (this.env.SURGEBENCH_JOB_ID) {
      bench.jobId = this.env.SURGEBENCH_JOB_ID;
    }
    if (this.env.SURGEBENCH_REMOTES) {
      target.remotes = splitList(this.env.SURGEBENCH_REMOTES);
    }

    return { ...raw, bench, target };
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a comma separated list, dropping blanks.
 */
export function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}
