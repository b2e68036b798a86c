import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, splitList } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let root: string;
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'surgebench-config-'));
    globalDir = join(root, 'global');
    projectDir = join(root, 'project');
    mkdirSync(globalDir);
    mkdirSync(projectDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should return defaults when nothing is configured', () => {
    const config = new ConfigManager({ globalDir, projectDir, env: {} }).load();

    expect(config.bench.durationMs).toBe(60_000);
    expect(config.bench.preTestOnly).toBe(false);
    expect(config.bench.escalationDisabled).toBe(false);
    expect(config.target.remotes).toEqual(['localhost:8080']);
    expect(config.load).toEqual({ initialWorkers: 10, initialLevelUp: 1, levelUpStep: 5 });
    expect(config.escalation).toEqual({ tickIntervalMs: 1000, signalWindowMs: 5000 });
    expect(config.validation.penaltyMs).toBe(500);
  });

  it('should let the project file override the global file', () => {
    writeFileSync(join(globalDir, 'config.yaml'), 'bench:\n  durationMs: 30000\ntarget:\n  userAgent: global-agent\n');
    writeFileSync(join(projectDir, '.surgebench.yaml'), 'bench:\n  durationMs: 45000\n');

    const config = new ConfigManager({ globalDir, projectDir, env: {} }).load();

    expect(config.bench.durationMs).toBe(45_000);
    expect(config.target.userAgent).toBe('global-agent');
  });

  it('should apply environment variables over files', () => {
    writeFileSync(join(projectDir, '.surgebench.yaml'), 'bench:\n  durationMs: 45000\n');

    const config = new ConfigManager({
      globalDir,
      projectDir,
      env: {
        SURGEBENCH_DURATION_MS: '2000',
        SURGEBENCH_REMOTES: 'a:1, b:2',
        SURGEBENCH_NO_LEVELUP: 'true',
        SURGEBENCH_JOB_ID: 'job-7',
      },
    }).load();

    expect(config.bench.durationMs).toBe(2000);
    expect(config.bench.escalationDisabled).toBe(true);
    expect(config.bench.jobId).toBe('job-7');
    expect(config.target.remotes).toEqual(['a:1', 'b:2']);
  });

  it('should apply overrides last and ignore undefined fields', () => {
    const config = new ConfigManager({ globalDir, projectDir, env: { SURGEBENCH_DURATION_MS: '2000' } }).load({
      bench: { durationMs: 5000, jobId: undefined },
      load: { initialWorkers: 3 },
    });

    expect(config.bench.durationMs).toBe(5000);
    expect(config.bench.jobId).toBeUndefined();
    expect(config.load.initialWorkers).toBe(3);
    expect(config.load.levelUpStep).toBe(5);
  });

  it('should reject invalid values with a ConfigError naming the field', () => {
    const manager = new ConfigManager({ globalDir, projectDir, env: {} });

    expect(() => manager.load({ load: { initialWorkers: 0 } })).toThrow(ConfigError);
    expect(() => manager.load({ load: { initialWorkers: 0 } })).toThrow(/load\.initialWorkers/);
  });

  it('should reject a non-numeric duration from the environment', () => {
    const manager = new ConfigManager({ globalDir, projectDir, env: { SURGEBENCH_DURATION_MS: 'soon' } });
    expect(() => manager.load()).toThrow('SURGEBENCH_DURATION_MS is not a number: soon');
  });

  it('should wrap YAML parse failures', () => {
    writeFileSync(join(projectDir, '.surgebench.yaml'), 'bench: [unclosed\n');
    const manager = new ConfigManager({ globalDir, projectDir, env: {} });
    expect(() => manager.load()).toThrow(/Failed to parse project config/);
  });

  it('should cache the loaded config in get()', () => {
    const manager = new ConfigManager({ globalDir, projectDir, env: {} });
    const loaded = manager.load({ bench: { durationMs: 1234 } });
    expect(manager.get()).toBe(loaded);
  });
});

describe('splitList', () => {
  it('should trim entries and drop blanks', () => {
    expect(splitList(' a:1 ,, b:2 ,')).toEqual(['a:1', 'b:2']);
  });
});
