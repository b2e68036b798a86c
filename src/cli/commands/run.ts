/**
 * `surgebench run` — initialize the target, gate on the checks, then
 * load it until the deadline and print the score.
 */

import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigManager, splitList } from '../../core/config.js';
import { EventBus } from '../../core/events.js';
import { createLogger, getLogDir, setLogger } from '../../core/logger.js';
import type { BenchConfigInput } from '../../core/types.js';
import { launchBenchmark } from '../../bench/launcher.js';
import { PRETEST_PASSED_MESSAGE } from '../../bench/orchestrator.js';
import { BenchReporter } from '../../bench/reporter.js';
import { loadScenario } from '../../scenarios/index.js';
import { formatDuration, parseDuration } from '../../utils/timer.js';
import { VERSION } from '../../version.js';

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a timed load test against the target')
    .option('-d, --dir <directory>', 'Project directory holding .surgebench.yaml', '.')
    .option('--duration <duration>', 'Benchmark duration, e.g. 60s or 1m', parseDurationOption)
    .option('--remotes <list>', 'Comma separated host:port targets', splitList)
    .option('--scenario <name|path>', 'Built-in scenario name or module path')
    .option('--paths <list>', 'Paths exercised by the http-smoke scenario', splitList)
    .option('--test', 'Run the pre-test checks only')
    .option('--no-levelup', 'Never increase the load level')
    .option('--output <path>', 'Write the result JSON to this file')
    .option('--jobid <id>', 'Job id recorded in the result')
    .option('--json', 'Print the result as JSON')
    .option('-v, --verbose', 'Pretty debug logs on stderr instead of the log file')
    .action(async (options: RunOptions) => {
      await executeRun(options);
    });

  return cmd;
}

export interface RunOptions {
  dir: string;
  duration?: number;
  remotes?: string[];
  scenario?: string;
  paths?: string[];
  test?: boolean;
  levelup: boolean;
  output?: string;
  jobid?: string;
  json?: boolean;
  verbose?: boolean;
}

export function parseDurationOption(value: string): number {
  const ms = parseDuration(value);
  if (ms === null || ms <= 0) {
    throw new InvalidArgumentError(`Not a duration: ${value}`);
  }
  return ms;
}

export function toOverrides(options: RunOptions): BenchConfigInput {
  return {
    bench: {
      durationMs: options.duration,
      preTestOnly: options.test ? true : undefined,
      escalationDisabled: options.levelup === false ? true : undefined,
      jobId: options.jobid,
    },
    target: { remotes: options.remotes },
    scenario: { name: options.scenario, paths: options.paths },
    report: { outputPath: options.output },
  };
}

async function executeRun(options: RunOptions): Promise<void> {
  const projectDir = resolve(options.dir);
  setLogger(createLogger('surgebench', options.verbose ?? false));

  const config = new ConfigManager({ projectDir }).load(toOverrides(options));
  const scenario = await loadScenario(config.scenario.name, projectDir);
  const reporter = new BenchReporter();
  const events = new EventBus();

  if (!options.json) {
    console.log();
    console.log(`  surgebench v${VERSION}`);
    console.log(`  Scenario: ${scenario.name}  |  Targets: ${config.target.remotes.join(', ')}`);
    console.log(`  Duration: ${formatDuration(config.bench.durationMs)}${config.bench.escalationDisabled ? '  |  level-up disabled' : ''}`);
    if (!options.verbose) console.log(`  Logs: ${getLogDir()}`);
    console.log();

    events.on('bench:phase', ({ phase }) => {
      const labels: Record<string, string> = {
        initialize: 'Initializing target...',
        pretest: 'Running pre-test checks...',
        load: 'Applying load...',
        score: 'Computing score...',
      };
      const label = labels[phase];
      if (label) console.log(`  ${label}`);
    });
    events.on('escalation:decision', ({ decision }) => {
      if (decision.kind === 'escalated') {
        console.log(`    load level → ${decision.level}`);
      }
    });
  }

  const { result, counts } = await launchBenchmark(config, scenario, { events });

  if (options.json) {
    console.log(reporter.formatJSON(result));
  } else {
    console.log(reporter.formatTable(result, counts));
    console.log(`  ${reporter.formatSummary(result)}\n`);
  }

  if (config.report.outputPath) {
    writeFileSync(config.report.outputPath, reporter.formatJSON(result), 'utf-8');
    if (!options.json) console.log(`  Result saved to: ${config.report.outputPath}\n`);
  }

  const ok = result.pass || (config.bench.preTestOnly && result.message === PRETEST_PASSED_MESSAGE);
  process.exitCode = ok ? 0 : 1;
}
