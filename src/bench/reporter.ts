/**
 * Bench Reporter — Formats a BenchResult for display and export.
 *
 * Supports an ASCII table for terminals, JSON for the result file and a
 * short summary for CI logs.
 */

import type { BenchResult } from '../core/types.js';
import type { CountSummary } from '../metrics/counter.js';
import { formatDuration } from '../utils/timer.js';

export class BenchReporter {
  /** Format the result (and optional request counts) as a terminal table */
  formatTable(result: BenchResult, counts?: CountSummary): string {
    const lines: string[] = [];
    const sep = '─'.repeat(60);

    lines.push('');
    lines.push(`  surgebench result  (job ${result.jobId})`);
    lines.push(`  Targets: ${result.targets.join(', ')}`);
    lines.push(`  ${result.startTime} → ${result.endTime}  (${formatDuration(this.elapsedMs(result))})`);
    lines.push(`  ${sep}`);
    lines.push(`  ${'Status'.padEnd(12)} ${result.pass ? 'PASS' : 'FAIL'}`);
    lines.push(`  ${'Score'.padEnd(12)} ${result.score}`);
    lines.push(`  ${'Load level'.padEnd(12)} ${result.loadLevel}`);
    lines.push(`  ${'Message'.padEnd(12)} ${result.message}`);

    if (counts) {
      lines.push(`  ${sep}`);
      lines.push('  Request counts:');
      for (const entry of counts.requests) {
        lines.push(`    ${entry.key.padEnd(40)} ${String(entry.count).padStart(8)}`);
      }
      if (counts.other.length > 0) {
        lines.push('  Other counts:');
        for (const entry of counts.other) {
          lines.push(`    ${entry.key.padEnd(40)} ${String(entry.count).padStart(8)}`);
        }
      }
    }

    if (result.errors.length > 0) {
      lines.push(`  ${sep}`);
      lines.push(`  Errors (${result.errors.length}):`);
      for (const error of result.errors) {
        lines.push(`    - ${error}`);
      }
    }

    lines.push('');
    return lines.join('\n');
  }

  /** Format the result as JSON for file export */
  formatJSON(result: BenchResult): string {
    return JSON.stringify(result, null, 2);
  }

  /** One-line summary for CI output */
  formatSummary(result: BenchResult): string {
    const status = result.pass ? 'PASS' : 'FAIL';
    return `[${status}] score=${result.score} level=${result.loadLevel} errors=${result.errors.length} — ${result.message}`;
  }

  private elapsedMs(result: BenchResult): number {
    return Math.max(0, Date.parse(result.endTime) - Date.parse(result.startTime));
  }
}
