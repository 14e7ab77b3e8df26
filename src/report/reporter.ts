/**
 * Report generation for scheduling comparisons.
 *
 * Produces Markdown, JSON and CSV from a comparison result, plus the
 * plain-text summary printed for a single-policy run.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { POLICIES, type Policy, type ScheduleResult } from '../scheduler/index.js';
import type { SeekMetrics } from '../metrics/seek-metrics.js';
import {
  bestPolicy,
  comparisonRows,
  type ComparisonEntry,
  type ComparisonResult,
} from '../compare/aggregator.js';

type FailedEntry = Extract<ComparisonEntry, { status: 'error' }>;

export const CSV_FILENAME = 'disk_scheduling_results.csv';

const CSV_HEADER = [
  'Algorithm',
  'Total Seek Time',
  'Average Seek Time',
  'Throughput (req/unit time)',
];

function csvCell(value: number | null): string {
  return value === null ? '' : String(value);
}

/**
 * Export the comparison table as CSV. Failed metrics are left empty.
 */
export function exportComparisonCsv(result: ComparisonResult): string {
  const lines = [CSV_HEADER.join(',')];
  for (const row of comparisonRows(result)) {
    lines.push(
      [row.policy, csvCell(row.totalSeek), csvCell(row.average), csvCell(row.throughput)].join(','),
    );
  }
  return lines.join('\n') + '\n';
}

function fixed(value: number | null, digits: number): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

/**
 * Format the visit order as the head moves, e.g. `50 → 82 → 170`.
 */
export function formatOrder(order: readonly number[]): string {
  return order.join(' → ');
}

/**
 * Generate a Markdown report from a comparison.
 */
export function generateMarkdownReport(result: ComparisonResult): string {
  const { input } = result;
  const lines: string[] = [];

  lines.push('# Disk Scheduling Comparison');
  lines.push('');
  lines.push('| Input | Value |');
  lines.push('|-------|-------|');
  lines.push(`| Requests | ${input.requests.join(', ')} |`);
  lines.push(`| Head | ${input.head} |`);
  lines.push(`| Disk size | ${input.diskSize} cylinders |`);
  lines.push('');

  lines.push('## Performance');
  lines.push('');
  lines.push('| Algorithm | Total Seek Time | Avg Seek Time | Throughput |');
  lines.push('|-----------|-----------------|---------------|------------|');
  for (const row of comparisonRows(result)) {
    lines.push(
      `| ${row.policy} | ${row.totalSeek ?? 'n/a'} | ${fixed(row.average, 2)} | ${fixed(row.throughput, 4)} |`,
    );
  }
  lines.push('');

  const best = bestPolicy(result);
  if (best) {
    lines.push(`**Lowest total seek:** ${best} (${result.entries[best].totalSeek ?? 0})`);
    lines.push('');
  }

  lines.push('## Head Movement');
  lines.push('');
  for (const policy of POLICIES) {
    const entry = result.entries[policy];
    if (entry.order) {
      lines.push(`- **${policy}**: ${formatOrder(entry.order)}`);
    }
  }
  lines.push('');

  const failed = POLICIES.map((p) => result.entries[p]).filter(
    (e): e is FailedEntry => e.status === 'error',
  );
  if (failed.length > 0) {
    lines.push('## Errors');
    lines.push('');
    for (const entry of failed) {
      lines.push(`- **${entry.policy}** [${entry.error.code}]: ${entry.error.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Plain-text summary of one policy run.
 *
 * `metrics` is null when they could not be derived (no requests).
 */
export function formatScheduleSummary(
  policy: Policy,
  result: ScheduleResult,
  metrics: SeekMetrics | null,
): string {
  const lines = [
    `Algorithm: ${policy}`,
    `Sequence: ${formatOrder(result.order)}`,
    `Total Seek Time: ${result.totalSeek}`,
    `Average Seek Time: ${fixed(metrics?.average ?? null, 2)}`,
    `Throughput: ${fixed(metrics?.throughput ?? null, 4)} requests/unit`,
  ];
  return lines.join('\n');
}

/**
 * Write Markdown, JSON and CSV reports to a directory.
 */
export async function writeReports(
  result: ComparisonResult,
  outputDir: string,
): Promise<{ markdownPath: string; jsonPath: string; csvPath: string }> {
  await mkdir(outputDir, { recursive: true });

  const markdownPath = join(outputDir, 'report.md');
  const jsonPath = join(outputDir, 'report.json');
  const csvPath = join(outputDir, CSV_FILENAME);

  await writeFile(markdownPath, generateMarkdownReport(result));
  await writeFile(jsonPath, JSON.stringify(result, null, 2));
  await writeFile(csvPath, exportComparisonCsv(result));

  return { markdownPath, jsonPath, csvPath };
}
