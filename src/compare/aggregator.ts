/**
 * Side-by-side comparison of every scheduling policy over one input.
 *
 * Each policy is scheduled and measured on its own. When deriving metrics
 * fails for a policy (an empty request list), that entry carries the error
 * while the others are still returned.
 */

import { POLICIES, runPolicy, type Policy, type ScheduleResult } from '../scheduler/index.js';
import { computeMetrics, type SeekMetrics } from '../metrics/seek-metrics.js';
import { wrapError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('compare');

export interface ComparisonInput {
  requests: readonly number[];
  head: number;
  diskSize: number;
}

export interface EntryError {
  code: string;
  message: string;
}

export type ComparisonEntry =
  | {
      status: 'ok';
      policy: Policy;
      order: number[];
      totalSeek: number;
      metrics: SeekMetrics;
    }
  | {
      status: 'error';
      policy: Policy;
      /** Present when scheduling succeeded and only the metrics failed. */
      order: number[] | null;
      totalSeek: number | null;
      error: EntryError;
    };

export interface ComparisonResult {
  input: ComparisonInput;
  entries: Record<Policy, ComparisonEntry>;
}

/** One line of the comparison table. */
export interface ComparisonRow {
  policy: Policy;
  totalSeek: number | null;
  average: number | null;
  throughput: number | null;
}

function evaluatePolicy(policy: Policy, input: ComparisonInput): ComparisonEntry {
  let schedule: ScheduleResult | null = null;
  try {
    schedule = runPolicy(policy, input.requests, input.head, input.diskSize);
    const metrics = computeMetrics(schedule, input.requests.length);
    return { status: 'ok', policy, order: schedule.order, totalSeek: schedule.totalSeek, metrics };
  } catch (error) {
    const wrapped = wrapError(error);
    log.warn(`${policy} failed`, { code: wrapped.code, message: wrapped.message });
    return {
      status: 'error',
      policy,
      order: schedule?.order ?? null,
      totalSeek: schedule?.totalSeek ?? null,
      error: { code: wrapped.code, message: wrapped.message },
    };
  }
}

/**
 * Run all four policies over the same requests, head and disk size.
 *
 * The caller's request list is shared read-only between the policies.
 */
export function compareAll(
  requests: readonly number[],
  head: number,
  diskSize: number,
): ComparisonResult {
  const input: ComparisonInput = { requests: [...requests], head, diskSize };

  const entries: Record<Policy, ComparisonEntry> = {
    FCFS: evaluatePolicy('FCFS', input),
    SSTF: evaluatePolicy('SSTF', input),
    SCAN: evaluatePolicy('SCAN', input),
    'C-SCAN': evaluatePolicy('C-SCAN', input),
  };

  log.debug('Comparison complete', { requests: requests.length, head, diskSize });
  return { input, entries };
}

/**
 * Flatten a comparison into table rows, in policy display order.
 */
export function comparisonRows(result: ComparisonResult): ComparisonRow[] {
  return POLICIES.map((policy) => {
    const entry = result.entries[policy];
    if (entry.status === 'ok') {
      return {
        policy,
        totalSeek: entry.totalSeek,
        average: entry.metrics.average,
        throughput: entry.metrics.throughput,
      };
    }
    return { policy, totalSeek: entry.totalSeek, average: null, throughput: null };
  });
}

/**
 * Policy with the lowest total seek. Ties keep display order.
 * Returns null when no policy produced a seek total.
 */
export function bestPolicy(result: ComparisonResult): Policy | null {
  let best: Policy | null = null;
  let bestSeek = Number.POSITIVE_INFINITY;
  for (const policy of POLICIES) {
    const seek = result.entries[policy].totalSeek;
    if (seek !== null && seek < bestSeek) {
      best = policy;
      bestSeek = seek;
    }
  }
  return best;
}
