/**
 * Types shared by the scheduling policies.
 */

/** The four supported disk-head scheduling policies, in display order. */
export const POLICIES = ['FCFS', 'SSTF', 'SCAN', 'C-SCAN'] as const;

export type Policy = (typeof POLICIES)[number];

/** Outcome of scheduling one request set under one policy. */
export interface ScheduleResult {
  /** Cylinders in service order, starting with the head position. */
  order: number[];
  /** Sum of absolute distances between consecutive entries of `order`. */
  totalSeek: number;
}

/**
 * Narrow an arbitrary string (CLI flag, request body) to a policy name.
 */
export function isPolicy(value: unknown): value is Policy {
  return POLICIES.some((policy) => policy === value);
}
