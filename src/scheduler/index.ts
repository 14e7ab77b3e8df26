/**
 * Disk-head scheduling policies.
 */

import { scheduleFcfs } from './fcfs.js';
import { scheduleSstf } from './sstf.js';
import { scheduleScan, scheduleCScan } from './scan.js';
import type { Policy, ScheduleResult } from './types.js';

export * from './types.js';
export { seekCost } from './seek.js';
export { scheduleFcfs } from './fcfs.js';
export { scheduleSstf } from './sstf.js';
export { scheduleScan, scheduleCScan, partitionAroundHead } from './scan.js';
export type { HeadPartition } from './scan.js';

/**
 * Schedule `requests` under the given policy.
 */
export function runPolicy(
  policy: Policy,
  requests: readonly number[],
  head: number,
  diskSize: number,
): ScheduleResult {
  switch (policy) {
    case 'FCFS':
      return scheduleFcfs(requests, head, diskSize);
    case 'SSTF':
      return scheduleSstf(requests, head, diskSize);
    case 'SCAN':
      return scheduleScan(requests, head, diskSize);
    case 'C-SCAN':
      return scheduleCScan(requests, head, diskSize);
  }
}
