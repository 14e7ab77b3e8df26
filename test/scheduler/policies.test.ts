/**
 * Tests for the four scheduling policies.
 */

import { describe, it, expect } from 'vitest';
import {
  scheduleFcfs,
  scheduleSstf,
  scheduleScan,
  scheduleCScan,
  partitionAroundHead,
  seekCost,
} from '../../src/scheduler/index.js';
import type { ScheduleResult } from '../../src/scheduler/index.js';

const REQUESTS = [82, 170, 43, 140, 24, 16, 190];
const HEAD = 50;
const DISK_SIZE = 200;

/** Independent recomputation of the seek total. */
function travelled(order: number[]): number {
  return order.slice(1).reduce((sum, cyl, i) => sum + Math.abs(cyl - order[i]), 0);
}

function sorted(values: number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Drop the head and any boundary visits a sweep inserted. */
function serviced(result: ScheduleResult, boundaries: number[]): number[] {
  const rest = result.order.slice(1);
  for (const boundary of boundaries) {
    rest.splice(rest.indexOf(boundary), 1);
  }
  return rest;
}

describe('seekCost', () => {
  it('sums absolute distances between consecutive cylinders', () => {
    expect(seekCost([50, 82, 43])).toBe(32 + 39);
  });

  it('is 0 for a single position', () => {
    expect(seekCost([50])).toBe(0);
  });
});

describe('FCFS', () => {
  it('services requests in arrival order', () => {
    const result = scheduleFcfs(REQUESTS, HEAD, DISK_SIZE);

    expect(result.order).toEqual([50, 82, 170, 43, 140, 24, 16, 190]);
    expect(result.totalSeek).toBe(642);
  });

  it('keeps duplicates in place', () => {
    const result = scheduleFcfs([30, 10, 30], 20);

    expect(result.order).toEqual([20, 30, 10, 30]);
    expect(result.totalSeek).toBe(10 + 20 + 20);
  });
});

describe('SSTF', () => {
  it('greedily picks the nearest pending request', () => {
    const result = scheduleSstf(REQUESTS, HEAD, DISK_SIZE);

    expect(result.order).toEqual([50, 43, 24, 16, 82, 140, 170, 190]);
    expect(result.totalSeek).toBe(208);
  });

  it('breaks distance ties in favour of the earlier request', () => {
    expect(scheduleSstf([40, 60], 50).order).toEqual([50, 40, 60]);
    expect(scheduleSstf([60, 40], 50).order).toEqual([50, 60, 40]);
  });

  it('services each duplicate exactly once', () => {
    const result = scheduleSstf([30, 70, 30], 50);

    expect(result.order).toEqual([50, 30, 30, 70]);
    expect(result.totalSeek).toBe(20 + 0 + 40);
  });

  it('does not modify the caller array', () => {
    const requests = [82, 170, 43];
    scheduleSstf(requests, HEAD);

    expect(requests).toEqual([82, 170, 43]);
  });
});

describe('partitionAroundHead', () => {
  it('splits strictly below the head from at-or-above, both ascending', () => {
    expect(partitionAroundHead([82, 50, 43, 16, 190], 50)).toEqual({
      left: [16, 43],
      right: [50, 82, 190],
    });
  });
});

describe('SCAN', () => {
  it('sweeps up to the last cylinder, then back down', () => {
    const result = scheduleScan(REQUESTS, HEAD, DISK_SIZE);

    expect(result.order).toEqual([50, 82, 140, 170, 190, 199, 43, 24, 16]);
    expect(result.totalSeek).toBe(332);
  });

  it('still touches the boundary when nothing is above the head', () => {
    const result = scheduleScan([10, 20], 50, 100);

    expect(result.order).toEqual([50, 99, 20, 10]);
    expect(result.totalSeek).toBe(49 + 79 + 10);
  });

  it('adds its boundary visit even when a request sits on the last cylinder', () => {
    const result = scheduleScan([199, 10], 50, DISK_SIZE);

    expect(result.order).toEqual([50, 199, 199, 10]);
    expect(result.totalSeek).toBe(149 + 0 + 189);
  });

  it('accepts a head beyond the disk', () => {
    const result = scheduleScan([10, 20], 250, DISK_SIZE);

    expect(result.order).toEqual([250, 199, 20, 10]);
    expect(result.totalSeek).toBe(51 + 179 + 10);
  });
});

describe('C-SCAN', () => {
  it('sweeps up, jumps to cylinder 0 and continues upward', () => {
    const result = scheduleCScan(REQUESTS, HEAD, DISK_SIZE);

    expect(result.order).toEqual([50, 82, 140, 170, 190, 199, 0, 16, 24, 43]);
    expect(result.totalSeek).toBe(391);
  });

  it('visits both boundaries even when nothing is below the head', () => {
    const result = scheduleCScan([60, 80], 50, 100);

    expect(result.order).toEqual([50, 60, 80, 99, 0]);
    expect(result.totalSeek).toBe(10 + 20 + 19 + 99);
  });

  it('services low requests in ascending order after the jump', () => {
    const result = scheduleCScan([20, 10, 30], 50, 100);

    expect(result.order).toEqual([50, 99, 0, 10, 20, 30]);
    expect(result.totalSeek).toBe(49 + 99 + 10 + 10 + 10);
  });
});

describe('shared properties', () => {
  const cases: Array<{
    name: string;
    run: (requests: readonly number[], head: number, diskSize: number) => ScheduleResult;
    boundaries: number[];
  }> = [
    { name: 'FCFS', run: scheduleFcfs, boundaries: [] },
    { name: 'SSTF', run: scheduleSstf, boundaries: [] },
    { name: 'SCAN', run: scheduleScan, boundaries: [DISK_SIZE - 1] },
    { name: 'C-SCAN', run: scheduleCScan, boundaries: [DISK_SIZE - 1, 0] },
  ];
  const inputs = [REQUESTS, [5, 5, 5], [0, 199, 100, 100, 42], [50]];

  for (const { name, run, boundaries } of cases) {
    describe(name, () => {
      it('starts at the head and services every request exactly once', () => {
        for (const requests of inputs) {
          const result = run(requests, HEAD, DISK_SIZE);

          expect(result.order[0]).toBe(HEAD);
          expect(result.order).toHaveLength(requests.length + 1 + boundaries.length);
          expect(sorted(serviced(result, boundaries))).toEqual(sorted(requests));
        }
      });

      it('reports the distance actually travelled', () => {
        for (const requests of inputs) {
          const result = run(requests, HEAD, DISK_SIZE);
          expect(result.totalSeek).toBe(travelled(result.order));
        }
      });

      it('returns only the head for an empty request list', () => {
        expect(run([], HEAD, DISK_SIZE)).toEqual({ order: [HEAD], totalSeek: 0 });
      });

      it('leaves a frozen input untouched', () => {
        const requests = Object.freeze([82, 170, 43]);
        expect(() => run(requests, HEAD, DISK_SIZE)).not.toThrow();
        expect(requests).toEqual([82, 170, 43]);
      });
    });
  }

  it('costs nothing to service a single request at the head under FCFS and SSTF', () => {
    expect(scheduleFcfs([50], 50)).toEqual({ order: [50, 50], totalSeek: 0 });
    expect(scheduleSstf([50], 50)).toEqual({ order: [50, 50], totalSeek: 0 });
  });
});
