/**
 * Random request generation with a seeded PRNG, so a run can be repeated.
 */

import { InputError } from '../utils/errors.js';

export interface RandomRequestOptions {
  /** Number of requests to draw. */
  count: number;
  /** Requests are drawn from [0, diskSize). */
  diskSize: number;
  /** Defaults to a time-based seed. */
  seed?: number;
}

/**
 * Deterministic seeded LCG. Returns a function yielding integers in
 * [0, 2^53) built from two 31-bit steps.
 */
function seededRandom(seed: number): () => number {
  let s = seed & 0x7fffffff;
  const step = () => {
    s = (s * 1664525 + 1013904223) & 0x7fffffff;
    return s;
  };
  return () => (step() & 0x3fffff) * 0x80000000 + step();
}

/**
 * Pick `count` distinct values from [0, size) with a partial Fisher-Yates
 * shuffle. Only the swapped positions are stored, so the cost depends on
 * `count` and not on `size`.
 */
function seededSample(size: number, count: number, seed: number): number[] {
  const next = seededRandom(seed);
  const swapped = new Map<number, number>();
  const picked: number[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + (next() % (size - i));
    const atI = swapped.get(i) ?? i;
    picked.push(swapped.get(j) ?? j);
    swapped.set(j, atI);
  }
  return picked;
}

/**
 * Draw `count` distinct cylinders from the disk.
 *
 * @throws InputError (`INVALID_INPUT`) if more requests are asked for than the disk has cylinders
 */
export function generateRandomRequests(options: RandomRequestOptions): number[] {
  const { count, diskSize } = options;
  if (!Number.isInteger(count) || count < 0) {
    throw new InputError(`count must be a non-negative integer, got ${count}`, 'INVALID_INPUT');
  }
  if (!Number.isSafeInteger(diskSize) || diskSize < 1) {
    throw new InputError(`diskSize must be a positive integer, got ${diskSize}`, 'INVALID_INPUT');
  }
  if (count > diskSize) {
    throw new InputError(
      `Cannot draw ${count} distinct requests from a disk of ${diskSize} cylinders`,
      'INVALID_INPUT',
    );
  }

  const seed = options.seed ?? Date.now() & 0x7fffffff;
  return seededSample(diskSize, count, seed);
}
