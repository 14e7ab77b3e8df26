/**
 * Total head movement over a visit order.
 */
export function seekCost(order: readonly number[]): number {
  let total = 0;
  for (let i = 1; i < order.length; i++) {
    total += Math.abs(order[i] - order[i - 1]);
  }
  return total;
}
