/**
 * Tour evaluation helpers.
 */

import type { CostMatrix, Tour } from './types.js';

/**
 * Total cost of walking the tour leg by leg.
 */
export function tourCost(costs: CostMatrix, tour: Tour): number {
  let total = 0;
  for (let i = 1; i < tour.length; i++) {
    total += costs[tour[i - 1]][tour[i]];
  }
  return total;
}

/**
 * Whether `tour` is a closed tour over n nodes: n+1 entries, 0 at both
 * ends, and every other node exactly once in between.
 */
export function isValidTour(n: number, tour: Tour): boolean {
  if (tour.length !== n + 1 || tour[0] !== 0 || tour[n] !== 0) {
    return false;
  }

  const seen = new Array<boolean>(n).fill(false);
  seen[0] = true;
  for (let i = 1; i < n; i++) {
    const node = tour[i];
    if (!Number.isInteger(node) || node <= 0 || node >= n || seen[node]) {
      return false;
    }
    seen[node] = true;
  }
  return true;
}
