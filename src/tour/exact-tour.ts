/**
 * Exact exponential-time tour using Held–Karp dynamic programming.
 *
 * opt[S][i] is the cheapest path that starts at node 0, visits exactly the
 * nodes of S and ends at i. S always contains node 0, so only odd masks are
 * stored and row `S >>> 1` holds the n terminal costs of S.
 *
 * Time O(2^n · n²), memory O(2^n · n) doubles. At the default ceiling of 20
 * nodes the table takes 2^19 · 20 · 8 bytes ≈ 84 MB; the hard limit of 25
 * takes ≈ 3.4 GB. Larger inputs are rejected before allocating anything.
 */

import { createDeadline } from './cancellation.js';
import { validateCostMatrix } from './validation.js';
import { tourCost } from './tour-cost.js';
import { SolverError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CostMatrix, ExactTourOptions, Tour } from './types.js';

const log = createLogger('exact-tour');

/** Default node ceiling for the exact solver. */
export const DEFAULT_MAX_EXACT_NODES = 20;

/** No configuration may raise the ceiling past this. */
export const MAX_EXACT_NODES_LIMIT = 25;

// Subsets processed between deadline checks
const CHECK_INTERVAL = 1024;

function popcount(mask: number): number {
  let count = 0;
  while (mask !== 0) {
    mask &= mask - 1;
    count++;
  }
  return count;
}

/**
 * Fill the DP table for all subsets containing node 0.
 */
export function buildSubsetTable(n: number, costs: CostMatrix, check: () => void = () => {}): Float64Array {
  const table = new Float64Array((1 << (n - 1)) * n).fill(Infinity);
  const fullMask = (1 << n) - 1;

  for (let s = 1; s <= fullMask; s += 2) {
    if ((s >>> 1) % CHECK_INTERVAL === CHECK_INTERVAL - 1) {
      check();
    }

    const size = popcount(s);
    if (size < 2) continue;
    const row = (s >>> 1) * n;

    for (let i = 1; i < n; i++) {
      if ((s & (1 << i)) === 0) continue;

      if (size === 2) {
        table[row + i] = costs[0][i];
        continue;
      }

      // t is a smaller mask, so its row is already final
      const t = s & ~(1 << i);
      const prevRow = (t >>> 1) * n;
      let best = Infinity;
      for (let j = 1; j < n; j++) {
        if ((t & (1 << j)) === 0) continue;
        const candidate = table[prevRow + j] + costs[j][i];
        if (candidate < best) {
          best = candidate;
        }
      }
      table[row + i] = best;
    }
  }

  return table;
}

/**
 * Cheapest not-yet-placed node to put before `last`, or undefined if no
 * node in `remaining` has a finite table entry.
 */
function selectPredecessor(
  table: Float64Array,
  n: number,
  costs: CostMatrix,
  remaining: number,
  last: number,
): number | undefined {
  const row = (remaining >>> 1) * n;
  let best: number | undefined;
  let bestCost = Infinity;

  for (let k = 1; k < n; k++) {
    if ((remaining & (1 << k)) === 0) continue;
    const candidate = table[row + k] + costs[k][last];
    if (candidate < bestCost) {
      bestCost = candidate;
      best = k;
    }
  }

  return best;
}

/**
 * Rebuild a tour from the filled table, walking backwards from the full set.
 * Ties go to the lowest node id.
 *
 * @throws SolverError INTERNAL_INVARIANT_VIOLATION if a step has no candidate.
 */
export function reconstructTour(table: Float64Array, n: number, costs: CostMatrix): Tour {
  const tour: Tour = [0];
  let remaining = (1 << n) - 1;

  for (let step = 0; step < n - 1; step++) {
    const last = tour[tour.length - 1];
    const next = selectPredecessor(table, n, costs, remaining, last);
    if (next === undefined) {
      throw new SolverError(
        `No predecessor for node ${last} at step ${step} (remaining mask ${remaining.toString(2)})`,
        'INTERNAL_INVARIANT_VIOLATION',
      );
    }
    tour.push(next);
    remaining &= ~(1 << next);
  }

  tour.push(0);
  return tour;
}

/**
 * Minimum-cost tour over all n nodes.
 *
 * @throws InputError if the matrix is malformed.
 * @throws SolverError SUBSET_OVERFLOW when n exceeds the node ceiling,
 *   ABORTED or TIMEOUT when cancelled.
 */
export function exactTour(n: number, costs: CostMatrix, options: ExactTourOptions = {}): Tour {
  validateCostMatrix(n, costs);

  // A non-finite ceiling would disable the overflow check
  const requested = options.maxNodes ?? DEFAULT_MAX_EXACT_NODES;
  const maxNodes = Number.isFinite(requested)
    ? Math.min(requested, MAX_EXACT_NODES_LIMIT)
    : DEFAULT_MAX_EXACT_NODES;
  if (n > maxNodes) {
    throw new SolverError(
      `Exact solver accepts at most ${maxNodes} nodes, got ${n}`,
      'SUBSET_OVERFLOW',
    );
  }

  const check = createDeadline(options);
  const started = Date.now();

  const table = buildSubsetTable(n, costs, check);
  const tour = reconstructTour(table, n, costs);

  log.debug('Exact tour', {
    nodes: n,
    cost: tourCost(costs, tour),
    ms: Date.now() - started,
  });

  return tour;
}
