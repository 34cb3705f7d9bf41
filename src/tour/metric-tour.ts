/**
 * 2-approximation for the metric traveling salesman problem.
 * Expects symmetric costs that respect the triangle inequality.
 */

import { buildSpanningTree } from './spanning-tree.js';
import { createDeadline } from './cancellation.js';
import { validateCostMatrix } from './validation.js';
import { SolverError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CostMatrix, SolveOptions, SpanningTree, Tour } from './types.js';
import { tourCost } from './tour-cost.js';

const log = createLogger('metric-tour');

/**
 * Adjacency lists of the tree subgraph. Neighbours appear in the order the
 * tree edges were selected.
 */
export function buildAdjacency(n: number, tree: SpanningTree): number[][] {
  const adjacency: number[][] = Array.from({ length: n }, () => []);
  for (const { head, tail } of tree.edges) {
    adjacency[head].push(tail);
    adjacency[tail].push(head);
  }
  return adjacency;
}

/**
 * Walk the Euler tour of the tree from node 0, skipping nodes already seen.
 *
 * @throws SolverError INTERNAL_INVARIANT_VIOLATION if the lists do not span all n nodes.
 */
export function shortcutWalk(n: number, adjacency: number[][]): Tour {
  const tour: Tour = [];
  const visited = new Array<boolean>(n).fill(false);
  const open: number[] = [0];

  while (tour.length < n) {
    const u = open.pop();
    if (u === undefined) {
      throw new SolverError(
        `Tree walk reached ${tour.length} of ${n} nodes`,
        'INTERNAL_INVARIANT_VIOLATION',
      );
    }
    if (visited[u]) continue;

    visited[u] = true;
    tour.push(u);
    for (const v of adjacency[u]) {
      open.push(v);
    }
  }

  tour.push(0);
  return tour;
}

/**
 * Tour whose cost is at most twice the optimum for metric inputs.
 *
 * Builds the minimum spanning tree, then shortcuts a depth-first walk of it.
 * Costs must be finite; metricity is not checked.
 *
 * @throws InputError if the matrix is malformed.
 */
export function approximateTour(n: number, costs: CostMatrix, options: SolveOptions = {}): Tour {
  validateCostMatrix(n, costs);
  const check = createDeadline(options);

  const started = Date.now();
  const tree = buildSpanningTree(n, costs, options);
  check();

  const tour = shortcutWalk(n, buildAdjacency(n, tree));

  log.debug('Approximate tour', {
    nodes: n,
    treeCost: tree.totalCost,
    cost: tourCost(costs, tour),
    ms: Date.now() - started,
  });

  return tour;
}
