/**
 * Minimum Spanning Tree construction using Kruskal's algorithm.
 * Expects symmetric costs (an undirected graph).
 */

import { UnionFind } from './union-find.js';
import { createDeadline } from './cancellation.js';
import { validateCostMatrix } from './validation.js';
import { GraphError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { CostMatrix, SolveOptions, SpanningTree, TourEdge } from './types.js';

const log = createLogger('spanning-tree');

// Scan iterations between deadline checks
const CHECK_INTERVAL = 4096;

/**
 * Enumerate the n(n-1)/2 edges of the complete graph, row-major over i < j.
 * Infinite costs are left out.
 */
export function enumerateEdges(n: number, costs: CostMatrix): TourEdge[] {
  const edges: TourEdge[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (Number.isFinite(costs[i][j])) {
        edges.push({ head: i, tail: j, cost: costs[i][j] });
      }
    }
  }
  return edges;
}

/**
 * Sort edges ascending by cost. Equal costs keep enumeration order, which is
 * also lexicographic (head, tail) order.
 */
export function sortEdges(edges: TourEdge[]): TourEdge[] {
  const indexed = edges.map((edge, index) => ({ edge, index }));
  indexed.sort((a, b) => a.edge.cost - b.edge.cost || a.index - b.index);
  return indexed.map(({ edge }) => edge);
}

/**
 * Build a minimum spanning tree of the complete graph on n nodes.
 *
 * An infinite cost means the two nodes are not adjacent.
 *
 * @returns Tree edges in selection order.
 * @throws InputError if the matrix is malformed.
 * @throws GraphError DISCONNECTED_GRAPH if fewer than n-1 edges can be selected.
 */
export function buildSpanningTree(n: number, costs: CostMatrix, options: SolveOptions = {}): SpanningTree {
  validateCostMatrix(n, costs, { allowInfinite: true });
  const check = createDeadline(options);

  const sorted = sortEdges(enumerateEdges(n, costs));
  check();

  const forest = new UnionFind(n);
  const edges: TourEdge[] = [];
  let totalCost = 0;

  for (let i = 0; i < sorted.length && edges.length < n - 1; i++) {
    if (i % CHECK_INTERVAL === CHECK_INTERVAL - 1) {
      check();
    }

    const edge = sorted[i];
    if (forest.union(edge.head, edge.tail) !== -1) {
      edges.push(edge);
      totalCost += edge.cost;
    }
  }

  if (edges.length < n - 1) {
    throw new GraphError(
      `Graph is disconnected: ${forest.getNumComponents()} components remain after ${sorted.length} edges`,
      'DISCONNECTED_GRAPH',
    );
  }

  log.debug('Built spanning tree', { nodes: n, candidates: sorted.length, totalCost });

  return { edges, totalCost };
}
