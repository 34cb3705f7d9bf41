/**
 * Type definitions for tour construction.
 */

/**
 * Pairwise travel costs. Entry [i][j] is the cost of travelling from node i
 * to node j; the diagonal is ignored.
 */
export type CostMatrix = ReadonlyArray<ReadonlyArray<number>>;

/**
 * Closed tour: n+1 node ids, starting and ending at node 0.
 */
export type Tour = number[];

/**
 * Undirected edge of the complete graph.
 */
export interface TourEdge {
  /** Lower-numbered endpoint. */
  head: number;
  /** Higher-numbered endpoint. */
  tail: number;
  /** Travel cost between the endpoints. */
  cost: number;
}

/**
 * Minimum spanning tree over all nodes.
 */
export interface SpanningTree {
  /** Selected edges, in selection order (ascending cost). */
  edges: TourEdge[];
  /** Sum of the edge costs. */
  totalCost: number;
}

/**
 * Options accepted by every solving operation.
 */
export interface SolveOptions {
  /** Abort signal checked while solving. */
  signal?: AbortSignal;
  /** Time budget in milliseconds. 0 or undefined = unlimited. */
  timeoutMs?: number;
}

/**
 * Options for the exact solver.
 */
export interface ExactTourOptions extends SolveOptions {
  /** Largest node count the exact solver accepts. Default: 20. */
  maxNodes?: number;
}
