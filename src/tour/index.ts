/**
 * Tour construction exports.
 */

export { UnionFind } from './union-find.js';
export { buildSpanningTree, enumerateEdges, sortEdges } from './spanning-tree.js';
export { approximateTour, buildAdjacency, shortcutWalk } from './metric-tour.js';
export {
  exactTour,
  buildSubsetTable,
  reconstructTour,
  DEFAULT_MAX_EXACT_NODES,
  MAX_EXACT_NODES_LIMIT,
} from './exact-tour.js';
export { validateCostMatrix } from './validation.js';
export type { ValidateOptions } from './validation.js';
export { tourCost, isValidTour } from './tour-cost.js';
export { createDeadline } from './cancellation.js';
export type { DeadlineCheck } from './cancellation.js';
export type {
  CostMatrix,
  Tour,
  TourEdge,
  SpanningTree,
  SolveOptions,
  ExactTourOptions,
} from './types.js';
