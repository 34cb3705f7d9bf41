/**
 * Synthetic test fixtures for tour tests.
 *
 * Uses a seeded PRNG (mulberry32) for deterministic data generation, plus
 * brute-force reference solvers for small graphs.
 */

/**
 * Mulberry32 seeded PRNG. Returns values in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Four locations with costs
 * 0-1: 1, 0-2: 3, 0-3: 2, 1-2: 2, 1-3: 4, 2-3: 3.
 */
export const FOUR_NODE_COSTS: number[][] = [
  [0, 1, 3, 2],
  [1, 0, 2, 4],
  [3, 2, 0, 3],
  [2, 4, 3, 0],
];

/**
 * Euclidean distances between random points in a 100×100 square.
 * Always symmetric and metric.
 */
export function randomMetricMatrix(n: number, seed: number): number[][] {
  const rng = mulberry32(seed);
  const points = Array.from({ length: n }, () => [rng() * 100, rng() * 100]);
  return points.map(([x1, y1]) => points.map(([x2, y2]) => Math.hypot(x1 - x2, y1 - y2)));
}

/**
 * Symmetric matrix of random integer costs in [1, maxCost]. Not necessarily metric.
 */
export function randomSymmetricMatrix(n: number, seed: number, maxCost: number = 20): number[][] {
  const rng = mulberry32(seed);
  const costs = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const c = 1 + Math.floor(rng() * maxCost);
      costs[i][j] = c;
      costs[j][i] = c;
    }
  }
  return costs;
}

function permutations(items: number[]): number[][] {
  if (items.length <= 1) return [items.slice()];
  const result: number[][] = [];
  for (let i = 0; i < items.length; i++) {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const perm of permutations(rest)) {
      result.push([items[i], ...perm]);
    }
  }
  return result;
}

/**
 * Cheapest closed tour through node 0, by trying every ordering of 1..n-1.
 */
export function bruteForceTourCost(costs: number[][]): number {
  const n = costs.length;
  if (n === 1) return 0;

  const interior = Array.from({ length: n - 1 }, (_, i) => i + 1);
  let best = Infinity;
  for (const perm of permutations(interior)) {
    let total = costs[0][perm[0]];
    for (let i = 1; i < perm.length; i++) {
      total += costs[perm[i - 1]][perm[i]];
    }
    total += costs[perm[perm.length - 1]][0];
    best = Math.min(best, total);
  }
  return best;
}

/**
 * Lightest spanning tree found by trying every (n-1)-edge subset of the
 * complete graph and keeping the acyclic ones.
 */
export function bruteForceMstWeight(costs: number[][]): number {
  const n = costs.length;
  const edges: Array<[number, number]> = [];
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      edges.push([i, j]);
    }
  }

  let best = Infinity;
  const chosen: number[] = [];

  const isSpanningTree = (): boolean => {
    const label = Array.from({ length: n }, (_, i) => i);
    for (const index of chosen) {
      const [a, b] = edges[index];
      const from = label[a];
      const to = label[b];
      if (from === to) return false;
      for (let k = 0; k < n; k++) {
        if (label[k] === from) label[k] = to;
      }
    }
    return true;
  };

  const search = (start: number): void => {
    if (chosen.length === n - 1) {
      if (isSpanningTree()) {
        const weight = chosen.reduce((sum, index) => sum + costs[edges[index][0]][edges[index][1]], 0);
        best = Math.min(best, weight);
      }
      return;
    }
    for (let e = start; e < edges.length; e++) {
      chosen.push(e);
      search(e + 1);
      chosen.pop();
    }
  };

  search(0);
  return n === 1 ? 0 : best;
}

/**
 * Run fn and return what it throws, or undefined if it returns normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
