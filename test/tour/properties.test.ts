/**
 * Cross-checks between the two solvers on random instances.
 */

import { describe, it, expect } from 'vitest';
import { approximateTour } from '../../src/tour/metric-tour.js';
import { exactTour } from '../../src/tour/exact-tour.js';
import { isValidTour, tourCost } from '../../src/tour/tour-cost.js';
import { bruteForceTourCost, randomMetricMatrix, randomSymmetricMatrix } from './fixtures.js';

describe('approximation bound', () => {
  it.each([3, 4, 5, 6, 7, 8])('approximate cost is at most twice the optimum for n=%i', (n) => {
    for (let seed = 1; seed <= 5; seed++) {
      const costs = randomMetricMatrix(n, seed * 17 + n);
      const approx = tourCost(costs, approximateTour(n, costs));
      const exact = tourCost(costs, exactTour(n, costs));

      expect(exact).toBeLessThanOrEqual(approx + 1e-9);
      expect(approx).toBeLessThanOrEqual(2 * exact + 1e-9);
    }
  });

  it('exact cost matches permutation search on metric inputs', () => {
    const costs = randomMetricMatrix(8, 99);
    expect(tourCost(costs, exactTour(8, costs))).toBeCloseTo(bruteForceTourCost(costs), 9);
  });
});

describe('tour shape', () => {
  it('both solvers return n+1 nodes, 0 at both ends, interior a permutation', () => {
    for (let n = 1; n <= 12; n++) {
      const costs = randomSymmetricMatrix(n, n * 7);

      for (const tour of [approximateTour(n, costs), exactTour(n, costs)]) {
        expect(tour).toHaveLength(n + 1);
        expect(tour[0]).toBe(0);
        expect(tour[n]).toBe(0);
        expect(tour.slice(1, n).sort((a, b) => a - b)).toEqual(Array.from({ length: n - 1 }, (_, i) => i + 1));
        expect(isValidTour(n, tour)).toBe(true);
      }
    }
  });
});
