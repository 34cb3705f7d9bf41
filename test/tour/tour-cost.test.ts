/**
 * Tests for tour evaluation helpers.
 */

import { describe, it, expect } from 'vitest';
import { isValidTour, tourCost } from '../../src/tour/tour-cost.js';
import { FOUR_NODE_COSTS } from './fixtures.js';

describe('tourCost', () => {
  it('sums consecutive legs', () => {
    expect(tourCost(FOUR_NODE_COSTS, [0, 1, 2, 3, 0])).toBe(8);
    expect(tourCost(FOUR_NODE_COSTS, [0, 1, 3, 2, 0])).toBe(11);
    expect(tourCost(FOUR_NODE_COSTS, [0, 2, 1, 3, 0])).toBe(11);
  });

  it('is zero for a single-node tour', () => {
    expect(tourCost([[0]], [0, 0])).toBe(0);
  });
});

describe('isValidTour', () => {
  it('accepts closed tours', () => {
    expect(isValidTour(4, [0, 3, 1, 2, 0])).toBe(true);
    expect(isValidTour(1, [0, 0])).toBe(true);
  });

  it('rejects wrong length', () => {
    expect(isValidTour(4, [0, 1, 2, 0])).toBe(false);
  });

  it('rejects tours not anchored at 0', () => {
    expect(isValidTour(3, [1, 0, 2, 1])).toBe(false);
    expect(isValidTour(3, [0, 1, 2, 1])).toBe(false);
  });

  it('rejects duplicates and out-of-range nodes', () => {
    expect(isValidTour(4, [0, 1, 1, 2, 0])).toBe(false);
    expect(isValidTour(4, [0, 1, 4, 2, 0])).toBe(false);
    expect(isValidTour(4, [0, 1, 0, 2, 0])).toBe(false);
  });
});
