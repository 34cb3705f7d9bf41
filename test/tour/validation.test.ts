/**
 * Tests for cost matrix validation.
 */

import { describe, it, expect } from 'vitest';
import { validateCostMatrix } from '../../src/tour/validation.js';
import { InputError } from '../../src/utils/errors.js';
import { FOUR_NODE_COSTS, captureError } from './fixtures.js';

describe('validateCostMatrix', () => {
  it('accepts a symmetric non-negative matrix', () => {
    expect(() => validateCostMatrix(4, FOUR_NODE_COSTS)).not.toThrow();
  });

  it('ignores the diagonal', () => {
    const costs = [
      [NaN, 1],
      [1, -5],
    ];
    expect(() => validateCostMatrix(2, costs)).not.toThrow();
  });

  describe('INVALID_DIMENSION', () => {
    it.each([0, -3, 2.5, NaN])('rejects n=%s', (n) => {
      const error = captureError(() => validateCostMatrix(n, [[0]]));

      expect(error).toBeInstanceOf(InputError);
      expect(error).toMatchObject({ code: 'INVALID_DIMENSION' });
    });

    it('rejects a row count different from n', () => {
      expect(captureError(() => validateCostMatrix(2, [[0, 1]]))).toMatchObject({
        code: 'INVALID_DIMENSION',
        message: 'Cost matrix has 1 rows, expected 2',
      });
    });

    it('rejects a ragged row', () => {
      const costs = [[0, 1], [1]];
      expect(captureError(() => validateCostMatrix(2, costs))).toMatchObject({
        code: 'INVALID_DIMENSION',
        message: 'Cost matrix row 1 has 1 entries, expected 2',
      });
    });
  });

  describe('NEGATIVE_OR_NON_FINITE_COST', () => {
    it.each([-1, NaN, Infinity, -Infinity])('rejects %s', (bad) => {
      const costs = [
        [0, bad],
        [bad, 0],
      ];
      expect(captureError(() => validateCostMatrix(2, costs))).toMatchObject({
        code: 'NEGATIVE_OR_NON_FINITE_COST',
      });
    });

    it('accepts +Infinity when allowed', () => {
      const costs = [
        [0, Infinity],
        [Infinity, 0],
      ];
      expect(() => validateCostMatrix(2, costs, { allowInfinite: true })).not.toThrow();
    });

    it('still rejects -Infinity and NaN when infinite costs are allowed', () => {
      for (const bad of [-Infinity, NaN]) {
        const costs = [
          [0, bad],
          [bad, 0],
        ];
        expect(captureError(() => validateCostMatrix(2, costs, { allowInfinite: true }))).toMatchObject({
          code: 'NEGATIVE_OR_NON_FINITE_COST',
        });
      }
    });
  });

  describe('ASYMMETRIC_COST', () => {
    it('names the first mismatched pair', () => {
      const costs = [
        [0, 1, 2],
        [1, 0, 3],
        [2, 4, 0],
      ];
      expect(captureError(() => validateCostMatrix(3, costs))).toMatchObject({
        code: 'ASYMMETRIC_COST',
        message: 'Cost [1][2] = 3 differs from [2][1] = 4',
      });
    });
  });
});
