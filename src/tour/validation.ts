/**
 * Entry checks shared by the tour operations.
 */

import { InputError } from '../utils/errors.js';
import type { CostMatrix } from './types.js';

export interface ValidateOptions {
  /** Accept +Infinity as "no edge". Only spanning tree construction allows it. */
  allowInfinite?: boolean;
}

/**
 * Check that `costs` is an n×n matrix of non-negative, symmetric costs.
 * Diagonal entries are never read.
 *
 * @throws InputError with INVALID_DIMENSION, NEGATIVE_OR_NON_FINITE_COST or ASYMMETRIC_COST.
 */
export function validateCostMatrix(n: number, costs: CostMatrix, options: ValidateOptions = {}): void {
  if (!Number.isInteger(n) || n <= 0) {
    throw new InputError(`Node count must be a positive integer, got ${n}`, 'INVALID_DIMENSION');
  }
  if (costs.length !== n) {
    throw new InputError(`Cost matrix has ${costs.length} rows, expected ${n}`, 'INVALID_DIMENSION');
  }
  for (let i = 0; i < n; i++) {
    if (costs[i].length !== n) {
      throw new InputError(
        `Cost matrix row ${i} has ${costs[i].length} entries, expected ${n}`,
        'INVALID_DIMENSION',
      );
    }
  }

  const allowInfinite = options.allowInfinite ?? false;

  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i === j) continue;
      const c = costs[i][j];
      const acceptable = Number.isFinite(c) || (allowInfinite && c === Infinity);
      if (!acceptable || c < 0) {
        throw new InputError(`Cost [${i}][${j}] is ${c}`, 'NEGATIVE_OR_NON_FINITE_COST');
      }
    }
  }

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (costs[i][j] !== costs[j][i]) {
        throw new InputError(
          `Cost [${i}][${j}] = ${costs[i][j]} differs from [${j}][${i}] = ${costs[j][i]}`,
          'ASYMMETRIC_COST',
        );
      }
    }
  }
}
