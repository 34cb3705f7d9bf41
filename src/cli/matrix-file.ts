/**
 * Cost matrix files for the CLI.
 *
 * A file holds either a bare `number[][]` or `{ "costs": number[][] }`.
 * `null` entries stand for unreachable pairs and load as Infinity.
 */

import { existsSync, readFileSync } from 'node:fs';
import { InputFileError } from '../utils/errors.js';

export interface MatrixFile {
  /** Node count (number of rows). */
  n: number;
  /** Cost matrix with null entries replaced by Infinity. */
  costs: number[][];
  /** Optional free-form description from the file. */
  description?: string;
}

/**
 * Convert parsed JSON into a cost matrix. Row lengths are not checked here;
 * the solvers report INVALID_DIMENSION for ragged input.
 *
 * @throws InputFileError FILE_PARSE_FAILED on a wrongly shaped value.
 */
export function parseMatrix(value: unknown, source: string): MatrixFile {
  let rows: unknown = value;
  let description: string | undefined;

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    if (!('costs' in value)) {
      throw new InputFileError(`${source}: expected an array or an object with "costs"`, 'FILE_PARSE_FAILED');
    }
    rows = value.costs;
    if ('description' in value && typeof value.description === 'string') {
      description = value.description;
    }
  }

  if (!Array.isArray(rows)) {
    throw new InputFileError(`${source}: costs must be an array of rows`, 'FILE_PARSE_FAILED');
  }

  const costs = rows.map((row: unknown, i) => {
    if (!Array.isArray(row)) {
      throw new InputFileError(`${source}: row ${i} is not an array`, 'FILE_PARSE_FAILED');
    }
    return row.map((entry: unknown, j) => {
      if (entry === null) return Infinity;
      if (typeof entry !== 'number') {
        throw new InputFileError(`${source}: entry [${i}][${j}] is not a number`, 'FILE_PARSE_FAILED');
      }
      return entry;
    });
  });

  return { n: costs.length, costs, description };
}

/**
 * Read and parse a matrix file.
 *
 * @throws InputFileError FILE_NOT_FOUND or FILE_PARSE_FAILED.
 */
export function readMatrixFile(path: string): MatrixFile {
  if (!existsSync(path)) {
    throw new InputFileError(`File not found: ${path}`, 'FILE_NOT_FOUND');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InputFileError(`${path}: invalid JSON`, 'FILE_PARSE_FAILED', error);
  }

  return parseMatrix(parsed, path);
}
