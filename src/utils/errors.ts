/**
 * Standardized error types for tourkit.
 *
 * All errors extend from TourkitError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { InputError, isErrorWithCode } from './errors.js';
 *
 * throw new InputError('Cost matrix has 3 rows, expected 4', 'INVALID_DIMENSION');
 *
 * try {
 *   exactTour(n, costs);
 * } catch (err) {
 *   if (isErrorWithCode(err, 'SUBSET_OVERFLOW')) {
 *     return approximateTour(n, costs);
 *   }
 *   throw err;
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all tourkit errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'ASYMMETRIC_COST')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'InputError')
 */
export class TourkitError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof TourkitError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

export type InputErrorCode = 'INVALID_DIMENSION' | 'ASYMMETRIC_COST' | 'NEGATIVE_OR_NON_FINITE_COST';

/**
 * Errors from cost matrix validation, raised before any solving starts.
 *
 * Codes:
 * - `INVALID_DIMENSION`: n is not a positive integer, or the matrix is not n×n
 * - `ASYMMETRIC_COST`: cost[i][j] differs from cost[j][i]
 * - `NEGATIVE_OR_NON_FINITE_COST`: an entry is negative, NaN, or infinite where a finite cost is required
 */
export class InputError extends TourkitError {
  declare readonly code: InputErrorCode;

  constructor(message: string, code: InputErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Graph Errors
// ─────────────────────────────────────────────────────────────────────────────

export type GraphErrorCode = 'DISCONNECTED_GRAPH';

/**
 * Errors from spanning tree construction.
 *
 * Codes:
 * - `DISCONNECTED_GRAPH`: fewer than n-1 edges could be selected
 */
export class GraphError extends TourkitError {
  declare readonly code: GraphErrorCode;

  constructor(message: string, code: GraphErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Solver Errors
// ─────────────────────────────────────────────────────────────────────────────

export type SolverErrorCode = 'SUBSET_OVERFLOW' | 'INTERNAL_INVARIANT_VIOLATION' | 'ABORTED' | 'TIMEOUT';

/**
 * Errors raised while a tour is being computed.
 *
 * Codes:
 * - `SUBSET_OVERFLOW`: n exceeds the exact solver's node ceiling
 * - `INTERNAL_INVARIANT_VIOLATION`: tour reconstruction found no candidate (a logic defect)
 * - `ABORTED`: the caller's abort signal fired
 * - `TIMEOUT`: the time budget ran out
 */
export class SolverError extends TourkitError {
  declare readonly code: SolverErrorCode;

  constructor(message: string, code: SolverErrorCode, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: A config file is not valid JSON
 * - `CONFIG_INVALID`: A config file field has the wrong type
 */
export class ConfigError extends TourkitError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input File Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors while loading a cost matrix file for the CLI.
 *
 * Common codes:
 * - `FILE_NOT_FOUND`: Matrix file does not exist
 * - `FILE_PARSE_FAILED`: File is not JSON or has the wrong shape
 */
export class InputFileError extends TourkitError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a tourkit error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof TourkitError && error.code === code;
}

/**
 * Check if an error is a specific type of tourkit error.
 */
export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}

export function isSolverError(error: unknown): error is SolverError {
  return error instanceof SolverError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isInputFileError(error: unknown): error is InputFileError {
  return error instanceof InputFileError;
}

/**
 * Wrap an unknown error in a TourkitError.
 *
 * If the error is already a TourkitError, returns it unchanged.
 * Otherwise wraps it in a new TourkitError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): TourkitError {
  if (error instanceof TourkitError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new TourkitError(errorMessage, 'UNKNOWN', error);
}
