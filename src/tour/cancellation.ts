/**
 * Cooperative cancellation for the solvers.
 *
 * The solvers are synchronous, so timers never fire while they run: the
 * time budget is checked against the clock instead of through a timer.
 */

import { SolverError } from '../utils/errors.js';
import type { SolveOptions } from './types.js';

/**
 * Check function returned by createDeadline. Throws when the solve must stop.
 */
export type DeadlineCheck = () => void;

/**
 * Build a check function for the given options. The time budget starts now.
 *
 * @throws SolverError ABORTED if the signal has already fired.
 */
export function createDeadline(options: SolveOptions = {}, now: () => number = Date.now): DeadlineCheck {
  const { signal, timeoutMs } = options;
  const expiresAt = timeoutMs !== undefined && timeoutMs > 0 ? now() + timeoutMs : undefined;

  const check: DeadlineCheck = () => {
    if (signal?.aborted) {
      throw new SolverError('Solve aborted', 'ABORTED', signal.reason);
    }
    if (expiresAt !== undefined && now() >= expiresAt) {
      throw new SolverError(`Solve exceeded its ${timeoutMs}ms budget`, 'TIMEOUT');
    }
  };

  check();
  return check;
}
