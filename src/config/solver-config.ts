/**
 * Runtime configuration for the tour solvers.
 */

import { DEFAULT_MAX_EXACT_NODES } from '../tour/exact-tour.js';
import type { LogLevel } from '../utils/logger.js';

/**
 * Complete solver configuration.
 */
export interface SolverConfig {
  /** Largest node count accepted by the exact solver */
  maxExactNodes: number;
  /** Time budget per solve in milliseconds. 0 = unlimited */
  timeoutMs: number;
  /** Log level for the CLI */
  logLevel: LogLevel;
  /** Emit JSON log lines */
  logJson: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: SolverConfig = {
  maxExactNodes: DEFAULT_MAX_EXACT_NODES,
  timeoutMs: 0,
  logLevel: 'info',
  logJson: false,
};

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}
