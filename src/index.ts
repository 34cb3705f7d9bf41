/**
 * tourkit
 *
 * Traveling salesman tours over complete graphs: a metric 2-approximation
 * built on a minimum spanning tree, and an exact Held–Karp solver.
 *
 * @packageDocumentation
 */

// Tours
export * from './tour/index.js';

// Configuration
export { loadConfig, validateExternalConfig, toRuntimeConfig, EXTERNAL_DEFAULTS } from './config/loader.js';
export type { ExternalConfig, ResolvedConfig, LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/solver-config.js';
export type { SolverConfig } from './config/solver-config.js';

// Errors
export * from './utils/errors.js';

// Logging
export { createLogger, setLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
