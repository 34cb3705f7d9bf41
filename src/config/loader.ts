/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (TOURKIT_*)
 * 3. Project config file (./tourkit.config.json)
 * 4. User config file (~/.tourkit/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, type SolverConfig } from './solver-config.js';
import { MAX_EXACT_NODES_LIMIT } from '../tour/exact-tour.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure (matches config.schema.json) */
export interface ExternalConfig {
  solver?: {
    /** Largest node count accepted by the exact solver. Default: 20, max 25. */
    maxExactNodes?: number;
    /** Time budget per solve in milliseconds. 0 = unlimited. Default: 0. */
    timeoutMs?: number;
  };
  logging?: {
    level?: LogLevel;
    json?: boolean;
  };
}

/** Fully resolved external config */
export interface ResolvedConfig {
  solver: Required<NonNullable<ExternalConfig['solver']>>;
  logging: Required<NonNullable<ExternalConfig['logging']>>;
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  solver: {
    maxExactNodes: DEFAULT_CONFIG.maxExactNodes,
    timeoutMs: DEFAULT_CONFIG.timeoutMs,
  },
  logging: {
    level: DEFAULT_CONFIG.logLevel,
    json: DEFAULT_CONFIG.logJson,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidField(source: string, field: string, expected: string): never {
  throw new ConfigError(`${source}: ${field} must be ${expected}`, 'CONFIG_INVALID');
}

/**
 * Pick the known fields out of parsed JSON. Fields of the wrong type are
 * rejected so that validation sees only well-typed values.
 *
 * @throws ConfigError CONFIG_INVALID on a wrongly typed field.
 */
export function parseExternalConfig(value: unknown, source: string): ExternalConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${source}: config must be a JSON object`, 'CONFIG_INVALID');
  }

  const config: ExternalConfig = {};
  const { solver, logging } = value;

  if (solver !== undefined) {
    if (!isRecord(solver)) invalidField(source, 'solver', 'an object');
    config.solver = {};
    const { maxExactNodes, timeoutMs } = solver;
    if (maxExactNodes !== undefined) {
      if (typeof maxExactNodes !== 'number') invalidField(source, 'solver.maxExactNodes', 'a number');
      config.solver.maxExactNodes = maxExactNodes;
    }
    if (timeoutMs !== undefined) {
      if (typeof timeoutMs !== 'number') invalidField(source, 'solver.timeoutMs', 'a number');
      config.solver.timeoutMs = timeoutMs;
    }
  }

  if (logging !== undefined) {
    if (!isRecord(logging)) invalidField(source, 'logging', 'an object');
    config.logging = {};
    const { level, json } = logging;
    if (level !== undefined) {
      if (!isLogLevel(level)) invalidField(source, 'logging.level', 'one of debug, info, warn, error, silent');
      config.logging.level = level;
    }
    if (json !== undefined) {
      if (typeof json !== 'boolean') invalidField(source, 'logging.json', 'a boolean');
      config.logging.json = json;
    }
  }

  return config;
}

/**
 * Load config from a JSON file. A missing file yields null.
 *
 * @throws ConfigError CONFIG_PARSE_FAILED when the file is not valid JSON.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`${path}: invalid JSON`, 'CONFIG_PARSE_FAILED', error);
  }

  return parseExternalConfig(parsed, path);
}

/**
 * Load config from environment variables.
 * Examples:
 *   TOURKIT_SOLVER_MAX_EXACT_NODES=16
 *   TOURKIT_SOLVER_TIMEOUT_MS=5000
 *   TOURKIT_LOG_LEVEL=debug
 *   TOURKIT_LOG_JSON=true
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  // Solver
  if (process.env.TOURKIT_SOLVER_MAX_EXACT_NODES) {
    config.solver = config.solver ?? {};
    config.solver.maxExactNodes = parseInt(process.env.TOURKIT_SOLVER_MAX_EXACT_NODES, 10);
  }
  if (process.env.TOURKIT_SOLVER_TIMEOUT_MS) {
    config.solver = config.solver ?? {};
    config.solver.timeoutMs = parseInt(process.env.TOURKIT_SOLVER_TIMEOUT_MS, 10);
  }

  // Logging
  const level = process.env.TOURKIT_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) {
      config.logging = config.logging ?? {};
      config.logging.level = level;
    } else {
      log.warn(`Ignoring unknown TOURKIT_LOG_LEVEL "${level}"`);
    }
  }
  if (process.env.TOURKIT_LOG_JSON) {
    config.logging = config.logging ?? {};
    config.logging.json = process.env.TOURKIT_LOG_JSON === 'true';
  }

  return config;
}

/**
 * Merge a partial config over a resolved one, with source overriding target.
 */
function deepMerge(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    solver: {
      maxExactNodes: source.solver?.maxExactNodes ?? target.solver.maxExactNodes,
      timeoutMs: source.solver?.timeoutMs ?? target.solver.timeoutMs,
    },
    logging: {
      level: source.logging?.level ?? target.logging.level,
      json: source.logging?.json ?? target.logging.json,
    },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  if (config.solver?.maxExactNodes !== undefined) {
    const max = config.solver.maxExactNodes;
    if (!Number.isInteger(max) || max < 1 || max > MAX_EXACT_NODES_LIMIT) {
      errors.push(`solver.maxExactNodes must be an integer between 1 and ${MAX_EXACT_NODES_LIMIT}`);
    }
  }
  if (config.solver?.timeoutMs !== undefined) {
    const timeout = config.solver.timeoutMs;
    if (!Number.isFinite(timeout) || timeout < 0) {
      errors.push('solver.timeoutMs must be >= 0 (0 = unlimited)');
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (cliOverrides)
 * 2. Environment variables (TOURKIT_*)
 * 3. Project config file (./tourkit.config.json)
 * 4. User config file (~/.tourkit/config.json)
 * 5. Built-in defaults
 *
 * @throws ConfigError CONFIG_PARSE_FAILED if a config file is not valid JSON,
 *   CONFIG_INVALID if it has wrongly typed fields.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = deepMerge(EXTERNAL_DEFAULTS, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.tourkit/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'tourkit.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert the resolved external config to the runtime SolverConfig.
 */
export function toRuntimeConfig(external: ResolvedConfig): SolverConfig {
  return {
    ...DEFAULT_CONFIG,
    maxExactNodes: external.solver.maxExactNodes,
    timeoutMs: external.solver.timeoutMs,
    logLevel: external.logging.level,
    logJson: external.logging.json,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
