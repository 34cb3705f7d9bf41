import type { Command } from '../types.js';
import { readMatrixFile, type MatrixFile } from '../matrix-file.js';
import { toRuntimeConfig, validateExternalConfig } from '../../config/loader.js';
import { loadCliConfig, reportConfigErrors } from './config.js';
import type { SolverConfig } from '../../config/solver-config.js';
import { approximateTour } from '../../tour/metric-tour.js';
import { exactTour } from '../../tour/exact-tour.js';
import { tourCost } from '../../tour/tour-cost.js';
import type { Tour } from '../../tour/types.js';
import { setJsonMode, setLogLevel } from '../../utils/logger.js';

export type SolveMethod = 'approx' | 'exact';

export interface SolveResult {
  method: SolveMethod;
  tour: Tour;
  cost: number;
  ms: number;
}

export interface SolveArgs {
  file: string;
  methods: SolveMethod[];
  json: boolean;
  timeoutMs?: number;
  maxExactNodes?: number;
}

// Flags that consume the following argument
const VALUE_FLAGS = ['--method', '--timeout', '--max-exact-nodes'];

const METHOD_TITLES: Record<SolveMethod, string> = {
  approx: 'Metric TSP approximation',
  exact: 'Exact exponential solution',
};

/**
 * Parse `solve` arguments. Returns an error message instead of throwing so
 * the handler can print usage.
 */
export function parseSolveArgs(args: string[]): SolveArgs | string {
  const file = args.find((a, i) => !a.startsWith('--') && !VALUE_FLAGS.includes(args[i - 1] ?? ''));
  if (!file) {
    return 'Matrix file required';
  }

  const flag = (name: string): string | undefined => {
    const index = args.indexOf(name);
    return index >= 0 ? args[index + 1] : undefined;
  };

  const method = flag('--method') ?? 'both';
  let methods: SolveMethod[];
  switch (method) {
    case 'approx':
      methods = ['approx'];
      break;
    case 'exact':
      methods = ['exact'];
      break;
    case 'both':
      methods = ['approx', 'exact'];
      break;
    default:
      return `Unknown method: ${method}`;
  }

  const parsed: SolveArgs = { file, methods, json: args.includes('--json') };

  const timeout = flag('--timeout');
  if (timeout !== undefined) {
    parsed.timeoutMs = parseInt(timeout, 10);
    if (Number.isNaN(parsed.timeoutMs)) return `Invalid --timeout: ${timeout}`;
  }
  const maxNodes = flag('--max-exact-nodes');
  if (maxNodes !== undefined) {
    parsed.maxExactNodes = parseInt(maxNodes, 10);
    if (Number.isNaN(parsed.maxExactNodes)) return `Invalid --max-exact-nodes: ${maxNodes}`;
  }

  return parsed;
}

/**
 * Run the requested methods in order on one matrix.
 */
export function solveMatrix(matrix: MatrixFile, methods: SolveMethod[], config: SolverConfig): SolveResult[] {
  const options = { timeoutMs: config.timeoutMs };

  return methods.map((method) => {
    const started = Date.now();
    const tour =
      method === 'approx'
        ? approximateTour(matrix.n, matrix.costs, options)
        : exactTour(matrix.n, matrix.costs, { ...options, maxNodes: config.maxExactNodes });
    return { method, tour, cost: tourCost(matrix.costs, tour), ms: Date.now() - started };
  });
}

/**
 * Human-readable report, one block per method.
 */
export function formatResults(results: SolveResult[]): string {
  return results
    .map((r) => [`${METHOD_TITLES[r.method]}:`, `Path: ${r.tour.join(' ')}`, `Cost: ${r.cost}`].join('\n'))
    .join('\n\n');
}

/**
 * Resolve config with CLI overrides and apply its logging settings.
 * Exits with code 3 on an unreadable or invalid config.
 */
export function resolveCliConfig(overrides: { timeoutMs?: number; maxExactNodes?: number }): SolverConfig {
  const external = loadCliConfig({
    cliOverrides: { solver: { timeoutMs: overrides.timeoutMs, maxExactNodes: overrides.maxExactNodes } },
  });
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    reportConfigErrors(errors);
  }

  const config = toRuntimeConfig(external);
  setLogLevel(config.logLevel);
  setJsonMode(config.logJson);
  return config;
}

export const solveCommand: Command = {
  name: 'solve',
  description: 'Compute tours for a cost matrix file',
  usage: 'tourkit solve <file> [--method approx|exact|both] [--json] [--timeout <ms>] [--max-exact-nodes <n>]',
  handler: async (args) => {
    const parsed = parseSolveArgs(args);
    if (typeof parsed === 'string') {
      console.error(`Error: ${parsed}`);
      console.log(`Usage: ${solveCommand.usage}`);
      process.exit(2);
    }

    const config = resolveCliConfig(parsed);
    const matrix = readMatrixFile(parsed.file);
    const results = solveMatrix(matrix, parsed.methods, config);

    console.log(parsed.json ? JSON.stringify(results, null, 2) : formatResults(results));
  },
};
