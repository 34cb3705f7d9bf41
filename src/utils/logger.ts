/**
 * Centralized logging for tourkit.
 *
 * Writes to stderr so that tours printed on stdout stay machine-readable.
 *
 * Log level is controlled via:
 * 1. TOURKIT_LOG_LEVEL environment variable
 * 2. setLogLevel() function
 *
 * Levels (in order of severity): debug < info < warn < error
 */

/** Log level type */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Log entry structure */
export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger interface */
export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// Level priority (higher = more severe)
const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

const envLevel = process.env.TOURKIT_LOG_LEVEL;

// Current log level
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

// JSON output mode (for machine parsing)
let jsonMode = process.env.TOURKIT_LOG_JSON === 'true';

/**
 * Set the minimum level written to stderr.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Enable or disable JSON output mode.
 */
export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/**
 * Format a log entry for output.
 */
export function formatEntry(entry: LogEntry, json: boolean = jsonMode): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, meta } = entry;
  const time = timestamp.split('T')[1].split('.')[0]; // HH:MM:SS
  const levelTag = level.toUpperCase().padEnd(5);

  let output = `[${time}] ${levelTag} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    const metaStr = Object.entries(meta)
      .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
      .join(' ');
    output += ` (${metaStr})`;
  }

  return output;
}

function log(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: msg,
    meta,
  };

  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Create a logger whose messages carry a `[prefix]` tag, one per module.
 */
export function createLogger(prefix: string): Logger {
  const emit =
    (level: Exclude<LogLevel, 'silent'>) =>
    (msg: string, meta?: Record<string, unknown>): void =>
      log(level, `[${prefix}] ${msg}`, meta);

  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
}
