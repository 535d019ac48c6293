// mcp-task-delegator/src/services/logger.ts
// Minimal structured logger. Writes to stderr; stdout belongs to the MCP transport.

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0, warn: 1, info: 2, debug: 3, trace: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLevel = (process.env.DELEGATOR_LOG_LEVEL || '').toLowerCase().trim();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** Change the active level (config is applied after module load) */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

function fmt(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `[${ts}] [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
  if (shouldLog(level)) process.stderr.write(fmt(level, msg, data) + '\n');
}

export const logger = {
  error(msg: string, data?: Record<string, unknown>): void { write('error', msg, data); },
  warn(msg: string, data?: Record<string, unknown>): void { write('warn', msg, data); },
  info(msg: string, data?: Record<string, unknown>): void { write('info', msg, data); },
  debug(msg: string, data?: Record<string, unknown>): void { write('debug', msg, data); },
  trace(msg: string, data?: Record<string, unknown>): void { write('trace', msg, data); },
};
