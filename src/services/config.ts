// mcp-task-delegator/src/services/config.ts
// Environment configuration.
//
//   DELEGATOR_LOG_LEVEL        error | warn | info | debug | trace   (info)
//   DELEGATOR_DEFAULT_BUDGET   token budget when a request gives none (10000)
//   DELEGATOR_MAX_TASKS        ledger retention bound, 0 = unbounded  (1000)
//   DELEGATOR_EXECUTION_MODE   parallel | sequential                  (parallel)
//   DELEGATOR_HTTP_PORT        enable the JSON HTTP API on this port  (off)
//   DELEGATOR_CATALOG_PATH     alternate categories.json

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import type { ExecutionMode } from './workerExecutor.js';
import { ValidationError } from './errors.js';

export interface DelegatorConfig {
  logLevel: LogLevel;
  defaultBudget: number;
  maxTasks: number;
  executionMode: ExecutionMode;
  httpPort?: number;
  catalogPath?: string;
}

export const DEFAULT_BUDGET = 10_000;
export const DEFAULT_MAX_TASKS = 1_000;

/** Blank strings count as unset */
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);

const envSchema = z.object({
  DELEGATOR_LOG_LEVEL: optionalEnv(z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info')),
  DELEGATOR_DEFAULT_BUDGET: optionalEnv(z.coerce.number().int().positive().default(DEFAULT_BUDGET)),
  DELEGATOR_MAX_TASKS: optionalEnv(z.coerce.number().int().nonnegative().default(DEFAULT_MAX_TASKS)),
  DELEGATOR_EXECUTION_MODE: optionalEnv(z.enum(['parallel', 'sequential']).default('parallel')),
  DELEGATOR_HTTP_PORT: optionalEnv(z.coerce.number().int().min(0).max(65535).optional()),
  DELEGATOR_CATALOG_PATH: optionalEnv(z.string().optional()),
});

/** Parse configuration from an environment map. Throws ValidationError naming the bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DelegatorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    logLevel: e.DELEGATOR_LOG_LEVEL,
    defaultBudget: e.DELEGATOR_DEFAULT_BUDGET,
    maxTasks: e.DELEGATOR_MAX_TASKS,
    executionMode: e.DELEGATOR_EXECUTION_MODE,
    httpPort: e.DELEGATOR_HTTP_PORT,
    catalogPath: e.DELEGATOR_CATALOG_PATH,
  };
}
