// mcp-task-delegator/src/services/workerRegistry.ts
// Worker creation and per-worker state changes. Workers belong to exactly one task
// and are only mutated through these functions.

import { randomUUID } from 'node:crypto';
import type { CategoryDefinition, Worker } from '../types/index.js';
import { InvalidStateError, ValidationError } from './errors.js';

export type IdGenerator = () => string;

export const defaultWorkerId: IdGenerator = () => `worker-${randomUUID()}`;

/** One worker per description, in order, all sharing the same estimate */
export function createWorkers(
  category: CategoryDefinition,
  descriptions: readonly string[],
  perWorkerEstimate: number,
  nextId: IdGenerator = defaultWorkerId,
): Worker[] {
  if (!Number.isSafeInteger(perWorkerEstimate) || perWorkerEstimate < 0) {
    throw new ValidationError(`Worker estimate must be a non-negative integer (got ${perWorkerEstimate})`);
  }
  const createdAt = new Date();
  return descriptions.map(assignment => ({
    id: nextId(),
    category: category.id,
    specialty: category.specialty,
    assignment,
    estimatedTokens: perWorkerEstimate,
    status: 'assigned' as const,
    createdAt,
  }));
}

export function isWorkerFinished(worker: Worker): boolean {
  return worker.status === 'completed' || worker.status === 'failed';
}

/** assigned → in_progress */
export function startWorker(worker: Worker): void {
  if (worker.status !== 'assigned') {
    throw new InvalidStateError(`Worker ${worker.id} cannot start from ${worker.status}`);
  }
  worker.status = 'in_progress';
}

/** Record a result. Completing an already-completed worker overwrites it. */
export function completeWorker(worker: Worker, result: string, actualTokens: number): void {
  if (!Number.isSafeInteger(actualTokens) || actualTokens < 0) {
    throw new ValidationError(`Actual tokens must be a non-negative integer (got ${actualTokens})`);
  }
  worker.status = 'completed';
  worker.result = result;
  worker.actualTokens = actualTokens;
  worker.error = undefined;
  worker.completedAt = new Date();
}

/** Record a failure. actualTokens is left as it was. */
export function failWorker(worker: Worker, error: string): void {
  worker.status = 'failed';
  worker.error = error;
  worker.completedAt = new Date();
}
