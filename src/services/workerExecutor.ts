// mcp-task-delegator/src/services/workerExecutor.ts
// Runs each worker's assignment through an executor function.
// The executor is the boundary to whatever actually does the work; the
// bundled one only simulates it.

import type { Task, Worker } from '../types/index.js';
import { logger } from './logger.js';

export interface WorkerOutcome {
  result: string;
  actualTokens: number;
}

/** Executor signature - one call per worker */
export type WorkerExecutor = (worker: Worker, task: Task) => Promise<WorkerOutcome>;

export type ExecutionMode = 'parallel' | 'sequential';

/** Reports half the estimate as used and echoes the assignment */
export const simulatedExecutor: WorkerExecutor = async (worker) => ({
  result: `[SIMULATED] Completed: ${worker.assignment}`,
  actualTokens: Math.floor(worker.estimatedTokens / 2),
});

/** Settled outcome per worker, in the order the workers were given */
export async function runWorkers(
  workers: readonly Worker[],
  task: Task,
  executor: WorkerExecutor,
  mode: ExecutionMode,
): Promise<PromiseSettledResult<WorkerOutcome>[]> {
  logger.debug(`Executing ${workers.length} worker(s) for task ${task.id} (${mode})`);

  if (mode === 'parallel') {
    // async wrapper turns a synchronous throw into a rejection
    return Promise.allSettled(workers.map(async worker => executor(worker, task)));
  }

  const settled: PromiseSettledResult<WorkerOutcome>[] = [];
  for (const worker of workers) {
    try {
      settled.push({ status: 'fulfilled', value: await executor(worker, task) });
    } catch (reason: unknown) {
      settled.push({ status: 'rejected', reason });
    }
  }
  return settled;
}
