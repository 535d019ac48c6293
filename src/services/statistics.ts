// mcp-task-delegator/src/services/statistics.ts
// Savings accounting and ledger-wide aggregates. Pure functions over task data.

import type { LedgerStatistics, Task, TaskStatus, Worker } from '../types/index.js';

/** Tokens attributed to a worker: actual when reported, otherwise the estimate */
export function tokensUsed(worker: Worker): number {
  return worker.actualTokens ?? worker.estimatedTokens;
}

/** Percent of the budget not used by the task's workers, in [0, 100] */
export function computeTaskSavings(task: Task): number {
  const used = task.workers.reduce((sum, w) => sum + tokensUsed(w), 0);
  if (used >= task.totalBudget) return 0;
  return ((task.totalBudget - used) * 100) / task.totalBudget;
}

/** (estimated - actual) / estimated, or null until the worker reports usage */
export function computeWorkerEfficiency(worker: Worker): number | null {
  if (worker.actualTokens === undefined || worker.estimatedTokens <= 0) return null;
  return (worker.estimatedTokens - worker.actualTokens) / worker.estimatedTokens;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function emptyStatusCounts(): Record<TaskStatus, number> {
  return { pending: 0, assigned: 0, in_progress: 0, completed: 0, failed: 0, cancelled: 0 };
}

export function computeLedgerStatistics(tasks: readonly Task[], evictedTasks = 0): LedgerStatistics {
  const statusCounts = emptyStatusCounts();
  const categoryDistribution: LedgerStatistics['categoryDistribution'] = {};
  let totalWorkers = 0;
  let completedSavings = 0;

  for (const task of tasks) {
    statusCounts[task.status]++;
    categoryDistribution[task.category] = (categoryDistribution[task.category] ?? 0) + 1;
    totalWorkers += task.workers.length;
    if (task.status === 'completed') completedSavings += computeTaskSavings(task);
  }

  const completedTasks = statusCounts.completed;
  return {
    totalTasks: tasks.length,
    activeTasks: statusCounts.assigned + statusCounts.in_progress,
    completedTasks,
    averageSavings: completedTasks > 0 ? round2(completedSavings / completedTasks) : 0,
    totalWorkers,
    categoryDistribution,
    statusCounts,
    evictedTasks,
  };
}
