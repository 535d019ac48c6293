// mcp-task-delegator/src/services/snapshot.ts
// JSON-safe views of ledger data for tools, resources and the HTTP API

import type { Task, TaskSnapshot, TaskSummary, Worker, WorkerSnapshot } from '../types/index.js';
import { computeTaskSavings, computeWorkerEfficiency } from './statistics.js';

export const SUMMARY_DESCRIPTION_LIMIT = 100;

export function truncateDescription(description: string, limit = SUMMARY_DESCRIPTION_LIMIT): string {
  return description.length > limit ? description.slice(0, limit) + '...' : description;
}

export function toWorkerSnapshot(worker: Worker): WorkerSnapshot {
  return {
    workerId: worker.id,
    category: worker.category,
    specialty: worker.specialty,
    assignment: worker.assignment,
    status: worker.status,
    estimatedTokens: worker.estimatedTokens,
    actualTokens: worker.actualTokens ?? null,
    efficiency: computeWorkerEfficiency(worker),
    result: worker.result ?? null,
    error: worker.error ?? null,
    completedAt: worker.completedAt?.toISOString() ?? null,
  };
}

export function toTaskSnapshot(task: Task): TaskSnapshot {
  return {
    taskId: task.id,
    description: task.description,
    priority: task.priority,
    category: task.category,
    status: task.status,
    totalBudget: task.totalBudget,
    workerCount: task.workers.length,
    workers: task.workers.map(toWorkerSnapshot),
    tokenSavings: computeTaskSavings(task),
    createdAt: task.createdAt.toISOString(),
    startedAt: task.startedAt?.toISOString() ?? null,
    completedAt: task.completedAt?.toISOString() ?? null,
    result: task.result ?? null,
    error: task.error ?? null,
  };
}

export function toTaskSummary(task: Task): TaskSummary {
  return {
    taskId: task.id,
    description: truncateDescription(task.description),
    status: task.status,
    category: task.category,
    priority: task.priority,
    workerCount: task.workers.length,
  };
}
