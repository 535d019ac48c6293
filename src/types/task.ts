// mcp-task-delegator/src/types/task.ts
// Task domain types - tasks, workers, delegation requests and responses

import type { CategoryId } from './category.js';

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;

/** Accepted and reported, never used for scheduling */
export type TaskPriority = typeof TASK_PRIORITIES[number];

export const TASK_STATUSES = ['pending', 'assigned', 'in_progress', 'completed', 'failed', 'cancelled'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export type WorkerStatus = 'assigned' | 'in_progress' | 'completed' | 'failed';

/** One execution unit - a single sub-item of a task */
export interface Worker {
  id: string;
  readonly category: CategoryId;
  specialty: string;
  assignment: string;
  estimatedTokens: number;
  actualTokens?: number;
  status: WorkerStatus;
  result?: string;
  error?: string;
  createdAt: Date;
  completedAt?: Date;
}

/** A delegated unit of work owning an ordered set of workers */
export interface Task {
  id: string;
  description: string;
  priority: TaskPriority;
  category: CategoryId;
  /** Fixed at creation */
  readonly totalBudget: number;
  workers: Worker[];
  status: TaskStatus;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  result?: string;
  error?: string;
}

export interface DelegationResponse {
  taskId: string;
  category: CategoryId;
  specialty: string;
  workerCount: number;
  estimatedTokensPerWorker: number;
  estimatedSavingsPercent: number;
  message: string;
}

/** JSON-safe view of a worker */
export interface WorkerSnapshot {
  workerId: string;
  category: CategoryId;
  specialty: string;
  assignment: string;
  status: WorkerStatus;
  estimatedTokens: number;
  actualTokens: number | null;
  efficiency: number | null;
  result: string | null;
  error: string | null;
  completedAt: string | null;
}

/** JSON-safe view of a task, returned by status queries */
export interface TaskSnapshot {
  taskId: string;
  description: string;
  priority: TaskPriority;
  category: CategoryId;
  status: TaskStatus;
  totalBudget: number;
  workerCount: number;
  workers: WorkerSnapshot[];
  tokenSavings: number;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  result: string | null;
  error: string | null;
}

export interface TaskSummary {
  taskId: string;
  description: string;
  status: TaskStatus;
  category: CategoryId;
  priority: TaskPriority;
  workerCount: number;
}
