// mcp-task-delegator/src/types/metrics.ts
// Aggregate statistics types

import type { CategoryId } from './category.js';
import type { TaskStatus } from './task.js';

export interface LedgerStatistics {
  totalTasks: number;
  /** Tasks in assigned or in_progress */
  activeTasks: number;
  completedTasks: number;
  /** Mean savings percent over completed tasks, two decimals */
  averageSavings: number;
  totalWorkers: number;
  categoryDistribution: Partial<Record<CategoryId, number>>;
  statusCounts: Record<TaskStatus, number>;
  /** Tasks dropped by the retention policy since startup */
  evictedTasks: number;
}
