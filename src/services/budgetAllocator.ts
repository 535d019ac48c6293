// mcp-task-delegator/src/services/budgetAllocator.ts
// Splits a task budget evenly across workers and applies the category multiplier.
// Integer arithmetic only: estimate = floor(floor(total / n) * multiplier).

import type { CategoryDefinition } from '../types/index.js';
import { MULTIPLIER_SCALE } from './categoryCatalog.js';
import { ValidationError } from './errors.js';

export function baseShare(totalBudget: number, subtaskCount: number): number {
  return Math.floor(totalBudget / subtaskCount);
}

/** Per-worker token estimate. Zero when there are more subtasks than tokens. */
export function allocate(totalBudget: number, subtaskCount: number, category: CategoryDefinition): number {
  if (!Number.isSafeInteger(totalBudget) || totalBudget <= 0) {
    throw new ValidationError(`Token budget must be a positive integer (got ${totalBudget})`);
  }
  if (!Number.isSafeInteger(subtaskCount) || subtaskCount < 1) {
    throw new ValidationError(`Subtask count must be at least 1 (got ${subtaskCount})`);
  }
  const share = baseShare(totalBudget, subtaskCount);
  return Math.floor((share * category.multiplierBasisPoints) / MULTIPLIER_SCALE);
}
