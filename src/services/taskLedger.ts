// mcp-task-delegator/src/services/taskLedger.ts
// In-memory task store and task state machine.
//
//   pending → assigned → in_progress → completed | failed
//   any non-terminal → completed | failed | cancelled
//
// Every operation validates before mutating, so a rejected call leaves the
// ledger exactly as it was. Worker state is never changed from here.

import { randomUUID } from 'node:crypto';
import { TERMINAL_TASK_STATUSES } from '../types/index.js';
import type { CategoryId, Task, TaskPriority, TaskStatus, Worker } from '../types/index.js';
import { InvalidStateError, ValidationError } from './errors.js';
import type { DelegationEventBus } from './events.js';
import type { IdGenerator } from './workerRegistry.js';
import { logger } from './logger.js';

export const defaultTaskId: IdGenerator = () => `task-${randomUUID()}`;

export interface TaskLedgerOptions {
  /** Retention bound; 0 keeps every task */
  maxTasks?: number;
  events?: DelegationEventBus;
  nextId?: IdGenerator;
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export class TaskLedger {
  /** Creation order */
  private tasks: Map<string, Task> = new Map();
  /** Last-use tick per task, for LRU eviction */
  private lastUsed: Map<string, number> = new Map();
  private tick = 0;
  private evicted = 0;
  private readonly maxTasks: number;
  private readonly events?: DelegationEventBus;
  private readonly nextId: IdGenerator;

  constructor(options: TaskLedgerOptions = {}) {
    const maxTasks = options.maxTasks ?? 0;
    if (!Number.isSafeInteger(maxTasks) || maxTasks < 0) {
      throw new ValidationError(`maxTasks must be a non-negative integer (got ${maxTasks})`);
    }
    this.maxTasks = maxTasks;
    this.events = options.events;
    this.nextId = options.nextId ?? defaultTaskId;
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Tasks dropped by the retention bound since construction */
  get evictedCount(): number {
    return this.evicted;
  }

  get capacity(): number {
    return this.maxTasks;
  }

  /** New task in state pending with no workers */
  createTask(description: string, priority: TaskPriority, category: CategoryId, totalBudget: number): Task {
    if (description.trim().length === 0) {
      throw new ValidationError('Task description must not be empty');
    }
    if (!Number.isSafeInteger(totalBudget) || totalBudget <= 0) {
      throw new ValidationError(`Token budget must be a positive integer (got ${totalBudget})`);
    }

    let id = this.nextId();
    while (this.tasks.has(id)) id = this.nextId();

    const task: Task = {
      id,
      description,
      priority,
      category,
      totalBudget,
      workers: [],
      status: 'pending',
      createdAt: new Date(),
    };
    this.tasks.set(id, task);
    this.touch(id);
    this.enforceRetention(id);
    return task;
  }

  /**
   * Append workers. The first non-empty append moves pending → assigned; later
   * appends keep the status. Frozen once the task has started or finished.
   */
  assign(task: Task, workers: readonly Worker[]): void {
    if (task.status !== 'pending' && task.status !== 'assigned') {
      throw new InvalidStateError(`Cannot assign workers to task ${task.id} in state ${task.status}`);
    }
    if (workers.length === 0) return;
    task.workers.push(...workers);
    if (task.status === 'pending') this.setStatus(task, 'assigned');
  }

  /** assigned → in_progress; needs at least one worker */
  start(task: Task): void {
    if (task.workers.length === 0) {
      throw new InvalidStateError(`Task ${task.id} has no workers`);
    }
    if (task.status !== 'assigned') {
      throw new InvalidStateError(`Task ${task.id} cannot start from ${task.status}`);
    }
    task.startedAt = new Date();
    this.setStatus(task, 'in_progress');
  }

  complete(task: Task, result: string): void {
    this.assertNotTerminal(task, 'complete');
    task.result = result;
    task.completedAt = new Date();
    this.setStatus(task, 'completed');
  }

  fail(task: Task, error: string): void {
    this.assertNotTerminal(task, 'fail');
    task.error = error;
    task.completedAt = new Date();
    this.setStatus(task, 'failed', error);
  }

  cancel(task: Task, reason?: string): void {
    this.assertNotTerminal(task, 'cancel');
    if (reason) task.error = reason;
    task.completedAt = new Date();
    this.setStatus(task, 'cancelled', reason);
  }

  /** Lookup that counts as a use for retention. Undefined for unknown ids. */
  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    if (task) this.touch(taskId);
    return task;
  }

  /** Lookup without touching retention order */
  peek(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  /** All retained tasks in creation order */
  list(): Task[] {
    return [...this.tasks.values()];
  }

  private assertNotTerminal(task: Task, action: string): void {
    if (isTerminal(task.status)) {
      throw new InvalidStateError(`Cannot ${action} task ${task.id}: already ${task.status}`);
    }
  }

  private setStatus(task: Task, next: TaskStatus, error?: string): void {
    const previousStatus = task.status;
    task.status = next;
    this.touch(task.id);
    logger.debug(`Task ${task.id}: ${previousStatus} → ${next}`);
    this.events?.emitEvent('task:state-changed', { taskId: task.id, previousStatus, newStatus: next, error });
  }

  private touch(taskId: string): void {
    this.lastUsed.set(taskId, ++this.tick);
  }

  /** Drop least-recently-used tasks over the bound, terminal ones first */
  private enforceRetention(keepId: string): void {
    if (this.maxTasks === 0) return;
    while (this.tasks.size > this.maxTasks) {
      const victim = this.pickVictim(keepId, true) ?? this.pickVictim(keepId, false);
      if (!victim) return;
      if (!isTerminal(victim.status)) {
        logger.warn(`Ledger full (${this.maxTasks}) with no finished tasks - evicting active task ${victim.id}`);
      }
      this.tasks.delete(victim.id);
      this.lastUsed.delete(victim.id);
      this.evicted++;
      this.events?.emitEvent('task:evicted', { taskId: victim.id, status: victim.status });
    }
  }

  private pickVictim(keepId: string, terminalOnly: boolean): Task | undefined {
    let victim: Task | undefined;
    let oldest = Infinity;
    for (const task of this.tasks.values()) {
      if (task.id === keepId) continue;
      if (terminalOnly && !isTerminal(task.status)) continue;
      const used = this.lastUsed.get(task.id) ?? 0;
      if (used < oldest) {
        oldest = used;
        victim = task;
      }
    }
    return victim;
  }
}
