// mcp-task-delegator/src/services/delegationService.ts
// Delegation pipeline and the single entry point transports call into.
// classify → decompose → allocate → create workers → ledger task → response.
//
// Every public operation returns a tagged Result; DelegationErrors are turned
// into error results here, anything else is logged as a defect and rethrown.

import { z } from 'zod';
import { TASK_PRIORITIES } from '../types/index.js';
import type {
  CategoryDefinition,
  CategoryId,
  CategoryScore,
  DelegationResponse,
  LedgerStatistics,
  Task,
  TaskSnapshot,
  TaskSummary,
  Worker,
} from '../types/index.js';
import type { CategoryCatalog } from './categoryCatalog.js';
import { classify, scoreCategories } from './classifier.js';
import { decompose } from './decomposer.js';
import { allocate } from './budgetAllocator.js';
import { completeWorker, createWorkers, defaultWorkerId, failWorker, startWorker } from './workerRegistry.js';
import type { IdGenerator } from './workerRegistry.js';
import { TaskLedger } from './taskLedger.js';
import { computeLedgerStatistics, computeTaskSavings } from './statistics.js';
import { toTaskSnapshot, toTaskSummary } from './snapshot.js';
import { DelegationEventBus } from './events.js';
import { DelegationError, InvalidStateError, NotFoundError, ValidationError, fail, ok } from './errors.js';
import type { Result } from './errors.js';
import { runWorkers, simulatedExecutor } from './workerExecutor.js';
import type { ExecutionMode, WorkerExecutor, WorkerOutcome } from './workerExecutor.js';
import { DEFAULT_BUDGET, DEFAULT_MAX_TASKS } from './config.js';
import { logger } from './logger.js';

const notBlank = (s: string) => s.trim().length > 0;

const delegationRequestSchema = z.object({
  description: z.string({ required_error: 'description is required' })
    .refine(notBlank, 'Task description must not be empty'),
  category: z.string().optional(),
  priority: z.string().trim().toLowerCase().pipe(z.enum(TASK_PRIORITIES)).default('medium'),
  maxTokens: z.number().int('maxTokens must be an integer').positive('maxTokens must be greater than 0').optional(),
  subtasks: z.array(z.string().refine(notBlank, 'Subtasks must not be blank')).optional(),
});

export interface DelegationServiceOptions {
  catalog: CategoryCatalog;
  defaultBudget?: number;
  maxTasks?: number;
  executionMode?: ExecutionMode;
  executor?: WorkerExecutor;
  nextTaskId?: IdGenerator;
  nextWorkerId?: IdGenerator;
}

export interface TaskAnalysis {
  category: CategoryId;
  specialty: string;
  scores: CategoryScore[];
  subtasks: string[];
}

export interface CategorySummary {
  id: CategoryId;
  description: string;
  specialty: string;
  efficiencyMultiplier: number;
  keywords: readonly string[];
  template: readonly string[];
  aliases: readonly string[];
  isDefault: boolean;
}

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

export class DelegationService {
  readonly events = new DelegationEventBus();
  readonly catalog: CategoryCatalog;
  readonly ledger: TaskLedger;
  readonly defaultBudget: number;
  readonly executionMode: ExecutionMode;
  private readonly executor: WorkerExecutor;
  private readonly nextWorkerId: IdGenerator;

  constructor(options: DelegationServiceOptions) {
    this.catalog = options.catalog;
    this.defaultBudget = options.defaultBudget ?? DEFAULT_BUDGET;
    this.executionMode = options.executionMode ?? 'parallel';
    this.executor = options.executor ?? simulatedExecutor;
    this.nextWorkerId = options.nextWorkerId ?? defaultWorkerId;
    this.ledger = new TaskLedger({
      maxTasks: options.maxTasks ?? DEFAULT_MAX_TASKS,
      events: this.events,
      nextId: options.nextTaskId,
    });
  }

  // -------------------------------------------------------------------------
  // Delegation
  // -------------------------------------------------------------------------

  /** Validate a raw request, build the task and its workers, store it */
  delegate(request: unknown): Result<DelegationResponse> {
    return this.guard('delegate', () => {
      const parsed = delegationRequestSchema.safeParse(request);
      if (!parsed.success) throw new ValidationError(describeIssue(parsed.error.issues[0]));
      const input = parsed.data;

      const category = this.resolveCategory(input.description, input.category);
      const definition = this.catalog.get(category);
      const totalBudget = input.maxTokens ?? this.defaultBudget;
      const subtasks = decompose(input.description, definition, input.subtasks);
      const estimate = allocate(totalBudget, subtasks.length, definition);
      const workers = createWorkers(definition, subtasks, estimate, this.nextWorkerId);

      const task = this.ledger.createTask(input.description, input.priority, category, totalBudget);
      this.ledger.assign(task, workers);

      const savings = computeTaskSavings(task);
      logger.info(`Delegated task ${task.id} to ${workers.length} worker(s) using ${category}`, {
        totalBudget, estimate, savings,
      });
      this.events.emitEvent('task:delegated', {
        taskId: task.id,
        category,
        workerCount: workers.length,
        totalBudget,
        estimatedSavingsPercent: savings,
      });

      return {
        taskId: task.id,
        category,
        specialty: definition.specialty,
        workerCount: workers.length,
        estimatedTokensPerWorker: estimate,
        estimatedSavingsPercent: savings,
        message: `Task delegated to ${workers.length} worker${workers.length === 1 ? '' : 's'} using ${category} category`,
      };
    });
  }

  /** Classification preview - nothing is stored */
  analyze(description: string): Result<TaskAnalysis> {
    return this.guard('analyze', () => {
      if (!notBlank(description)) throw new ValidationError('Task description must not be empty');
      const category = classify(description, this.catalog);
      const definition = this.catalog.get(category);
      return {
        category,
        specialty: definition.specialty,
        scores: scoreCategories(description, this.catalog),
        subtasks: decompose(description, definition),
      };
    });
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Snapshot of one task, or undefined when the id is unknown */
  getTaskStatus(taskId: string): TaskSnapshot | undefined {
    const task = this.ledger.get(taskId);
    return task ? toTaskSnapshot(task) : undefined;
  }

  listTasks(): TaskSummary[] {
    return this.ledger.list().map(toTaskSummary);
  }

  getStatistics(): LedgerStatistics {
    return computeLedgerStatistics(this.ledger.list(), this.ledger.evictedCount);
  }

  listCategories(): CategorySummary[] {
    return this.catalog.list().map((def: CategoryDefinition) => ({
      id: def.id,
      description: def.description,
      specialty: def.specialty,
      efficiencyMultiplier: def.efficiencyMultiplier,
      keywords: def.keywords,
      template: def.template,
      aliases: def.aliases,
      isDefault: def.id === this.catalog.defaultCategory,
    }));
  }

  // -------------------------------------------------------------------------
  // Task lifecycle
  // -------------------------------------------------------------------------

  startTask(taskId: string): Result<TaskSnapshot> {
    return this.guard('startTask', () => {
      const task = this.findTask(taskId);
      this.ledger.start(task);
      return toTaskSnapshot(task);
    });
  }

  /** Completes the task only; workers keep whatever state they are in */
  completeTask(taskId: string, result: string): Result<TaskSnapshot> {
    return this.guard('completeTask', () => {
      const task = this.findTask(taskId);
      this.ledger.complete(task, result);
      return toTaskSnapshot(task);
    });
  }

  failTask(taskId: string, error: string): Result<TaskSnapshot> {
    return this.guard('failTask', () => {
      const task = this.findTask(taskId);
      this.ledger.fail(task, error);
      return toTaskSnapshot(task);
    });
  }

  cancelTask(taskId: string, reason?: string): Result<TaskSnapshot> {
    return this.guard('cancelTask', () => {
      const task = this.findTask(taskId);
      this.ledger.cancel(task, reason);
      return toTaskSnapshot(task);
    });
  }

  // -------------------------------------------------------------------------
  // Worker lifecycle
  // -------------------------------------------------------------------------

  completeWorker(taskId: string, workerId: string, result: string, actualTokens: number): Result<TaskSnapshot> {
    return this.guard('completeWorker', () => {
      const task = this.findTask(taskId);
      const worker = this.findWorker(task, workerId);
      completeWorker(worker, result, actualTokens);
      this.events.emitEvent('worker:completed', { taskId, workerId, actualTokens });
      return toTaskSnapshot(task);
    });
  }

  failWorker(taskId: string, workerId: string, error: string): Result<TaskSnapshot> {
    return this.guard('failWorker', () => {
      const task = this.findTask(taskId);
      const worker = this.findWorker(task, workerId);
      failWorker(worker, error);
      this.events.emitEvent('worker:failed', { taskId, workerId, error });
      return toTaskSnapshot(task);
    });
  }

  /**
   * Run every unfinished worker through the executor, then close the task:
   * completed when every worker completed, failed otherwise. Refused while
   * another execution of the same task is still running.
   */
  async executeTask(taskId: string): Promise<Result<TaskSnapshot>> {
    return this.guardAsync('executeTask', async () => {
      const task = this.findTask(taskId);
      if (task.workers.some(w => w.status === 'in_progress')) {
        throw new InvalidStateError(`Task ${task.id} is already executing`);
      }
      if (task.status === 'assigned') {
        this.ledger.start(task);
      } else if (task.status !== 'in_progress') {
        throw new InvalidStateError(`Task ${task.id} cannot be executed from ${task.status}`);
      }

      const pending = task.workers.filter(w => w.status === 'assigned');
      for (const worker of pending) startWorker(worker);

      const outcomes = await runWorkers(pending, task, this.executor, this.executionMode);
      outcomes.forEach((outcome, i) => this.applyOutcome(task, pending[i], outcome));

      if (task.status !== 'in_progress') {
        logger.warn(`Task ${task.id} changed to ${task.status} during execution - leaving it as is`);
        return toTaskSnapshot(task);
      }

      const failed = task.workers.filter(w => w.status !== 'completed').length;
      if (failed === 0) {
        this.ledger.complete(task, task.workers.map(w => w.result ?? '').join('\n'));
      } else {
        this.ledger.fail(task, `${failed} of ${task.workers.length} worker(s) failed`);
      }
      return toTaskSnapshot(task);
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private resolveCategory(description: string, requested?: string): CategoryId {
    if (requested !== undefined) {
      const resolved = this.catalog.resolve(requested);
      if (resolved) return classify(description, this.catalog, resolved);
      logger.warn(`Unknown category "${requested}", using automatic classification`);
    }
    return classify(description, this.catalog);
  }

  private findTask(taskId: string): Task {
    const task = this.ledger.get(taskId);
    if (!task) throw new NotFoundError(`Task ${taskId} not found`);
    return task;
  }

  private findWorker(task: Task, workerId: string): Worker {
    const worker = task.workers.find(w => w.id === workerId);
    if (!worker) throw new NotFoundError(`Worker ${workerId} not found in task ${task.id}`);
    return worker;
  }

  private applyOutcome(task: Task, worker: Worker, outcome: PromiseSettledResult<WorkerOutcome>): void {
    if (outcome.status === 'fulfilled') {
      try {
        completeWorker(worker, outcome.value.result, outcome.value.actualTokens);
        this.events.emitEvent('worker:completed', {
          taskId: task.id, workerId: worker.id, actualTokens: outcome.value.actualTokens,
        });
        return;
      } catch (err: unknown) {
        if (!(err instanceof DelegationError)) throw err;
        this.recordWorkerFailure(task, worker, `Executor returned an invalid outcome: ${err.message}`);
        return;
      }
    }
    this.recordWorkerFailure(task, worker, errorMessage(outcome.reason));
  }

  private recordWorkerFailure(task: Task, worker: Worker, error: string): void {
    failWorker(worker, error);
    logger.warn(`Worker ${worker.id} of task ${task.id} failed: ${error}`);
    this.events.emitEvent('worker:failed', { taskId: task.id, workerId: worker.id, error });
  }

  private guard<T>(operation: string, fn: () => T): Result<T> {
    try {
      return ok(fn());
    } catch (err: unknown) {
      return this.handleError(operation, err);
    }
  }

  private async guardAsync<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await fn());
    } catch (err: unknown) {
      return this.handleError(operation, err);
    }
  }

  private handleError<T>(operation: string, err: unknown): Result<T> {
    if (err instanceof DelegationError) {
      logger.debug(`${operation} rejected (${err.code}): ${err.message}`);
      return fail(err);
    }
    logger.error(`${operation} failed unexpectedly: ${errorMessage(err)}`);
    throw err;
  }
}
