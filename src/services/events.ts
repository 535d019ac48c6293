// mcp-task-delegator/src/services/events.ts
// Typed event bus for delegation lifecycle events.
// Each DelegationService owns one bus; the server layer subscribes to push
// MCP logging notifications and resource-change signals.

import { EventEmitter } from 'node:events';
import type { CategoryId, TaskStatus } from '../types/index.js';

export interface DelegationEvents {
  'task:delegated': {
    taskId: string;
    category: CategoryId;
    workerCount: number;
    totalBudget: number;
    estimatedSavingsPercent: number;
  };
  'task:state-changed': { taskId: string; previousStatus: TaskStatus; newStatus: TaskStatus; error?: string };
  'task:evicted': { taskId: string; status: TaskStatus };
  'worker:completed': { taskId: string; workerId: string; actualTokens: number };
  'worker:failed': { taskId: string; workerId: string; error: string };
}

export type DelegationEventName = keyof DelegationEvents;

export const ALL_EVENT_NAMES: DelegationEventName[] = [
  'task:delegated', 'task:state-changed', 'task:evicted',
  'worker:completed', 'worker:failed',
];

export class DelegationEventBus extends EventEmitter {
  /** Type-safe emit */
  emitEvent<K extends DelegationEventName>(event: K, data: DelegationEvents[K]): void {
    this.emit(event, data);
  }

  /** Type-safe subscribe */
  onEvent<K extends DelegationEventName>(event: K, handler: (data: DelegationEvents[K]) => void): void {
    this.on(event, handler);
  }

  offEvent<K extends DelegationEventName>(event: K, handler: (data: DelegationEvents[K]) => void): void {
    this.off(event, handler);
  }
}
