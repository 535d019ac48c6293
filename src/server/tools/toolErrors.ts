// mcp-task-delegator/src/server/tools/toolErrors.ts
// Shared tool response helpers. Failed calls carry the expected parameter
// schema so the calling agent can correct its invocation.

import type { ErrorInfo, Result } from '../../services/errors.js';

/** Schema hints keyed by tool name → param name → description */
const TOOL_SCHEMAS: Record<string, Record<string, string>> = {
  // ----- delegationTools -----
  dlg_delegate_task: {
    description: 'string (required) - the task to delegate',
    category: 'string (optional) - "decompose"|"notify"|"research"|"troubleshoot"|"consensus"|"parallel" or an alias; unknown values are auto-classified',
    priority: 'enum (default: "medium") - "low"|"medium"|"high"|"critical"',
    maxTokens: 'integer > 0 (optional, default: server default budget) - total token budget',
    subtasks: 'string[] (optional) - explicit sub-items, overrides the category template',
  },
  dlg_task_status: {
    taskId: 'string (required) - task ID returned by dlg_delegate_task',
  },
  dlg_list_tasks: {
    status: 'enum (optional) - "pending"|"assigned"|"in_progress"|"completed"|"failed"|"cancelled"',
  },
  dlg_get_statistics: {},
  dlg_analyze_task: {
    description: 'string (required) - task text to classify without storing anything',
  },
  dlg_list_categories: {},

  // ----- lifecycleTools -----
  dlg_start_task: {
    taskId: 'string (required) - task in state "assigned"',
  },
  dlg_complete_task: {
    taskId: 'string (required) - task to complete',
    result: 'string (required) - final result text',
  },
  dlg_fail_task: {
    taskId: 'string (required) - task to fail',
    error: 'string (required) - failure description',
  },
  dlg_cancel_task: {
    taskId: 'string (required) - task to cancel',
    reason: 'string (optional) - why it was cancelled',
  },
  dlg_complete_worker: {
    taskId: 'string (required) - owning task ID',
    workerId: 'string (required) - worker ID from dlg_task_status',
    result: 'string (required) - worker result text',
    actualTokens: 'integer >= 0 (required) - tokens actually used',
  },
  dlg_fail_worker: {
    taskId: 'string (required) - owning task ID',
    workerId: 'string (required) - worker ID from dlg_task_status',
    error: 'string (required) - failure description',
  },
  dlg_execute_task: {
    taskId: 'string (required) - task in state "assigned" or "in_progress"',
  },
};

/** Lookup used by tests and the error helper */
export function getToolSchema(tool: string): Record<string, string> {
  return TOOL_SCHEMAS[tool] || {};
}

/** Standardized error response with schema hints for self-correction */
export function toolError(tool: string, message: string, code?: ErrorInfo['code']) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify({
        error: message,
        code,
        tool,
        expectedSchema: getToolSchema(tool),
      }, null, 2),
    }],
    isError: true as const,
  };
}

/** Plain JSON success response */
export function toolJson(data: unknown) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(data, null, 2),
    }],
  };
}

/** Map a service Result onto a tool response */
export function toolResult<T>(tool: string, result: Result<T>) {
  return result.ok ? toolJson(result.value) : toolError(tool, result.error.message, result.error.code);
}
