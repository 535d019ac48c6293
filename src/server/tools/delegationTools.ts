// mcp-task-delegator/src/server/tools/delegationTools.ts
// Delegation and query tools: delegate, status, list, statistics, analyze, categories

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { TASK_STATUSES } from '../../types/index.js';
import type { DelegationService } from '../../services/delegationService.js';
import { toolError, toolJson, toolResult } from './toolErrors.js';

export function registerDelegationTools(server: McpServer, service: DelegationService): void {
  // ===== dlg_delegate_task =====
  server.tool(
    'dlg_delegate_task',
    'Delegate a task: classify it, split it into worker sub-items, and allocate the token budget across them.',
    {
      description: z.string().describe('Description of the task to delegate'),
      category: z.string().optional().describe('Category id or alias; omit for automatic classification'),
      priority: z.string().optional().describe('low | medium | high | critical, case-insensitive (default medium)'),
      maxTokens: z.number().int().optional().describe('Total token budget for the task'),
      subtasks: z.array(z.string()).optional().describe('Explicit sub-items; overrides the category template'),
    },
    async (args) => toolResult('dlg_delegate_task', service.delegate(args))
  );

  // ===== dlg_task_status =====
  server.tool(
    'dlg_task_status',
    'Get the current state of a delegated task, including every worker and the token savings so far.',
    {
      taskId: z.string().describe('Task ID returned by dlg_delegate_task'),
    },
    async ({ taskId }) => {
      const snapshot = service.getTaskStatus(taskId);
      if (!snapshot) {
        return toolError('dlg_task_status', `Task ${taskId} not found`, 'not-found');
      }
      return toolJson(snapshot);
    }
  );

  // ===== dlg_list_tasks =====
  server.tool(
    'dlg_list_tasks',
    'List delegated tasks with truncated descriptions. Optionally filter by status.',
    {
      status: z.enum(TASK_STATUSES).optional().describe('Only tasks in this status'),
    },
    async ({ status }) => {
      const tasks = service.listTasks().filter(t => !status || t.status === status);
      return toolJson({ total: tasks.length, tasks });
    }
  );

  // ===== dlg_get_statistics =====
  server.tool(
    'dlg_get_statistics',
    'Aggregate statistics: task counts by status, average savings of completed tasks, workers deployed, category distribution.',
    {},
    async () => toolJson(service.getStatistics())
  );

  // ===== dlg_analyze_task =====
  server.tool(
    'dlg_analyze_task',
    'Preview how a task would be classified and decomposed without delegating it.',
    {
      description: z.string().describe('Task description to analyze'),
    },
    async ({ description }) => toolResult('dlg_analyze_task', service.analyze(description))
  );

  // ===== dlg_list_categories =====
  server.tool(
    'dlg_list_categories',
    'List the task categories with their keywords, templates and efficiency multipliers.',
    {},
    async () => toolJson(service.listCategories())
  );
}
