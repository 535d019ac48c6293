// mcp-task-delegator/src/server/tools/lifecycleTools.ts
// Task and worker lifecycle tools. Task transitions never cascade to workers;
// each worker is completed or failed on its own.

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { DelegationService } from '../../services/delegationService.js';
import { toolResult } from './toolErrors.js';

export function registerLifecycleTools(server: McpServer, service: DelegationService): void {
  server.tool(
    'dlg_start_task',
    'Mark an assigned task as in progress.',
    { taskId: z.string().describe('Task ID') },
    async ({ taskId }) => toolResult('dlg_start_task', service.startTask(taskId))
  );

  server.tool(
    'dlg_complete_task',
    'Mark a task completed with its final result. Workers are not changed.',
    {
      taskId: z.string().describe('Task ID'),
      result: z.string().describe('Final result text'),
    },
    async ({ taskId, result }) => toolResult('dlg_complete_task', service.completeTask(taskId, result))
  );

  server.tool(
    'dlg_fail_task',
    'Mark a task failed. Workers are not changed.',
    {
      taskId: z.string().describe('Task ID'),
      error: z.string().describe('Failure description'),
    },
    async ({ taskId, error }) => toolResult('dlg_fail_task', service.failTask(taskId, error))
  );

  server.tool(
    'dlg_cancel_task',
    'Cancel a task that has not finished yet.',
    {
      taskId: z.string().describe('Task ID'),
      reason: z.string().optional().describe('Why the task was cancelled'),
    },
    async ({ taskId, reason }) => toolResult('dlg_cancel_task', service.cancelTask(taskId, reason))
  );

  server.tool(
    'dlg_complete_worker',
    'Record a worker result and the tokens it actually used. Re-completing overwrites the previous result.',
    {
      taskId: z.string().describe('Owning task ID'),
      workerId: z.string().describe('Worker ID'),
      result: z.string().describe('Worker result text'),
      actualTokens: z.number().int().describe('Tokens actually used (>= 0)'),
    },
    async ({ taskId, workerId, result, actualTokens }) =>
      toolResult('dlg_complete_worker', service.completeWorker(taskId, workerId, result, actualTokens))
  );

  server.tool(
    'dlg_fail_worker',
    'Record a worker failure.',
    {
      taskId: z.string().describe('Owning task ID'),
      workerId: z.string().describe('Worker ID'),
      error: z.string().describe('Failure description'),
    },
    async ({ taskId, workerId, error }) => toolResult('dlg_fail_worker', service.failWorker(taskId, workerId, error))
  );

  // ===== dlg_execute_task =====
  server.tool(
    'dlg_execute_task',
    'Run every unfinished worker of a task through the configured executor, then complete or fail the task.',
    { taskId: z.string().describe('Task ID') },
    async ({ taskId }) => toolResult('dlg_execute_task', await service.executeTask(taskId))
  );
}
