// tests/mcp-server.test.ts
// MCP surface - tools, resources, prompt and logging notifications over an
// in-memory transport pair.

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { LoggingMessageNotificationSchema } from '@modelcontextprotocol/sdk/types.js';
import type { LoggingMessageNotification } from '@modelcontextprotocol/sdk/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer } from '../src/server/createServer.js';
import { createService } from './helpers/setup.js';

let server: McpServer;
let client: Client;

beforeEach(async () => {
  server = createServer(createService({ defaultBudget: 8000 }));
  client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await server.close();
});

/** Text of the first content item of a tool result or resource read */
function firstText(result: unknown, key: 'content' | 'contents' = 'content'): string {
  if (typeof result === 'object' && result !== null && key in result) {
    const items: unknown = Reflect.get(result, key);
    const first: unknown = Array.isArray(items) ? items[0] : undefined;
    if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
      return first.text;
    }
  }
  throw new Error('result has no text content');
}

function isErrorResult(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'isError' in result && result.isError === true;
}

describe('tools', () => {
  it('registers the delegation and lifecycle tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([
      'dlg_analyze_task',
      'dlg_cancel_task',
      'dlg_complete_task',
      'dlg_complete_worker',
      'dlg_delegate_task',
      'dlg_execute_task',
      'dlg_fail_task',
      'dlg_fail_worker',
      'dlg_get_statistics',
      'dlg_list_categories',
      'dlg_list_tasks',
      'dlg_start_task',
      'dlg_task_status',
    ]);
  });

  it('delegates through dlg_delegate_task', async () => {
    const result = await client.callTool({
      name: 'dlg_delegate_task',
      arguments: { description: 'List all files in a directory' },
    });
    expect(isErrorResult(result)).toBe(false);
    expect(JSON.parse(firstText(result))).toEqual({
      taskId: 'task-1',
      category: 'notify',
      specialty: 'messenger',
      workerCount: 1,
      estimatedTokensPerWorker: 7200,
      estimatedSavingsPercent: 10,
      message: 'Task delegated to 1 worker using notify category',
    });
  });

  it('accepts priority in any case', async () => {
    const result = await client.callTool({
      name: 'dlg_delegate_task',
      arguments: { description: 'Quick status', priority: 'HIGH' },
    });
    expect(isErrorResult(result)).toBe(false);
    const status = JSON.parse(firstText(await client.callTool({ name: 'dlg_task_status', arguments: { taskId: 'task-1' } })));
    expect(status.priority).toBe('high');
  });

  it('returns an error result with schema hints for a bad budget', async () => {
    const result = await client.callTool({
      name: 'dlg_delegate_task',
      arguments: { description: 'List files', maxTokens: -5 },
    });
    expect(isErrorResult(result)).toBe(true);
    const body = JSON.parse(firstText(result));
    expect(body.error).toBe('maxTokens: maxTokens must be greater than 0');
    expect(body.code).toBe('validation');
    expect(Object.keys(body.expectedSchema)).toEqual(['description', 'category', 'priority', 'maxTokens', 'subtasks']);
  });

  it('reports unknown tasks as errors', async () => {
    const result = await client.callTool({ name: 'dlg_task_status', arguments: { taskId: 'task-404' } });
    expect(isErrorResult(result)).toBe(true);
    expect(JSON.parse(firstText(result))).toMatchObject({ error: 'Task task-404 not found', code: 'not-found' });
  });

  it('filters the task list by status', async () => {
    await client.callTool({ name: 'dlg_delegate_task', arguments: { description: 'one' } });
    await client.callTool({ name: 'dlg_delegate_task', arguments: { description: 'two' } });
    await client.callTool({ name: 'dlg_cancel_task', arguments: { taskId: 'task-2' } });

    const all = JSON.parse(firstText(await client.callTool({ name: 'dlg_list_tasks', arguments: {} })));
    const cancelled = JSON.parse(firstText(await client.callTool({
      name: 'dlg_list_tasks', arguments: { status: 'cancelled' },
    })));
    expect(all.total).toBe(2);
    expect(cancelled.total).toBe(1);
    expect(cancelled.tasks[0].taskId).toBe('task-2');
  });

  it('executes and reports statistics', async () => {
    await client.callTool({
      name: 'dlg_delegate_task',
      arguments: { description: 'Analyze and decompose this complex system architecture', maxTokens: 10000 },
    });
    const executed = JSON.parse(firstText(await client.callTool({
      name: 'dlg_execute_task', arguments: { taskId: 'task-1' },
    })));
    expect(executed.status).toBe('completed');

    const stats = JSON.parse(firstText(await client.callTool({ name: 'dlg_get_statistics', arguments: {} })));
    expect(stats).toMatchObject({ totalTasks: 1, completedTasks: 1, averageSavings: 85, totalWorkers: 4 });
  });
});

describe('resources', () => {
  it('serves statistics and the task details template', async () => {
    await client.callTool({ name: 'dlg_delegate_task', arguments: { description: 'Fix the bug' } });

    const status = JSON.parse(firstText(await client.readResource({ uri: 'delegator://status' }), 'contents'));
    expect(status).toMatchObject({ totalTasks: 1, activeTasks: 1 });

    const details = JSON.parse(firstText(await client.readResource({ uri: 'delegator://tasks/task-1' }), 'contents'));
    expect(details).toMatchObject({ taskId: 'task-1', category: 'troubleshoot', workerCount: 3 });

    const missing = JSON.parse(firstText(await client.readResource({ uri: 'delegator://tasks/nope' }), 'contents'));
    expect(missing).toEqual({ error: 'Task nope not found' });
  });

  it('lists the static resources', async () => {
    const { resources } = await client.listResources();
    expect(resources.map(r => r.uri).sort()).toEqual([
      'delegator://categories', 'delegator://status', 'delegator://tasks',
    ]);
  });
});

describe('prompt', () => {
  it('suggests a category with the proposed sub-items', async () => {
    const prompt = await client.getPrompt({
      name: 'analyze_task_for_delegation',
      arguments: { description: 'Fix the bug' },
    });
    const content = prompt.messages[0].content;
    if (content.type !== 'text') throw new Error('expected text prompt');
    const lines = content.text.split('\n');
    expect(lines).toContain('Task: Fix the bug');
    expect(lines).toContain('- troubleshoot: Errors, failures and debugging. Score 2 (matched: fix, bug)');
    expect(lines).toContain('Suggested category: troubleshoot (debugger)');
    expect(lines).toContain('1. Identify root cause of: Fix the bug');
  });
});

describe('notifications', () => {
  it('forwards delegation events as logging messages', async () => {
    const received = new Promise<LoggingMessageNotification['params']>((resolve) => {
      client.setNotificationHandler(LoggingMessageNotificationSchema, (notification) => {
        const data: unknown = notification.params.data;
        // pending → assigned is announced first
        if (typeof data === 'object' && data !== null && 'event' in data && data.event === 'task:delegated') {
          resolve(notification.params);
        }
      });
    });
    await client.callTool({ name: 'dlg_delegate_task', arguments: { description: 'Quick status' } });
    const params = await received;
    expect(params.level).toBe('info');
    expect(params.data).toMatchObject({ event: 'task:delegated', taskId: 'task-1', category: 'notify' });
  });
});
