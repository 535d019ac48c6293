// mcp-task-delegator/src/server/resources.ts
// MCP resource registrations: statistics, task list, per-task details, category catalog

import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DelegationService } from '../services/delegationService.js';

function jsonContents(uri: string, data: unknown) {
  return {
    contents: [{
      uri,
      text: JSON.stringify(data, null, 2),
      mimeType: 'application/json',
    }],
  };
}

export function registerResources(server: McpServer, service: DelegationService): void {
  // ===== delegator://status =====
  server.resource(
    'delegation-status',
    'delegator://status',
    { description: 'Aggregate delegation statistics', mimeType: 'application/json' },
    async (uri) => jsonContents(uri.href, service.getStatistics())
  );

  // ===== delegator://tasks =====
  server.resource(
    'delegation-tasks',
    'delegator://tasks',
    { description: 'Summaries of all retained tasks', mimeType: 'application/json' },
    async (uri) => jsonContents(uri.href, service.listTasks())
  );

  // ===== delegator://categories =====
  server.resource(
    'delegation-categories',
    'delegator://categories',
    { description: 'Category catalog used for classification', mimeType: 'application/json' },
    async (uri) => jsonContents(uri.href, service.listCategories())
  );

  // ===== delegator://tasks/{taskId} =====
  server.resource(
    'delegation-task-details',
    new ResourceTemplate('delegator://tasks/{taskId}', { list: undefined }),
    { description: 'Full snapshot of one task and its workers', mimeType: 'application/json' },
    async (uri, variables) => {
      const raw = variables.taskId;
      const taskId = Array.isArray(raw) ? raw[0] : raw;
      const snapshot = taskId ? service.getTaskStatus(taskId) : undefined;
      return jsonContents(uri.href, snapshot ?? { error: `Task ${taskId} not found` });
    }
  );
}
