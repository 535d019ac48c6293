// mcp-task-delegator/src/server/eventWiring.ts
// Wire delegation events → MCP logging notifications + resource change signals

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';
import type { DelegationEventBus } from '../services/events.js';
import { logger } from '../services/logger.js';

export function wireEvents(server: McpServer, events: DelegationEventBus): void {
  const notify = (level: LoggingLevel, data: Record<string, unknown>): void => {
    server.sendLoggingMessage({ level, data }).catch((err: unknown) => {
      logger.debug(`MCP logging notification dropped: ${err instanceof Error ? err.message : String(err)}`);
    });
  };

  events.onEvent('task:delegated', (data) => {
    notify('info', { event: 'task:delegated', ...data });
    server.sendResourceListChanged();
  });
  events.onEvent('task:state-changed', (data) => {
    const level = data.newStatus === 'failed' ? 'warning' : 'info';
    notify(level, { event: 'task:state-changed', ...data });
    server.sendResourceListChanged();
  });
  events.onEvent('task:evicted', (data) => {
    notify('notice', { event: 'task:evicted', ...data });
    server.sendResourceListChanged();
  });
  events.onEvent('worker:completed', (data) => {
    notify('debug', { event: 'worker:completed', ...data });
  });
  events.onEvent('worker:failed', (data) => {
    notify('warning', { event: 'worker:failed', ...data });
  });
}
