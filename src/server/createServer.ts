// mcp-task-delegator/src/server/createServer.ts
// Assembles the MCP server: tools, resources, prompts and event wiring

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DelegationService } from '../services/delegationService.js';
import { registerDelegationTools } from './tools/delegationTools.js';
import { registerLifecycleTools } from './tools/lifecycleTools.js';
import { registerResources } from './resources.js';
import { registerPrompts } from './prompts.js';
import { wireEvents } from './eventWiring.js';

export const SERVER_NAME = 'mcp-task-delegator';
export const SERVER_VERSION = '1.0.0';

/** Create and configure the MCP server around a delegation service */
export function createServer(service: DelegationService): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { logging: {} } },
  );

  registerDelegationTools(server, service);
  registerLifecycleTools(server, service);
  registerResources(server, service);
  registerPrompts(server, service);

  // Delegation events → MCP logging/resource notifications
  wireEvents(server, service.events);

  return server;
}
