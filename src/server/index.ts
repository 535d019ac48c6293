#!/usr/bin/env node
// mcp-task-delegator/src/server/index.ts
// MCP server entry point - config, catalog, service, stdio transport, optional HTTP API

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger, setLogLevel } from '../services/logger.js';
import { loadConfig } from '../services/config.js';
import { loadCategoryCatalog } from '../services/categoryCatalog.js';
import { DelegationService } from '../services/delegationService.js';
import { startDashboard, stopDashboard } from '../services/dashboard/index.js';
import { SERVER_NAME, createServer } from './createServer.js';

/** Main entry point */
async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info(`${SERVER_NAME} starting...`);

  const catalog = config.catalogPath ? loadCategoryCatalog(config.catalogPath) : loadCategoryCatalog();
  const service = new DelegationService({
    catalog,
    defaultBudget: config.defaultBudget,
    maxTasks: config.maxTasks,
    executionMode: config.executionMode,
  });

  if (config.httpPort !== undefined) {
    await startDashboard(service, config.httpPort);
  }

  const server = createServer(service);
  await server.connect(new StdioServerTransport());

  logger.info(`${SERVER_NAME} running (${catalog.list().length} categories, default budget ${config.defaultBudget})`);

  let shuttingDown = false;

  function gracefulShutdown(reason: string): void {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Shutting down (${reason})...`);
    Promise.all([stopDashboard(), server.close()])
      .catch((err: unknown) => {
        logger.warn(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
      })
      .finally(() => process.exit(0));
  }

  // Stdio clients stop servers by closing stdin
  process.stdin.on('end', () => gracefulShutdown('stdin closed'));
  process.stdin.on('close', () => gracefulShutdown('stdin closed'));

  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
