// mcp-task-delegator/src/services/dashboard/index.ts
// JSON HTTP API server start/stop.

import { createServer as createHttpServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { logger } from '../logger.js';
import type { DelegationService } from '../delegationService.js';
import { handleAPI, sendJSON } from './api.js';

let serverInstance: Server | null = null;

/** Start the HTTP API. Resolves with the bound port (useful with port 0). */
export function startDashboard(service: DelegationService, port: number, host = '127.0.0.1'): Promise<number> {
  if (serverInstance) {
    const address = serverInstance.address();
    logger.warn('HTTP API already running');
    return Promise.resolve(isAddressInfo(address) ? address.port : port);
  }

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(service, req, res).catch((err: unknown) => {
      logger.error(`HTTP ${req.method} ${req.url} failed: ${err instanceof Error ? err.message : String(err)}`);
      if (!res.headersSent) sendJSON(res, { error: 'Internal server error' }, 500);
      else res.end();
    });
  });
  serverInstance = server;

  return new Promise((resolve, reject) => {
    server.once('error', (err: NodeJS.ErrnoException) => {
      logger.error(`HTTP API error: ${err.message}`);
      serverInstance = null;
      reject(err);
    });
    server.listen(port, host, () => {
      const address = server.address();
      const actual = isAddressInfo(address) ? address.port : port;
      logger.info(`HTTP API listening at http://${host}:${actual}`);
      resolve(actual);
    });
  });
}

/** Stop the HTTP API if it is running */
export function stopDashboard(): Promise<void> {
  const server = serverInstance;
  serverInstance = null;
  if (!server) return Promise.resolve();
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}

async function handleRequest(service: DelegationService, req: IncomingMessage, res: ServerResponse): Promise<void> {
  // CORS preflight
  if (req.method === 'OPTIONS') {
    res.writeHead(204, {
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, POST',
      'Access-Control-Allow-Headers': '*',
    });
    res.end();
    return;
  }

  if (await handleAPI(service, req, res)) return;

  sendJSON(res, { error: `No route for ${req.method} ${req.url}` }, 404);
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
