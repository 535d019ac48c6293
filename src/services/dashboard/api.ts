// mcp-task-delegator/src/services/dashboard/api.ts
// REST API route handlers for the HTTP server. Same operations as the MCP tools.

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { DelegationService } from '../delegationService.js';
import type { DelegationErrorCode, Result } from '../errors.js';

const STATUS_BY_CODE: Record<DelegationErrorCode, number> = {
  'validation': 400,
  'not-found': 404,
  'invalid-state': 409,
};

const TASK_ACTION = /^\/api\/tasks\/([^/]+)\/(start|complete|fail|cancel|execute)$/;
const WORKER_ACTION = /^\/api\/tasks\/([^/]+)\/workers\/([^/]+)\/(complete|fail)$/;
const TASK_DETAIL = /^\/api\/tasks\/([^/]+)$/;

// ---------------------------------------------------------------------------
// JSON helpers
// ---------------------------------------------------------------------------

export function sendJSON(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data, null, 2));
}

function sendError(res: ServerResponse, status: number, msg: string, code?: DelegationErrorCode): void {
  sendJSON(res, { error: msg, code }, status);
}

function sendResult<T>(res: ServerResponse, result: Result<T>, successStatus = 200): void {
  if (result.ok) {
    sendJSON(res, result.value, successStatus);
  } else {
    sendError(res, STATUS_BY_CODE[result.error.code], result.error.message, result.error.code);
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk: Buffer) => { body += chunk.toString(); });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

class MalformedRequestError extends Error {}

/** Decode one path segment; bad percent-encoding is a client error */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new MalformedRequestError(`Malformed path segment: ${segment}`);
  }
}

/** Parse a JSON object body; empty body → {} */
async function readJSON(req: IncomingMessage): Promise<Record<string, unknown>> {
  const raw = await readBody(req);
  if (raw.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedRequestError('Request body is not valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedRequestError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function stringField(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

// ---------------------------------------------------------------------------
// Route handler - returns true if the request was handled
// ---------------------------------------------------------------------------

export async function handleAPI(service: DelegationService, req: IncomingMessage, res: ServerResponse): Promise<boolean> {
  const url = new URL(req.url || '/', 'http://localhost').pathname;
  const method = req.method || 'GET';

  try {
    return await route(service, url, method, req, res);
  } catch (err: unknown) {
    if (err instanceof MalformedRequestError) {
      sendError(res, 400, err.message);
      return true;
    }
    throw err;
  }
}

async function route(
  service: DelegationService,
  url: string,
  method: string,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<boolean> {
  if (url === '/api/health' && method === 'GET') {
    sendJSON(res, { status: 'ok', tasks: service.ledger.size, capacity: service.ledger.capacity });
    return true;
  }

  if (url === '/api/categories' && method === 'GET') {
    sendJSON(res, service.listCategories());
    return true;
  }

  if (url === '/api/stats' && method === 'GET') {
    sendJSON(res, service.getStatistics());
    return true;
  }

  if (url === '/api/tasks' && method === 'GET') {
    sendJSON(res, service.listTasks());
    return true;
  }

  if (url === '/api/tasks' && method === 'POST') {
    sendResult(res, service.delegate(await readJSON(req)), 201);
    return true;
  }

  const workerAction = method === 'POST' ? WORKER_ACTION.exec(url) : null;
  if (workerAction) {
    const [, rawTaskId, rawWorkerId, action] = workerAction;
    const taskId = decodeSegment(rawTaskId);
    const workerId = decodeSegment(rawWorkerId);
    const body = await readJSON(req);
    if (action === 'complete') {
      const actualTokens = body.actualTokens;
      if (typeof actualTokens !== 'number') {
        sendError(res, 400, 'actualTokens must be a number', 'validation');
        return true;
      }
      sendResult(res, service.completeWorker(taskId, workerId, stringField(body, 'result') ?? '', actualTokens));
    } else {
      sendResult(res, service.failWorker(taskId, workerId, stringField(body, 'error') ?? 'Worker failed'));
    }
    return true;
  }

  const taskAction = method === 'POST' ? TASK_ACTION.exec(url) : null;
  if (taskAction) {
    const taskId = decodeSegment(taskAction[1]);
    const body = await readJSON(req);
    switch (taskAction[2]) {
      case 'start':
        sendResult(res, service.startTask(taskId));
        break;
      case 'complete':
        sendResult(res, service.completeTask(taskId, stringField(body, 'result') ?? ''));
        break;
      case 'fail':
        sendResult(res, service.failTask(taskId, stringField(body, 'error') ?? 'Task failed'));
        break;
      case 'cancel':
        sendResult(res, service.cancelTask(taskId, stringField(body, 'reason')));
        break;
      default:
        sendResult(res, await service.executeTask(taskId));
    }
    return true;
  }

  const detail = method === 'GET' ? TASK_DETAIL.exec(url) : null;
  if (detail) {
    const taskId = decodeSegment(detail[1]);
    const snapshot = service.getTaskStatus(taskId);
    if (snapshot) {
      sendJSON(res, snapshot);
    } else {
      sendError(res, 404, `Task ${taskId} not found`, 'not-found');
    }
    return true;
  }

  return false;
}
