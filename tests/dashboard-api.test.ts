// tests/dashboard-api.test.ts
// HTTP API routes against a real server on an ephemeral port.

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startDashboard, stopDashboard } from '../src/services/dashboard/index.js';
import type { DelegationService } from '../src/services/delegationService.js';
import { createService } from './helpers/setup.js';

let service: DelegationService;
let base: string;

beforeEach(async () => {
  service = createService();
  const port = await startDashboard(service, 0);
  base = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  await stopDashboard();
});

function post(path: string, body?: unknown): Promise<Response> {
  return fetch(base + path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

const COMPLEX = { description: 'Analyze and decompose this complex system architecture', maxTokens: 10000 };

describe('HTTP API', () => {
  it('reports health', async () => {
    const res = await fetch(`${base}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', tasks: 0, capacity: 1000 });
  });

  it('delegates a task', async () => {
    const res = await post('/api/tasks', COMPLEX);
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      taskId: 'task-1', category: 'decompose', workerCount: 4, estimatedTokensPerWorker: 750,
    });
  });

  it('maps validation failures to 400', async () => {
    const res = await post('/api/tasks', { description: 'List files', maxTokens: -5 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'maxTokens: maxTokens must be greater than 0', code: 'validation' });
    expect(service.ledger.size).toBe(0);
  });

  it('rejects a malformed body', async () => {
    const res = await fetch(`${base}/api/tasks`, { method: 'POST', body: '{ nope' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('returns task details and 404 for unknown tasks', async () => {
    await post('/api/tasks', COMPLEX);
    const found = await fetch(`${base}/api/tasks/task-1`);
    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ taskId: 'task-1', status: 'assigned', workerCount: 4 });

    const missing = await fetch(`${base}/api/tasks/task-404`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Task task-404 not found', code: 'not-found' });
  });

  it('lists tasks', async () => {
    await post('/api/tasks', COMPLEX);
    const res = await fetch(`${base}/api/tasks`);
    expect(await res.json()).toEqual([{
      taskId: 'task-1',
      description: COMPLEX.description,
      status: 'assigned',
      category: 'decompose',
      priority: 'medium',
      workerCount: 4,
    }]);
  });

  it('maps invalid transitions to 409', async () => {
    await post('/api/tasks', COMPLEX);
    expect((await post('/api/tasks/task-1/start')).status).toBe(200);
    const again = await post('/api/tasks/task-1/start');
    expect(again.status).toBe(409);
    expect(await again.json()).toEqual({ error: 'Task task-1 cannot start from in_progress', code: 'invalid-state' });
  });

  it('completes and fails workers', async () => {
    await post('/api/tasks', COMPLEX);
    const done = await post('/api/tasks/task-1/workers/worker-1/complete', { result: 'requirements', actualTokens: 500 });
    expect(done.status).toBe(200);
    expect(await done.json()).toMatchObject({
      workers: expect.arrayContaining([
        expect.objectContaining({ workerId: 'worker-1', status: 'completed', actualTokens: 500 }),
      ]),
    });

    const failed = await post('/api/tasks/task-1/workers/worker-2/fail', { error: 'stuck' });
    expect(await failed.json()).toMatchObject({
      workers: expect.arrayContaining([
        expect.objectContaining({ workerId: 'worker-2', status: 'failed', error: 'stuck' }),
      ]),
    });

    const noTokens = await post('/api/tasks/task-1/workers/worker-3/complete', { result: 'x' });
    expect(noTokens.status).toBe(400);
  });

  it('completes, fails and cancels tasks', async () => {
    await post('/api/tasks', COMPLEX);
    await post('/api/tasks', COMPLEX);
    await post('/api/tasks', COMPLEX);
    expect(await (await post('/api/tasks/task-1/complete', { result: 'ok' })).json()).toMatchObject({ status: 'completed', result: 'ok' });
    expect(await (await post('/api/tasks/task-2/fail', { error: 'no' })).json()).toMatchObject({ status: 'failed', error: 'no' });
    expect(await (await post('/api/tasks/task-3/cancel')).json()).toMatchObject({ status: 'cancelled', error: null });
  });

  it('executes a task', async () => {
    await post('/api/tasks', COMPLEX);
    const res = await post('/api/tasks/task-1/execute');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'completed', tokenSavings: 85 });
  });

  it('serves statistics and categories', async () => {
    await post('/api/tasks', COMPLEX);
    expect(await (await fetch(`${base}/api/stats`)).json()).toMatchObject({ totalTasks: 1, activeTasks: 1, totalWorkers: 4 });
    const categories = await (await fetch(`${base}/api/categories`)).json();
    expect(categories).toHaveLength(6);
  });

  it('rejects a task id with broken percent-encoding', async () => {
    const detail = await fetch(`${base}/api/tasks/%E0%A4%A`);
    expect(detail.status).toBe(400);
    expect(await detail.json()).toEqual({ error: 'Malformed path segment: %E0%A4%A' });

    const action = await post('/api/tasks/%E0%A4%A/start');
    expect(action.status).toBe(400);
    const worker = await post('/api/tasks/task-1/workers/%ZZ/fail');
    expect(worker.status).toBe(400);
    expect(await worker.json()).toEqual({ error: 'Malformed path segment: %ZZ' });
  });

  it('answers unknown routes with 404 and preflight with 204', async () => {
    const unknown = await fetch(`${base}/api/nothing`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'No route for GET /api/nothing' });

    const preflight = await fetch(`${base}/api/tasks`, { method: 'OPTIONS' });
    expect(preflight.status).toBe(204);
  });
});
