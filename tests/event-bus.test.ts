// tests/event-bus.test.ts
// Event bus - typed delivery of delegation events.

import { describe, it, expect } from 'vitest';
import { ALL_EVENT_NAMES, DelegationEventBus } from '../src/services/events.js';
import type { DelegationEventName } from '../src/services/events.js';
import { createService } from './helpers/setup.js';

describe('DelegationEventBus', () => {
  it('delivers events to subscribers until they unsubscribe', () => {
    const bus = new DelegationEventBus();
    const seen: string[] = [];
    const handler = (d: { taskId: string; workerId: string; error: string }) => { seen.push(d.error); };
    bus.onEvent('worker:failed', handler);
    bus.emitEvent('worker:failed', { taskId: 't', workerId: 'w', error: 'first' });
    bus.offEvent('worker:failed', handler);
    bus.emitEvent('worker:failed', { taskId: 't', workerId: 'w', error: 'second' });
    expect(seen).toEqual(['first']);
  });

  it('emits the full lifecycle in order through the service', async () => {
    const service = createService();
    const seen: DelegationEventName[] = [];
    for (const name of ALL_EVENT_NAMES) service.events.on(name, () => { seen.push(name); });

    service.delegate({ description: 'Quick status' });
    await service.executeTask('task-1');

    expect(seen).toEqual([
      'task:state-changed', // pending → assigned
      'task:delegated',
      'task:state-changed', // assigned → in_progress
      'worker:completed',
      'task:state-changed', // in_progress → completed
    ]);
  });
});
