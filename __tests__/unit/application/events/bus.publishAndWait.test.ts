import { describe, it, expect } from 'vitest';
import { InMemoryEventBus } from '../../../../src/application/events/bus';
import type { EngineEvent } from '../../../../src/application/events/types';

const stale = { type: 'DATA_STALE', symbol: 'BTCUSDT', lastUpdateAt: null, ageMs: null } as const;

describe('event bus publishAndWait', () => {
  it('runs every matching handler before resolving', async () => {
    const bus = new InMemoryEventBus(() => 1000);
    const calls: string[] = [];
    bus.subscribe('DATA_STALE', async () => { calls.push('a'); });
    bus.subscribe('DATA_STALE', () => { calls.push('b'); });
    bus.subscribe('DATA_ERROR', () => { calls.push('other'); });
    const event = await bus.publishAndWait(stale, { timeoutMs: 200 });
    expect(calls.sort()).toEqual(['a', 'b']);
    expect(event.ts).toBe(1000);
  });

  it('reports a slow handler to the error handler and does not wait for it', async () => {
    const bus = new InMemoryEventBus();
    const errors: string[] = [];
    bus.setErrorHandler(e => { errors.push(e instanceof Error ? e.message : String(e)); });
    let done = false;
    bus.subscribe('DATA_STALE', async () => {
      await new Promise(r => setTimeout(r, 50));
      done = true;
    });
    await bus.publishAndWait(stale, { timeoutMs: 10 });
    expect(errors).toEqual(['event handler timeout after 10ms']);
    expect(done).toBe(false);
  });

  it('captures a throwing handler without rejecting', async () => {
    const bus = new InMemoryEventBus();
    const seen: Array<{ message: string; event: EngineEvent }> = [];
    bus.setErrorHandler((e, event) => { seen.push({ message: e instanceof Error ? e.message : String(e), event }); });
    bus.subscribe('DATA_STALE', () => { throw new Error('boom'); });
    const event = await bus.publishAndWait(stale, { timeoutMs: 50 });
    expect(seen).toHaveLength(1);
    expect(seen[0].message).toBe('boom');
    expect(seen[0].event.eventId).toBe(event.eventId);
  });
});
