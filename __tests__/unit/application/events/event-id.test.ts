import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEventBus, setEventBus, getEventBus } from '../../../../src/application/events/bus';
import type { EngineEvent } from '../../../../src/application/events/types';

describe('event bus assigns eventId', () => {
  beforeEach(() => setEventBus(new InMemoryEventBus(() => 5000)));

  it('stamps ts and a per-bus sequence', async () => {
    const got: EngineEvent[] = [];
    getEventBus().subscribeAll(e => { got.push(e); });
    getEventBus().publish({ type: 'COMMAND_EXECUTED', command: 'pause', ok: true, message: 'new entries paused' });
    getEventBus().publish({ type: 'COMMAND_EXECUTED', command: 'resume', ok: true, message: 'new entries resumed' });
    await getEventBus().flush();
    expect(got.map(e => e.eventId)).toEqual(['5000-1', '5000-2']);
    expect(got.map(e => e.ts)).toEqual([5000, 5000]);
  });

  it('stamps events that have no subscriber', () => {
    const e = getEventBus().publish({ type: 'DATA_ERROR', symbol: 'ETHUSDT', code: 'BAD_CANDLE', message: 'x' });
    expect(e.eventId).toBe('5000-1');
  });
});
