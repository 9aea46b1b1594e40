import { getEventBus, type EventBus } from '../bus';
import { formatEvent, eventLevel } from '../format-event';
import { log } from '../../../utils/logger';
import type { EngineEvent } from '../types';

function symbolOf(ev: EngineEvent): string | undefined {
  return 'symbol' in ev ? ev.symbol : undefined;
}

/** Logs every engine event under the EVENT category. Returns the unsubscribe. */
export function registerLoggerSubscriber(bus: EventBus = getEventBus()): () => void {
  return bus.subscribeAll(ev => {
    log(eventLevel(ev), 'EVENT', formatEvent(ev), { type: ev.type, eventId: ev.eventId, symbol: symbolOf(ev) });
  });
}
