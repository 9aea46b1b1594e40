import { getEventBus, type EventBus } from '../bus';
import { formatEvent } from '../format-event';
import { log } from '../../../utils/logger';
import type { NotificationChannel } from '../../../contracts';
import type { EngineEventType } from '../types';

export const DEFAULT_NOTIFY_TYPES: readonly EngineEventType[] = [
  'SIGNAL_GENERATED',
  'POSITION_OPENED',
  'ENTRY_CANCELLED',
  'TAKE_PROFIT_HIT',
  'STOP_LOSS_HIT',
  'POSITION_CLOSED',
  'RISK_HALT',
  'ORDER_ERROR',
  'DATA_STALE',
  'RECONCILIATION_REQUIRED',
  'COMMAND_EXECUTED',
];

/**
 * Forwards selected events to a notification channel. Delivery failures are
 * logged at ERROR and never reach the publisher.
 */
export function registerNotificationSubscriber(
  channel: NotificationChannel,
  types: readonly EngineEventType[] = DEFAULT_NOTIFY_TYPES,
  bus: EventBus = getEventBus(),
): () => void {
  const wanted = new Set<EngineEventType>(types);
  return bus.subscribeAll(async ev => {
    if (!wanted.has(ev.type)) return;
    try {
      await channel.send(ev, formatEvent(ev));
    } catch (e) {
      log('ERROR', 'NOTIFY', 'notification delivery failed', { channel: channel.name, type: ev.type, eventId: ev.eventId, error: e });
    }
  });
}
