import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEventBus } from '../../../src/application/events/bus';
import { registerNotificationSubscriber } from '../../../src/application/events/subscribers/notification-subscriber';
import { FakeChannel } from '../helpers/fakes';
import { setupJsonLogs, captureLogs, expectJsonLog } from '../helpers/logging';

describe('notification-subscriber', () => {
  let bus: InMemoryEventBus;
  beforeEach(() => { bus = new InMemoryEventBus(() => 2000); });

  it('forwards the default types with their formatted text', async () => {
    const channel = new FakeChannel();
    registerNotificationSubscriber(channel, undefined, bus);
    bus.publish({ type: 'SIGNAL_GENERATED', symbol: 'BTCUSDT', signal: {
      id: 's', symbol: 'BTCUSDT', direction: 'long', confidence: 0.8, triggers: ['trend-momentum'], timestamp: 0, referencePrice: 100, atr: 2,
    } });
    bus.publish({ type: 'POSITION_CLOSED', symbol: 'BTCUSDT', positionId: 'p1', reason: 'stop-loss', realizedPnl: -6, exitFraction: 1 });
    await bus.flush();
    bus.publish({ type: 'ENTRY_DENIED', symbol: 'BTCUSDT', signalId: 's', kind: 'RISK_LIMIT', code: 'PAUSED', message: 'paused' });
    await bus.flush();
    expect(channel.sent.map(s => s.text)).toEqual([
      'BTCUSDT signal long conf=0.80 [trend-momentum] @ 100',
      'BTCUSDT closed by stop-loss, pnl -6.00',
    ]);
    expect(channel.sent.map(s => s.event.eventId)).toEqual(['2000-1', '2000-2']);
  });

  it('honours a custom type list', async () => {
    const channel = new FakeChannel();
    registerNotificationSubscriber(channel, ['RISK_RESET'], bus);
    bus.publish({ type: 'RISK_RESET', day: '2024-01-02', previousDay: '2024-01-01' });
    bus.publish({ type: 'RISK_HALT', haltedUntil: 0, dailyRealizedPnl: -60, maxDailyLoss: 50 });
    await bus.flush();
    expect(channel.sent.map(s => s.text)).toEqual(['risk counters reset for 2024-01-02 (was 2024-01-01)']);
  });

  it('logs a failed delivery at ERROR and keeps the bus healthy', async () => {
    setupJsonLogs();
    const logs = captureLogs();
    const channel = new FakeChannel();
    channel.failWith = new Error('webhook down');
    const busErrors: unknown[] = [];
    bus.setErrorHandler(e => { busErrors.push(e); });
    registerNotificationSubscriber(channel, undefined, bus);
    bus.publish({ type: 'COMMAND_EXECUTED', command: 'pause', ok: true, message: 'new entries paused' });
    await bus.flush();
    const hit = expectJsonLog(logs, 'NOTIFY', 'ERROR', 'notification delivery failed', ['channel', 'type', 'eventId']);
    expect(hit?.data).toMatchObject({ channel: 'fake', type: 'COMMAND_EXECUTED', error: { name: 'Error', message: 'webhook down' } });
    expect(busErrors).toEqual([]);
  });
});
