import { describe, it, expect } from 'vitest';
import { GatewayService } from '../../../src/adapters/gateway-service';
import { FakeGateway } from '../helpers/fakes';
import type { OrderUpdate } from '../../../src/types/domain';

const fast = { attempts: 3, backoffMs: 1, maxBackoffMs: 1, jitter: 0 };

describe('GatewayService', () => {
  it('retries a transient placement and returns the venue id', async () => {
    const inner = new FakeGateway();
    let failures = 1;
    inner.placeError = () => (failures-- > 0 ? Object.assign(new Error('reset'), { code: 'ECONNRESET' }) : null);
    const svc = new GatewayService(inner, fast);
    const id = await svc.placeOrder({ clientId: 'c1', symbol: 'BTCUSDT', side: 'buy', kind: 'entry', type: 'market', size: 1, reduceOnly: false });
    expect(id).toBe('ord-1');
    expect(inner.placed).toHaveLength(1);
  });

  it('tags a failed cancel with the order context', async () => {
    const inner = new FakeGateway();
    inner.cancelError = () => ({ status: 400 });
    const svc = new GatewayService(inner, fast);
    await expect(svc.cancelOrder('ord-9', 'ETHUSDT')).rejects.toMatchObject({
      code: 'HTTP_400',
      context: { action: 'cancelOrder', symbol: 'ETHUSDT', orderId: 'ord-9' },
    });
  });

  it('retries margin queries up to the attempt budget', async () => {
    const inner = new FakeGateway();
    inner.marginError = { response: { status: 502 } };
    const svc = new GatewayService(inner, fast);
    await expect(svc.queryMargin()).rejects.toMatchObject({ code: 'HTTP_502' });
    expect(inner.marginCalls).toBe(3);
  });

  it('passes order updates and amendments through', async () => {
    const inner = new FakeGateway();
    const svc = new GatewayService(inner, fast);
    const seen: OrderUpdate[] = [];
    const off = svc.subscribeOrderUpdates(u => { seen.push(u); });
    const update: OrderUpdate = { orderId: 'ord-1', symbol: 'BTCUSDT', status: 'filled', filledSize: 1, avgPrice: 100, ts: 0 };
    inner.emit(update);
    off();
    inner.emit(update);
    await svc.amendOrder('ord-2', 'BTCUSDT', { price: 99 });
    expect(seen).toEqual([update]);
    expect(inner.amended).toEqual([{ orderId: 'ord-2', symbol: 'BTCUSDT', amend: { price: 99 } }]);
  });
});
