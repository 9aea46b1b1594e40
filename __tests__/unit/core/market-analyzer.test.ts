import { describe, it, expect } from 'vitest';
import { MarketAnalyzer, imbalanceRatio } from '../../../src/core/market-analyzer';
import { DataError } from '../../../src/application/errors';
import type { AnalyzerConfig } from '../../../src/config/engine-config';
import type { OrderBookSnapshot } from '../../../src/types/domain';

const cfg: AnalyzerConfig = { depth: 2, volumeWindowMs: 1000, baselineWindows: 3, maxAgeMs: 5000, unusualVolumeMultiplier: 1.5 };

function book(ts: number, bid = 3, ask = 1): OrderBookSnapshot {
  return { ts, bids: [{ price: 100, size: bid }, { price: 99, size: 1 }], asks: [{ price: 101, size: ask }, { price: 102, size: 1 }] };
}

function analyzer() {
  return new MarketAnalyzer('BTCUSDT', cfg);
}

function trade(a: MarketAnalyzer, ts: number, size: number) {
  a.onMarketUpdate({ type: 'trade', symbol: 'BTCUSDT', trade: { ts, price: 100, size, side: 'buy' } });
}

describe('imbalanceRatio', () => {
  it('uses only the top depth levels', () => {
    const b: OrderBookSnapshot = { ts: 0, bids: [{ price: 100, size: 3 }, { price: 99, size: 1 }, { price: 98, size: 100 }], asks: [{ price: 101, size: 1 }] };
    expect(imbalanceRatio(b, 2)).toBeCloseTo(0.6, 12);
  });

  it('is 0 for an empty book and bounded by ±1', () => {
    expect(imbalanceRatio({ ts: 0, bids: [], asks: [] }, 5)).toBe(0);
    expect(imbalanceRatio({ ts: 0, bids: [{ price: 1, size: 2 }], asks: [] }, 5)).toBe(1);
    expect(imbalanceRatio({ ts: 0, bids: [], asks: [{ price: 1, size: 2 }] }, 5)).toBe(-1);
  });
});

describe('MarketAnalyzer', () => {
  it('computes relative volume against the preceding full windows', () => {
    const a = analyzer();
    trade(a, 500, 1);
    trade(a, 1500, 1);
    trade(a, 2500, 1);
    trade(a, 3500, 4);
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(3900) });
    // two baseline windows (1000,2000] and (2000,3000] hold 2 in total
    expect(a.relativeVolume(4000)).toBe(4);
    const m = a.metrics(4000);
    if (m.status !== 'fresh') throw new Error(`expected fresh metrics, got ${m.status}`);
    // bids 3+1 against asks 1+1
    expect(m.imbalanceRatio).toBeCloseTo(1 / 3, 12);
    expect(m.relativeVolume).toBe(4);
    expect(m.unusualVolume).toBe(true);
    expect(m.bookAt).toBe(3900);
  });

  it('is warming until one full baseline window exists', () => {
    const a = analyzer();
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(0) });
    trade(a, 0, 1);
    expect(a.metrics(1500)).toEqual({ status: 'warming', reason: 'volume baseline incomplete' });
  });

  it('treats a zero baseline as warming', () => {
    const a = analyzer();
    trade(a, 0, 0);
    trade(a, 2500, 1);
    expect(a.relativeVolume(3000)).toBeNull();
  });

  it('is warming without a book or without trades', () => {
    const a = analyzer();
    expect(a.metrics(0)).toEqual({ status: 'warming', reason: 'no order book yet' });
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(0) });
    expect(a.metrics(10)).toEqual({ status: 'warming', reason: 'no trades yet' });
  });

  it('is stale when the book or the last trade is too old', () => {
    const a = analyzer();
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(0) });
    trade(a, 0, 1);
    expect(a.metrics(6000)).toEqual({ status: 'stale', reason: 'order book 6000ms old' });
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(9000) });
    expect(a.metrics(9000)).toEqual({ status: 'stale', reason: 'last trade 9000ms old' });
  });

  it('ignores an older book snapshot', () => {
    const a = analyzer();
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(100, 3, 1) });
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(50, 1, 3) });
    expect(a.lastBookAt).toBe(100);
    expect(a.imbalance()).toBeCloseTo(1 / 3, 12);
  });

  it('rejects malformed updates', () => {
    const a = analyzer();
    expect(() => trade(a, 0, -1)).toThrow(DataError);
    expect(() => a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: { ts: 0, bids: [{ price: NaN, size: 1 }], asks: [] } })).toThrow(/invalid levels/);
    expect(a.lastUpdateAt()).toBeNull();
  });

  it('tracks the newest update time and resets', () => {
    const a = analyzer();
    trade(a, 700, 1);
    a.onMarketUpdate({ type: 'orderbook', symbol: 'BTCUSDT', book: book(400) });
    expect(a.lastUpdateAt()).toBe(700);
    a.reset();
    expect(a.lastUpdateAt()).toBeNull();
    expect(a.imbalance()).toBeNull();
  });
});
