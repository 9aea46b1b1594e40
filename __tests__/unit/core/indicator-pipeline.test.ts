import { describe, it, expect } from 'vitest';
import { IndicatorPipeline, readyValue } from '../../../src/core/indicator-pipeline';
import { DataError } from '../../../src/application/errors';
import type { IndicatorConfig } from '../../../src/config/engine-config';
import { emaSeries, smaSeries } from '../../../src/utils/indicators';
import { candle } from '../helpers/fakes';

const MIN = 60_000;
const cfg: IndicatorConfig = {
  smaPeriod: 3,
  emaFastPeriod: 2,
  emaSlowPeriod: 4,
  rsiPeriod: 3,
  atrPeriod: 3,
  vwapMode: 'rolling',
  vwapPeriod: 3,
  historyLength: 3,
};
const boundary = { mode: 'utc' as const, utcOffsetMinutes: 0 };

function pipeline(window = 50) {
  return new IndicatorPipeline('BTCUSDT', cfg, window, boundary);
}

describe('IndicatorPipeline', () => {
  it('reports warming readings with have/need instead of numbers', () => {
    const p = pipeline();
    const s = p.onClosedCandle(candle(0, 100));
    expect(s.readings.sma).toEqual({ status: 'warming', have: 1, need: 3 });
    expect(s.readings.atr).toEqual({ status: 'warming', have: 1, need: 4 });
    expect(s.readings.rsi).toEqual({ status: 'warming', have: 1, need: 4 });
    expect(s.readings.emaFast).toEqual({ status: 'warming', have: 1, need: 2 });
  });

  it('produces the batch values once warm, with a bounded history', () => {
    const closes = [100, 102, 101, 105, 107, 106];
    const p = pipeline();
    let last = p.onClosedCandle(candle(0, closes[0]));
    for (let i = 1; i < closes.length; i++) last = p.onClosedCandle(candle(i * MIN, closes[i]));
    const sma = smaSeries(closes, 3);
    const ema = emaSeries(closes, 2);
    expect(readyValue(last.readings.sma)).toBeCloseTo(sma[5] ?? NaN, 10);
    expect(readyValue(last.readings.emaFast)).toBeCloseTo(ema[5] ?? NaN, 10);
    const r = last.readings.sma;
    expect(r.status).toBe('ready');
    if (r.status === 'ready') {
      expect(r.history).toHaveLength(3);
      expect(r.history[2]).toBeCloseTo(sma[5] ?? NaN, 10);
      expect(r.history[0]).toBeCloseTo(sma[3] ?? NaN, 10);
    }
    expect(last.asOf).toBe(5 * MIN);
    expect(last.close).toBe(106);
  });

  it('returns a frozen snapshot per candle', () => {
    const p = pipeline();
    const a = p.onClosedCandle(candle(0, 100));
    const b = p.onClosedCandle(candle(MIN, 101));
    expect(Object.isFrozen(a)).toBe(true);
    expect(a).not.toBe(b);
    expect(a.close).toBe(100);
    expect(p.state).toBe(b);
  });

  it('rejects out-of-order candles and leaves state untouched', () => {
    const p = pipeline();
    p.onClosedCandle(candle(MIN, 100));
    const before = p.state;
    expect(() => p.onClosedCandle(candle(MIN, 101))).toThrow(DataError);
    expect(() => p.onClosedCandle(candle(0, 101))).toThrow(/not after/);
    expect(p.state).toBe(before);
    expect(p.history()).toHaveLength(1);
  });

  it('rejects malformed candles', () => {
    const p = pipeline();
    expect(() => p.onClosedCandle({ openTime: 0, open: 1, high: 0.5, low: 1, close: 1, volume: 1 })).toThrow(DataError);
    expect(() => p.onClosedCandle({ openTime: 0, open: 1, high: 2, low: 0, close: NaN, volume: 1 })).toThrow(/non-finite/);
    expect(() => p.onClosedCandle({ openTime: 0, open: 1, high: 2, low: 0, close: 1, volume: -1 })).toThrow(/negative volume/);
    expect(p.state).toBeNull();
  });

  it('keeps at most candleWindow candles', () => {
    const p = pipeline(4);
    for (let i = 0; i < 10; i++) p.onClosedCandle(candle(i * MIN, 100 + i));
    expect(p.history().map(c => c.close)).toEqual([106, 107, 108, 109]);
  });
});
