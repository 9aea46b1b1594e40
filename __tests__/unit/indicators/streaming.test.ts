import { describe, it, expect } from 'vitest';
import {
  smaSeries, emaSeries, atrSeries, rsiSeries, vwapSeries,
  SmaCalculator, EmaCalculator, AtrCalculator, RsiCalculator, VwapCalculator,
  type TimedBar,
} from '../../../src/utils/indicators';
import { mulberry32 } from '../../../src/tools/synthetic-market';

const MIN = 60_000;
const DAY = 86_400_000;

function walk(n: number, seed = 7): TimedBar[] {
  const rand = mulberry32(seed);
  const bars: TimedBar[] = [];
  let price = 100;
  for (let i = 0; i < n; i++) {
    const close = price * (1 + (rand() - 0.5) * 0.02);
    const high = Math.max(price, close) * (1 + rand() * 0.005);
    const low = Math.min(price, close) * (1 - rand() * 0.005);
    bars.push({ openTime: i * MIN * 30, high, low, close, volume: 1 + rand() * 10 });
    price = close;
  }
  return bars;
}

function expectSeriesEqual(stream: Array<number | null>, batch: Array<number | null>) {
  expect(stream.length).toBe(batch.length);
  stream.forEach((v, i) => {
    const b = batch[i];
    if (b === null) expect(v).toBeNull();
    else expect(v).toBeCloseTo(b, 10);
  });
}

describe('batch series', () => {
  it('sma aligns values with the input and is null before the window fills', () => {
    expect(smaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('ema is seeded with the sma of the first period values', () => {
    // k = 0.5: 2 -> 4*0.5+2*0.5 = 3 -> 5*0.5+3*0.5 = 4
    expect(emaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('atr starts after period true ranges', () => {
    const bars = [100, 100, 100, 100].map(c => ({ high: c + 1, low: c - 1, close: c, volume: 1 }));
    expect(atrSeries(bars, 2)).toEqual([null, null, 2, 2]);
  });

  it('rsi is 100 when there are no losses and 0 with no gains', () => {
    expect(rsiSeries([1, 2, 3, 4], 3)).toEqual([null, null, null, 100]);
    expect(rsiSeries([4, 3, 2, 1], 3)).toEqual([null, null, null, 0]);
  });

  it('rsi balances equal gains and losses at 50', () => {
    expect(rsiSeries([10, 11, 10], 2)).toEqual([null, null, 50]);
  });

  it('vwap weights typical price by volume', () => {
    const bars: TimedBar[] = [
      { openTime: 0, high: 12, low: 9, close: 9, volume: 1 },   // typical 10
      { openTime: MIN, high: 22, low: 19, close: 19, volume: 3 }, // typical 20
    ];
    expect(vwapSeries(bars, { mode: 'session', boundary: { mode: 'utc', utcOffsetMinutes: 0 } })).toEqual([10, 17.5]);
  });

  it('rejects a non-positive period', () => {
    expect(() => smaSeries([1], 0)).toThrow(RangeError);
    expect(() => new RsiCalculator(-1)).toThrow(RangeError);
  });
});

describe('streaming calculators match batch series', () => {
  const bars = walk(300);
  const closes = bars.map(b => b.close);

  it('sma', () => {
    const c = new SmaCalculator(20);
    expectSeriesEqual(closes.map(v => c.update(v)), smaSeries(closes, 20));
  });

  it('ema', () => {
    const c = new EmaCalculator(9);
    expectSeriesEqual(closes.map(v => c.update(v)), emaSeries(closes, 9));
  });

  it('atr', () => {
    const c = new AtrCalculator(14);
    expectSeriesEqual(bars.map(b => c.update(b)), atrSeries(bars, 14));
  });

  it('rsi', () => {
    const c = new RsiCalculator(14);
    expectSeriesEqual(closes.map(v => c.update(v)), rsiSeries(closes, 14));
  });

  it('rolling vwap', () => {
    const c = new VwapCalculator({ mode: 'rolling', period: 25 });
    expectSeriesEqual(bars.map(b => c.update(b)), vwapSeries(bars, { mode: 'rolling', period: 25 }));
  });
});

describe('warm-up accounting', () => {
  it('reports have/need until ready', () => {
    const atr = new AtrCalculator(3);
    expect(atr.need).toBe(4);
    const bar = { high: 2, low: 1, close: 1.5, volume: 1 };
    expect(atr.update(bar)).toBeNull();
    expect(atr.have).toBe(1);
    atr.update(bar);
    atr.update(bar);
    expect(atr.value).toBeNull();
    expect(atr.have).toBe(3);
    expect(atr.update(bar)).toBe(1);
    expect(atr.have).toBe(4);
  });

  it('reset clears state', () => {
    const sma = new SmaCalculator(2);
    sma.update(1);
    sma.update(3);
    expect(sma.value).toBe(2);
    sma.reset();
    expect(sma.value).toBeNull();
    expect(sma.have).toBe(0);
  });
});

describe('session vwap', () => {
  const boundary = { mode: 'utc' as const, utcOffsetMinutes: 0 };

  it('restarts at the daily boundary', () => {
    const c = new VwapCalculator({ mode: 'session', boundary });
    c.update({ openTime: DAY - MIN, high: 12, low: 9, close: 9, volume: 5 });
    expect(c.update({ openTime: DAY, high: 32, low: 29, close: 29, volume: 1 })).toBe(30);
  });

  it('has no value while the session volume is zero', () => {
    const c = new VwapCalculator({ mode: 'session', boundary });
    expect(c.update({ openTime: 0, high: 2, low: 1, close: 1.5, volume: 0 })).toBeNull();
  });

  it('honours an exchange offset', () => {
    // offset +60min: the exchange day starts at 23:00 UTC
    const c = new VwapCalculator({ mode: 'session', boundary: { mode: 'exchange', utcOffsetMinutes: 60 } });
    c.update({ openTime: DAY - 2 * 60 * MIN, high: 12, low: 9, close: 9, volume: 1 });
    expect(c.update({ openTime: DAY - 60 * MIN, high: 22, low: 19, close: 19, volume: 1 })).toBe(20);
  });
});
