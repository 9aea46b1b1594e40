import { DataError } from '../application/errors';
import type { IndicatorConfig } from '../config/engine-config';
import type { Candle, IndicatorName, IndicatorReading, IndicatorState } from '../types/domain';
import type { ResetBoundary } from '../utils/day-boundary';
import { AtrCalculator, EmaCalculator, RsiCalculator, SmaCalculator, VwapCalculator } from '../utils/indicators';
import type { Num } from '../utils/indicators';
import { RingBuffer } from '../utils/ring-buffer';

interface Slot {
  readonly need: () => number;
  readonly have: () => number;
  readonly update: (c: Candle) => Num;
  readonly history: RingBuffer<number>;
}

export function readyValue(r: IndicatorReading): number | null {
  return r.status === 'ready' ? r.value : null;
}

export function assertValidCandle(symbol: string, c: Candle): void {
  const fields = [c.openTime, c.open, c.high, c.low, c.close, c.volume];
  if (fields.some(v => typeof v !== 'number' || !Number.isFinite(v))) {
    throw new DataError('CANDLE_MALFORMED', 'candle has non-finite fields', { symbol, action: 'onClosedCandle', openTime: c.openTime });
  }
  if (c.high < c.low || c.high < Math.max(c.open, c.close) || c.low > Math.min(c.open, c.close)) {
    throw new DataError('CANDLE_MALFORMED', `inconsistent OHLC range (h=${c.high} l=${c.low})`, { symbol, action: 'onClosedCandle', openTime: c.openTime });
  }
  if (c.volume < 0) {
    throw new DataError('CANDLE_MALFORMED', 'negative volume', { symbol, action: 'onClosedCandle', openTime: c.openTime });
  }
}

/**
 * Per-symbol streaming indicator state. Each closed candle advances every
 * calculator once and yields a fresh immutable IndicatorState.
 */
export class IndicatorPipeline {
  private readonly candles: RingBuffer<Candle>;
  private readonly slots: Record<IndicatorName, Slot>;
  private latest: IndicatorState | null = null;

  constructor(
    readonly symbol: string,
    cfg: IndicatorConfig,
    candleWindow: number,
    boundary: ResetBoundary,
  ) {
    this.candles = new RingBuffer<Candle>(candleWindow);
    const sma = new SmaCalculator(cfg.smaPeriod);
    const emaFast = new EmaCalculator(cfg.emaFastPeriod);
    const emaSlow = new EmaCalculator(cfg.emaSlowPeriod);
    const atr = new AtrCalculator(cfg.atrPeriod);
    const rsi = new RsiCalculator(cfg.rsiPeriod);
    const vwap = new VwapCalculator(cfg.vwapMode === 'rolling'
      ? { mode: 'rolling', period: cfg.vwapPeriod }
      : { mode: 'session', boundary });
    const h = cfg.historyLength;
    this.slots = {
      sma: { need: () => sma.need, have: () => sma.have, update: c => sma.update(c.close), history: new RingBuffer<number>(h) },
      emaFast: { need: () => emaFast.need, have: () => emaFast.have, update: c => emaFast.update(c.close), history: new RingBuffer<number>(h) },
      emaSlow: { need: () => emaSlow.need, have: () => emaSlow.have, update: c => emaSlow.update(c.close), history: new RingBuffer<number>(h) },
      atr: { need: () => atr.need, have: () => atr.have, update: c => atr.update(c), history: new RingBuffer<number>(h) },
      rsi: { need: () => rsi.need, have: () => rsi.have, update: c => rsi.update(c.close), history: new RingBuffer<number>(h) },
      vwap: { need: () => vwap.need, have: () => vwap.have, update: c => vwap.update(c), history: new RingBuffer<number>(h) },
    };
  }

  get state(): IndicatorState | null { return this.latest; }

  /** Retained closed candles, oldest first. */
  history(): Candle[] { return this.candles.toArray(); }

  /**
   * Throws DataError for malformed or out-of-order candles; state is untouched in that case.
   */
  onClosedCandle(candle: Candle): IndicatorState {
    assertValidCandle(this.symbol, candle);
    const prev = this.candles.last();
    if (prev && candle.openTime <= prev.openTime) {
      throw new DataError('CANDLE_OUT_OF_ORDER', `candle ${candle.openTime} not after ${prev.openTime}`, { symbol: this.symbol, action: 'onClosedCandle' });
    }
    this.candles.push(candle);
    const s = this.slots;
    const readings: Record<IndicatorName, IndicatorReading> = {
      sma: this.advance(s.sma, candle),
      emaFast: this.advance(s.emaFast, candle),
      emaSlow: this.advance(s.emaSlow, candle),
      atr: this.advance(s.atr, candle),
      rsi: this.advance(s.rsi, candle),
      vwap: this.advance(s.vwap, candle),
    };
    this.latest = Object.freeze({
      symbol: this.symbol,
      asOf: candle.openTime,
      close: candle.close,
      readings: Object.freeze(readings),
    });
    return this.latest;
  }

  private advance(slot: Slot, candle: Candle): IndicatorReading {
    const v = slot.update(candle);
    if (v === null) return { status: 'warming', have: slot.have(), need: slot.need() };
    slot.history.push(v);
    return { status: 'ready', value: v, history: slot.history.toArray() };
  }
}
