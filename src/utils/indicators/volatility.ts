import { assertPeriod, trueRange, wilderSmooth, type Bar, type Num, type StreamingIndicator } from './utils';

/**
 * Average True Range series (Wilder). The first bar has no previous close, so the
 * first value appears at index `period` (after `period` true ranges).
 */
export function atrSeries(bars: readonly Bar[], period: number): Num[] {
  assertPeriod(period, 'ATR');
  const out: Num[] = new Array<Num>(bars.length).fill(null);
  let trSum = 0;
  let current: Num = null;
  for (let i = 1; i < bars.length; i++) {
    const tr = trueRange(bars[i], bars[i - 1].close);
    if (current === null) {
      trSum += tr;
      if (i === period) current = trSum / period;
    } else {
      current = wilderSmooth(current, tr, period);
    }
    out[i] = current;
  }
  return out;
}

export class AtrCalculator implements StreamingIndicator<Bar> {
  private prevClose: number | null = null;
  private ranges = 0;
  private trSum = 0;
  private current: Num = null;

  constructor(readonly period: number) {
    assertPeriod(period, 'ATR');
  }

  // one extra bar provides the first previous close
  get need(): number { return this.period + 1; }
  get have(): number { return Math.min(this.need, this.prevClose === null ? 0 : this.ranges + 1); }
  get value(): Num { return this.current; }

  update(bar: Bar): Num {
    const prevClose = this.prevClose;
    this.prevClose = bar.close;
    if (prevClose === null) return this.current;
    const tr = trueRange(bar, prevClose);
    this.ranges++;
    if (this.current !== null) {
      this.current = wilderSmooth(this.current, tr, this.period);
      return this.current;
    }
    this.trSum += tr;
    if (this.ranges === this.period) this.current = this.trSum / this.period;
    return this.current;
  }

  reset(): void {
    this.prevClose = null;
    this.ranges = 0;
    this.trSum = 0;
    this.current = null;
  }
}
