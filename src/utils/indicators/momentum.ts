import { assertPeriod, rsiFromAverages, wilderSmooth, type Num, type StreamingIndicator } from './utils';

/**
 * Relative Strength Index series with Wilder smoothing.
 * Seeded by the plain average gain/loss of the first `period` changes, so the
 * first value sits at index `period`. RSI is 100 whenever the average loss is 0.
 */
export function rsiSeries(closes: readonly number[], period: number): Num[] {
  assertPeriod(period, 'RSI');
  const out: Num[] = new Array<Num>(closes.length).fill(null);
  let gainSum = 0;
  let lossSum = 0;
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    const gain = Math.max(0, change);
    const loss = Math.max(0, -change);
    if (i < period) {
      gainSum += gain;
      lossSum += loss;
      continue;
    }
    if (i === period) {
      avgGain = (gainSum + gain) / period;
      avgLoss = (lossSum + loss) / period;
    } else {
      avgGain = wilderSmooth(avgGain, gain, period);
      avgLoss = wilderSmooth(avgLoss, loss, period);
    }
    out[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return out;
}

export class RsiCalculator implements StreamingIndicator<number> {
  private prev: number | null = null;
  private changes = 0;
  private gainSum = 0;
  private lossSum = 0;
  private avgGain = 0;
  private avgLoss = 0;
  private current: Num = null;

  constructor(readonly period: number) {
    assertPeriod(period, 'RSI');
  }

  get need(): number { return this.period + 1; }
  get have(): number { return Math.min(this.need, this.prev === null ? 0 : this.changes + 1); }
  get value(): Num { return this.current; }

  update(close: number): Num {
    const prev = this.prev;
    this.prev = close;
    if (prev === null) return this.current;
    const change = close - prev;
    const gain = Math.max(0, change);
    const loss = Math.max(0, -change);
    this.changes++;
    if (this.changes < this.period) {
      this.gainSum += gain;
      this.lossSum += loss;
      return this.current;
    }
    if (this.changes === this.period) {
      this.avgGain = (this.gainSum + gain) / this.period;
      this.avgLoss = (this.lossSum + loss) / this.period;
    } else {
      this.avgGain = wilderSmooth(this.avgGain, gain, this.period);
      this.avgLoss = wilderSmooth(this.avgLoss, loss, this.period);
    }
    this.current = rsiFromAverages(this.avgGain, this.avgLoss);
    return this.current;
  }

  reset(): void {
    this.prev = null;
    this.changes = 0;
    this.gainSum = 0;
    this.lossSum = 0;
    this.avgGain = 0;
    this.avgLoss = 0;
    this.current = null;
  }
}
