// Moving averages: batch series over a full history and streaming calculators.
import { RingBuffer } from '../ring-buffer';
import { assertPeriod, emaStep, type Num, type StreamingIndicator } from './utils';

/**
 * Simple Moving Average series, aligned with `values` (null until `period` values are available).
 */
export function smaSeries(values: readonly number[], period: number): Num[] {
  assertPeriod(period, 'SMA');
  const out: Num[] = new Array<Num>(values.length).fill(null);
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/**
 * Exponential Moving Average series with k = 2/(period+1), seeded by the SMA of the first `period` values.
 */
export function emaSeries(values: readonly number[], period: number): Num[] {
  assertPeriod(period, 'EMA');
  const out: Num[] = new Array<Num>(values.length).fill(null);
  if (values.length < period) return out;
  const k = 2 / (period + 1);
  let seed = 0;
  for (let i = 0; i < period; i++) seed += values[i];
  let current = seed / period;
  out[period - 1] = current;
  for (let i = period; i < values.length; i++) {
    current = emaStep(current, values[i], k);
    out[i] = current;
  }
  return out;
}

export class SmaCalculator implements StreamingIndicator<number> {
  private readonly window: RingBuffer<number>;
  private sum = 0;
  private current: Num = null;

  constructor(readonly period: number) {
    assertPeriod(period, 'SMA');
    this.window = new RingBuffer<number>(period);
  }

  get need(): number { return this.period; }
  get have(): number { return this.window.length; }
  get value(): Num { return this.current; }

  update(v: number): Num {
    const evicted = this.window.push(v);
    this.sum += v;
    if (evicted !== undefined) this.sum -= evicted;
    this.current = this.window.isFull() ? this.sum / this.period : null;
    return this.current;
  }

  reset(): void {
    this.window.clear();
    this.sum = 0;
    this.current = null;
  }
}

export class EmaCalculator implements StreamingIndicator<number> {
  private readonly k: number;
  private seen = 0;
  private seedSum = 0;
  private current: Num = null;

  constructor(readonly period: number) {
    assertPeriod(period, 'EMA');
    this.k = 2 / (period + 1);
  }

  get need(): number { return this.period; }
  get have(): number { return Math.min(this.seen, this.period); }
  get value(): Num { return this.current; }

  update(v: number): Num {
    this.seen++;
    if (this.current !== null) {
      this.current = emaStep(this.current, v, this.k);
      return this.current;
    }
    this.seedSum += v;
    if (this.seen === this.period) this.current = this.seedSum / this.period;
    return this.current;
  }

  reset(): void {
    this.seen = 0;
    this.seedSum = 0;
    this.current = null;
  }
}
