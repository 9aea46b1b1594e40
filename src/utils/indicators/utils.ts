export type Num = number | null;

/** Minimal OHLCV shape the calculators read. */
export interface Bar {
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * A stateful O(1) indicator. `update` consumes one input and returns the new
 * value, or null while fewer than `need` inputs have been seen.
 */
export interface StreamingIndicator<I> {
  readonly need: number;
  readonly have: number;
  readonly value: Num;
  update(input: I): Num;
  reset(): void;
}

/** Wilder smoothing: prev + (x - prev) / period. */
export function wilderSmooth(prev: number, current: number, period: number): number {
  return prev + (current - prev) / period;
}

export function emaStep(prev: number, current: number, k: number): number {
  return current * k + prev * (1 - k);
}

export function trueRange(bar: Bar, prevClose: number): number {
  return Math.max(
    bar.high - bar.low,
    Math.abs(bar.high - prevClose),
    Math.abs(bar.low - prevClose),
  );
}

export function typicalPrice(bar: Bar): number {
  return (bar.high + bar.low + bar.close) / 3;
}

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function assertPeriod(period: number, name: string): void {
  if (!Number.isInteger(period) || period <= 0) throw new RangeError(`${name} period must be a positive integer, got ${period}`);
}
