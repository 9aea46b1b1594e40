export const DAY_MS = 86_400_000;

export type ResetMode = 'utc' | 'exchange';

export interface ResetBoundary {
  mode: ResetMode;
  /** Exchange-day offset from UTC in minutes; ignored for `utc`. */
  utcOffsetMinutes: number;
}

function offsetMs(b: ResetBoundary): number {
  return b.mode === 'exchange' ? b.utcOffsetMinutes * 60_000 : 0;
}

/** Start (ms epoch) of the trading day containing `ts`. */
export function dayStart(ts: number, b: ResetBoundary): number {
  const off = offsetMs(b);
  return Math.floor((ts + off) / DAY_MS) * DAY_MS - off;
}

export function nextReset(ts: number, b: ResetBoundary): number {
  return dayStart(ts, b) + DAY_MS;
}

/** YYYY-MM-DD label of the trading day, in the boundary's local calendar. */
export function dayKey(ts: number, b: ResetBoundary): string {
  return new Date(dayStart(ts, b) + offsetMs(b)).toISOString().slice(0, 10);
}
