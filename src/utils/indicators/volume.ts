import { RingBuffer } from '../ring-buffer';
import { dayStart, type ResetBoundary } from '../day-boundary';
import { assertPeriod, typicalPrice, type Bar, type Num, type StreamingIndicator } from './utils';

export interface TimedBar extends Bar {
  openTime: number;
}

export type VwapOptions =
  | { mode: 'session'; boundary: ResetBoundary }
  | { mode: 'rolling'; period: number };

interface VolumeSample { pv: number; v: number }

/**
 * VWAP series over typical price. `session` restarts the accumulation at each
 * daily boundary; `rolling` covers the last `period` bars. A window with zero
 * volume has no VWAP (null).
 */
export function vwapSeries(bars: readonly TimedBar[], opts: VwapOptions): Num[] {
  const calc = new VwapCalculator(opts);
  return bars.map(b => calc.update(b));
}

export class VwapCalculator implements StreamingIndicator<TimedBar> {
  private readonly window: RingBuffer<VolumeSample> | null;
  private session: number | null = null;
  private count = 0;
  private pvSum = 0;
  private vSum = 0;
  private current: Num = null;

  constructor(private readonly opts: VwapOptions) {
    if (opts.mode === 'rolling') {
      assertPeriod(opts.period, 'VWAP');
      this.window = new RingBuffer<VolumeSample>(opts.period);
    } else {
      this.window = null;
    }
  }

  get need(): number { return this.opts.mode === 'rolling' ? this.opts.period : 1; }
  get have(): number { return Math.min(this.need, this.count); }
  get value(): Num { return this.current; }

  update(bar: TimedBar): Num {
    const sample: VolumeSample = { pv: typicalPrice(bar) * bar.volume, v: bar.volume };
    if (this.opts.mode === 'session') {
      const start = dayStart(bar.openTime, this.opts.boundary);
      if (start !== this.session) {
        this.session = start;
        this.count = 0;
        this.pvSum = 0;
        this.vSum = 0;
      }
    }
    this.count++;
    this.pvSum += sample.pv;
    this.vSum += sample.v;
    if (this.window) {
      const evicted = this.window.push(sample);
      if (evicted) {
        this.pvSum -= evicted.pv;
        this.vSum -= evicted.v;
      }
    }
    this.current = this.count >= this.need && this.vSum > 0 ? this.pvSum / this.vSum : null;
    return this.current;
  }

  reset(): void {
    this.window?.clear();
    this.session = null;
    this.count = 0;
    this.pvSum = 0;
    this.vSum = 0;
    this.current = null;
  }
}
