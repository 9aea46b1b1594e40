import type { BookLevel, Candle, MarketUpdate, Trade } from '../types/domain';

/** Small deterministic PRNG; same seed, same sequence. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface SyntheticMarketOptions {
  symbol: string;
  seed?: number;
  startPrice?: number;
  startTime?: number;
  candleMs?: number;
  tradesPerCandle?: number;
  /** Per-trade return standard deviation. */
  volatility?: number;
  /** Candles per drift regime. */
  regimeLength?: number;
}

/**
 * Random-walk market with drifting regimes and occasional volume bursts.
 * Each step yields the candle's trades, a closing book snapshot and the closed candle.
 */
export class SyntheticMarket {
  readonly symbol: string;
  readonly candleMs: number;
  private readonly rand: () => number;
  private readonly tradesPerCandle: number;
  private readonly volatility: number;
  private readonly regimeLength: number;
  private price: number;
  private openTime: number;
  private drift = 0;
  private step = 0;

  constructor(opts: SyntheticMarketOptions) {
    this.symbol = opts.symbol;
    this.rand = mulberry32(opts.seed ?? 42);
    this.price = opts.startPrice ?? 100;
    this.openTime = opts.startTime ?? Date.UTC(2024, 0, 1);
    this.candleMs = opts.candleMs ?? 60_000;
    this.tradesPerCandle = Math.max(1, opts.tradesPerCandle ?? 6);
    this.volatility = opts.volatility ?? 0.002;
    this.regimeLength = Math.max(1, opts.regimeLength ?? 40);
  }

  private gauss(): number {
    const u = Math.max(this.rand(), 1e-12);
    const v = this.rand();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }

  /** Time at which the current candle closes; the feed's clock after `next()`. */
  get closeTime(): number { return this.openTime + this.candleMs; }

  next(): MarketUpdate[] {
    if (this.step % this.regimeLength === 0) {
      const r = this.rand();
      this.drift = (r < 1 / 3 ? -1 : r < 2 / 3 ? 0 : 1) * this.volatility * 0.4;
    }
    this.step++;
    const burst = this.rand() < 0.15 ? 3 : 1;
    const open = this.price;
    let high = open;
    let low = open;
    let volume = 0;
    const trades: Trade[] = [];
    for (let i = 1; i <= this.tradesPerCandle; i++) {
      const prev = this.price;
      this.price = Math.max(0.01, prev * (1 + this.drift + this.volatility * this.gauss()));
      const size = Number(((0.5 + this.rand()) * burst).toFixed(3));
      high = Math.max(high, this.price);
      low = Math.min(low, this.price);
      volume += size;
      trades.push({
        ts: this.openTime + Math.floor((i * this.candleMs) / (this.tradesPerCandle + 1)),
        price: this.price,
        size,
        side: this.price >= prev ? 'buy' : 'sell',
      });
    }
    const candle: Candle = { openTime: this.openTime, open, high, low, close: this.price, volume };
    const tilt = this.drift > 0 ? 1.6 : this.drift < 0 ? 0.6 : 1;
    const level = (i: number, side: 1 | -1): BookLevel => ({
      price: this.price * (1 + side * 0.0005 * (i + 1)),
      size: Number(((1 + this.rand()) * (side < 0 ? tilt : 1)).toFixed(3)),
    });
    const bookTs = this.closeTime - 1;
    const updates: MarketUpdate[] = [
      ...trades.map((trade): MarketUpdate => ({ type: 'trade', symbol: this.symbol, trade })),
      {
        type: 'orderbook',
        symbol: this.symbol,
        book: { ts: bookTs, bids: [0, 1, 2, 3, 4].map(i => level(i, -1)), asks: [0, 1, 2, 3, 4].map(i => level(i, 1)) },
      },
      { type: 'candle', symbol: this.symbol, candle },
    ];
    this.openTime += this.candleMs;
    return updates;
  }
}

/** Event time of an update: trade and book timestamps, candle close. */
export function updateTime(u: MarketUpdate, candleMs: number): number {
  switch (u.type) {
    case 'trade': return u.trade.ts;
    case 'orderbook': return u.book.ts;
    case 'candle': return u.candle.openTime + candleMs;
  }
}
