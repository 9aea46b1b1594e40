import { DataError } from '../application/errors';
import type { AnalyzerConfig } from '../config/engine-config';
import type { BookLevel, ConfirmationMetrics, MarketUpdate, OrderBookSnapshot, Trade } from '../types/domain';

export type AnalyzerUpdate = Exclude<MarketUpdate, { type: 'candle' }>;

function sumSizes(levels: readonly BookLevel[], depth: number): number {
  let total = 0;
  for (let i = 0; i < Math.min(depth, levels.length); i++) total += levels[i].size;
  return total;
}

/** (bid − ask) / (bid + ask) over the top `depth` levels; 0 for an empty book. */
export function imbalanceRatio(book: OrderBookSnapshot, depth: number): number {
  const bid = sumSizes(book.bids, depth);
  const ask = sumSizes(book.asks, depth);
  const total = bid + ask;
  return total > 0 ? (bid - ask) / total : 0;
}

/**
 * Order-book imbalance and traded-volume confirmation for one symbol.
 * Only the latest book is kept; trades are kept for the baseline horizon.
 */
export class MarketAnalyzer {
  private book: OrderBookSnapshot | null = null;
  private trades: Trade[] = [];
  private firstSampleAt: number | null = null;
  private lastTradeAt: number | null = null;

  constructor(readonly symbol: string, private readonly cfg: AnalyzerConfig) {}

  get lastBookAt(): number | null { return this.book?.ts ?? null; }
  get lastTradeTs(): number | null { return this.lastTradeAt; }

  /** Newest market timestamp seen, book or trade. */
  lastUpdateAt(): number | null {
    const a = this.book?.ts ?? null;
    const b = this.lastTradeAt;
    if (a === null) return b;
    if (b === null) return a;
    return Math.max(a, b);
  }

  onMarketUpdate(update: AnalyzerUpdate): void {
    if (update.type === 'orderbook') this.onBook(update.book);
    else this.onTrade(update.trade);
  }

  private onBook(book: OrderBookSnapshot): void {
    const levels = [...book.bids, ...book.asks];
    if (!Number.isFinite(book.ts) || levels.some(l => !Number.isFinite(l.price) || !Number.isFinite(l.size) || l.size < 0)) {
      throw new DataError('BOOK_MALFORMED', 'order book has invalid levels', { symbol: this.symbol, action: 'onMarketUpdate' });
    }
    // an older snapshot never replaces a newer one
    if (this.book && book.ts < this.book.ts) return;
    this.book = book;
    this.noteSample(book.ts);
  }

  private onTrade(trade: Trade): void {
    if (!Number.isFinite(trade.ts) || !Number.isFinite(trade.price) || !Number.isFinite(trade.size) || trade.size < 0) {
      throw new DataError('TRADE_MALFORMED', 'trade has invalid fields', { symbol: this.symbol, action: 'onMarketUpdate' });
    }
    this.trades.push(trade);
    this.noteSample(trade.ts);
    this.lastTradeAt = this.lastTradeAt === null ? trade.ts : Math.max(this.lastTradeAt, trade.ts);
    this.prune(this.lastTradeAt);
  }

  private noteSample(ts: number): void {
    if (this.firstSampleAt === null || ts < this.firstSampleAt) this.firstSampleAt = ts;
  }

  private prune(now: number): void {
    const horizon = now - (this.cfg.baselineWindows + 1) * this.cfg.volumeWindowMs;
    if (this.trades.length > 0 && this.trades[0].ts <= horizon) {
      this.trades = this.trades.filter(t => t.ts > horizon);
    }
  }

  /** Imbalance of the latest book, or null without one. */
  imbalance(): number | null {
    return this.book ? imbalanceRatio(this.book, this.cfg.depth) : null;
  }

  /**
   * Volume in (now − w, now] over the mean of up to `baselineWindows` preceding
   * full windows. Null until one full baseline window exists or when the
   * baseline is zero.
   */
  relativeVolume(now: number): number | null {
    if (this.firstSampleAt === null) return null;
    const w = this.cfg.volumeWindowMs;
    const n = Math.min(this.cfg.baselineWindows, Math.floor((now - this.firstSampleAt) / w) - 1);
    if (n < 1) return null;
    const currentFrom = now - w;
    const baselineFrom = now - (n + 1) * w;
    let current = 0;
    let baseline = 0;
    for (const t of this.trades) {
      if (t.ts > now) continue;
      if (t.ts > currentFrom) current += t.size;
      else if (t.ts > baselineFrom) baseline += t.size;
    }
    if (baseline <= 0) return null;
    return current / (baseline / n);
  }

  metrics(now: number): ConfirmationMetrics {
    this.prune(now);
    const maxAge = this.cfg.maxAgeMs;
    if (!this.book) return { status: 'warming', reason: 'no order book yet' };
    if (now - this.book.ts > maxAge) return { status: 'stale', reason: `order book ${now - this.book.ts}ms old` };
    if (this.lastTradeAt === null) return { status: 'warming', reason: 'no trades yet' };
    if (now - this.lastTradeAt > maxAge) return { status: 'stale', reason: `last trade ${now - this.lastTradeAt}ms old` };
    const relativeVolume = this.relativeVolume(now);
    if (relativeVolume === null) return { status: 'warming', reason: 'volume baseline incomplete' };
    return {
      status: 'fresh',
      imbalanceRatio: imbalanceRatio(this.book, this.cfg.depth),
      relativeVolume,
      unusualVolume: relativeVolume >= this.cfg.unusualVolumeMultiplier,
      bookAt: this.book.ts,
    };
  }

  reset(): void {
    this.book = null;
    this.trades = [];
    this.firstSampleAt = null;
    this.lastTradeAt = null;
  }
}
