import { ValidationError } from '../application/errors';
import type { AmendRequest, GatewayAdapter, OrderUpdateListener } from '../contracts';
import type { Direction, MarketUpdate, Order, OrderRequest, OrderSide, OrderUpdate, VenuePosition } from '../types/domain';
import { AsyncQueue } from '../utils/async-queue';
import { log } from '../utils/logger';

interface PaperOrder extends Order {
  filledSize: number;
  avgPrice: number;
  createdAt: number;
  price?: number;
  size: number;
}

interface NetPosition {
  /** Signed: positive long, negative short. */
  qty: number;
  entryPrice: number;
}

export interface PaperGatewayOptions {
  /** Starting margin balance in quote currency. */
  balance?: number;
  leverage?: number;
  now?: () => number;
}

const EPS = 1e-12;

/**
 * Simulated venue living in process. Market data is fed with `push`; resting
 * orders fill when a candle range or trade price crosses them. Fill reports are
 * delivered asynchronously, the way a venue stream would.
 */
export class PaperGateway implements GatewayAdapter {
  private readonly feeds = new Map<string, Set<AsyncQueue<MarketUpdate>>>();
  private readonly listeners = new Set<OrderUpdateListener>();
  private readonly orders = new Map<string, PaperOrder>();
  private readonly lastPrice = new Map<string, number>();
  private readonly positions = new Map<string, NetPosition>();
  private balance: number;
  private readonly leverage: number;
  private readonly now: () => number;
  private seq = 0;
  private realized = 0;

  constructor(opts: PaperGatewayOptions = {}) {
    this.balance = opts.balance ?? 10_000;
    this.leverage = opts.leverage ?? 3;
    this.now = opts.now ?? Date.now;
  }

  get realizedPnl(): number { return this.realized; }
  get equity(): number { return this.balance; }

  // ---- market data ----

  subscribeMarketData(symbol: string): AsyncIterable<MarketUpdate> {
    const q = new AsyncQueue<MarketUpdate>();
    let set = this.feeds.get(symbol);
    if (!set) { set = new Set(); this.feeds.set(symbol, set); }
    set.add(q);
    return q;
  }

  /** Feed one update: matches resting orders, then forwards it to subscribers. */
  push(update: MarketUpdate): void {
    const { symbol } = update;
    if (update.type === 'candle') {
      this.match(symbol, update.candle.low, update.candle.high);
      this.lastPrice.set(symbol, update.candle.close);
    } else if (update.type === 'trade') {
      this.match(symbol, update.trade.price, update.trade.price);
      this.lastPrice.set(symbol, update.trade.price);
    } else {
      const bid = update.book.bids[0]?.price;
      const ask = update.book.asks[0]?.price;
      if (bid !== undefined && ask !== undefined && !this.lastPrice.has(symbol)) this.lastPrice.set(symbol, (bid + ask) / 2);
    }
    for (const q of this.feeds.get(symbol) ?? []) q.push(update);
  }

  /** Ends every market-data subscription. */
  closeFeeds(): void {
    for (const set of this.feeds.values()) for (const q of set) q.close();
    this.feeds.clear();
  }

  setLastPrice(symbol: string, price: number): void {
    this.lastPrice.set(symbol, price);
  }

  // ---- orders ----

  subscribeOrderUpdates(listener: OrderUpdateListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  async placeOrder(req: OrderRequest): Promise<string> {
    if (!(req.size > 0) || !Number.isFinite(req.size)) {
      throw new ValidationError('INVALID_SIZE', `order size must be positive, got ${req.size}`, { symbol: req.symbol, action: 'placeOrder' });
    }
    if (req.type !== 'market' && !(req.price !== undefined && req.price > 0)) {
      throw new ValidationError('INVALID_PRICE', `${req.type} order needs a positive price`, { symbol: req.symbol, action: 'placeOrder' });
    }
    const last = this.lastPrice.get(req.symbol);
    if (req.type === 'market' && last === undefined) {
      throw new ValidationError('NO_MARKET_PRICE', 'no price to fill a market order', { symbol: req.symbol, action: 'placeOrder' });
    }
    const id = `paper-${++this.seq}`;
    const order: PaperOrder = { ...req, id, status: 'new', filledSize: 0, avgPrice: 0, createdAt: this.now() };
    this.orders.set(id, order);
    if (req.type === 'market' && last !== undefined) {
      this.fill(order, last);
    } else if (req.type === 'limit' && last !== undefined && this.limitCrossed(order, last, last)) {
      this.fill(order, this.limitPrice(order));
    }
    return id;
  }

  async cancelOrder(orderId: string, symbol: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol) throw new ValidationError('UNKNOWN_ORDER', `order ${orderId} not found`, { symbol, action: 'cancelOrder' });
    if (order.status === 'filled' || order.status === 'cancelled' || order.status === 'rejected') {
      throw new ValidationError('ORDER_CLOSED', `order ${orderId} already ${order.status}`, { symbol, action: 'cancelOrder' });
    }
    order.status = 'cancelled';
    this.emit(order);
  }

  async amendOrder(orderId: string, symbol: string, amend: AmendRequest): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol) throw new ValidationError('UNKNOWN_ORDER', `order ${orderId} not found`, { symbol, action: 'amendOrder' });
    if (order.status !== 'new' && order.status !== 'partially_filled') {
      throw new ValidationError('ORDER_CLOSED', `order ${orderId} already ${order.status}`, { symbol, action: 'amendOrder' });
    }
    if (amend.price !== undefined) order.price = amend.price;
    if (amend.size !== undefined) {
      if (amend.size <= order.filledSize) throw new ValidationError('INVALID_SIZE', 'amended size below filled size', { symbol, action: 'amendOrder' });
      order.size = amend.size;
    }
  }

  async queryMargin(): Promise<number> {
    let used = 0;
    for (const p of this.positions.values()) used += (Math.abs(p.qty) * p.entryPrice) / this.leverage;
    return this.balance - used;
  }

  async queryPositions(): Promise<VenuePosition[]> {
    const out: VenuePosition[] = [];
    for (const [symbol, p] of this.positions) {
      if (Math.abs(p.qty) <= EPS) continue;
      out.push({ symbol, direction: p.qty > 0 ? 'long' : 'short', size: Math.abs(p.qty), entryPrice: p.entryPrice });
    }
    return out;
  }

  /** Seed a venue position, e.g. one the engine does not know about. */
  seedPosition(symbol: string, direction: Direction, size: number, entryPrice: number): void {
    this.positions.set(symbol, { qty: direction === 'long' ? size : -size, entryPrice });
  }

  openOrders(symbol?: string): Order[] {
    return [...this.orders.values()].filter(o => (o.status === 'new' || o.status === 'partially_filled') && (!symbol || o.symbol === symbol));
  }

  getOrder(orderId: string): Order | undefined {
    return this.orders.get(orderId);
  }

  // ---- matching ----

  private limitPrice(o: PaperOrder): number {
    return o.price ?? this.lastPrice.get(o.symbol) ?? 0;
  }

  private limitCrossed(o: PaperOrder, low: number, high: number): boolean {
    const p = this.limitPrice(o);
    return o.side === 'buy' ? low <= p : high >= p;
  }

  private stopTriggered(o: PaperOrder, low: number, high: number): boolean {
    const p = this.limitPrice(o);
    return o.side === 'sell' ? low <= p : high >= p;
  }

  private liveOrders(symbol: string): PaperOrder[] {
    return [...this.orders.values()].filter(o => o.symbol === symbol && this.isLive(o));
  }

  private match(symbol: string, low: number, high: number): void {
    const open = this.liveOrders(symbol);
    // stops before limits: inside one bar the adverse move is assumed first
    for (const o of open.filter(x => x.type === 'stop')) {
      if (this.isLive(o) && this.stopTriggered(o, low, high)) this.fill(o, this.limitPrice(o));
    }
    for (const o of open.filter(x => x.type === 'limit')) {
      if (this.isLive(o) && this.limitCrossed(o, low, high)) this.fill(o, this.limitPrice(o));
    }
  }

  private isLive(o: PaperOrder): boolean {
    return o.status === 'new' || o.status === 'partially_filled';
  }

  private fill(order: PaperOrder, price: number): void {
    let qty = order.size - order.filledSize;
    if (order.reduceOnly) {
      const pos = this.positions.get(order.symbol);
      const closable = pos && Math.sign(pos.qty) === (order.side === 'sell' ? 1 : -1) ? Math.abs(pos.qty) : 0;
      qty = Math.min(qty, closable);
      if (qty <= EPS) {
        order.status = 'cancelled';
        this.emit(order, 'reduce-only order has nothing to reduce');
        return;
      }
    }
    this.applyFill(order.symbol, order.side, qty, price);
    const filled = order.filledSize + qty;
    order.avgPrice = (order.avgPrice * order.filledSize + price * qty) / filled;
    order.filledSize = filled;
    order.status = filled >= order.size - EPS ? 'filled' : 'partially_filled';
    this.emit(order);
  }

  private applyFill(symbol: string, side: OrderSide, qty: number, price: number): void {
    const signed = side === 'buy' ? qty : -qty;
    const pos = this.positions.get(symbol) ?? { qty: 0, entryPrice: 0 };
    if (pos.qty === 0 || Math.sign(pos.qty) === Math.sign(signed)) {
      const total = pos.qty + signed;
      const entryPrice = (Math.abs(pos.qty) * pos.entryPrice + qty * price) / Math.abs(total);
      this.positions.set(symbol, { qty: total, entryPrice });
      return;
    }
    const closing = Math.min(Math.abs(pos.qty), qty);
    const pnl = Math.sign(pos.qty) * (price - pos.entryPrice) * closing;
    this.balance += pnl;
    this.realized += pnl;
    const rest = pos.qty + signed;
    if (Math.abs(rest) <= EPS) this.positions.delete(symbol);
    else if (Math.sign(rest) === Math.sign(pos.qty)) this.positions.set(symbol, { qty: rest, entryPrice: pos.entryPrice });
    else this.positions.set(symbol, { qty: rest, entryPrice: price });
  }

  private emit(order: PaperOrder, reason?: string): void {
    const update: OrderUpdate = {
      orderId: order.id,
      symbol: order.symbol,
      status: order.status,
      filledSize: order.filledSize,
      avgPrice: order.avgPrice,
      ts: this.now(),
      reason,
    };
    queueMicrotask(() => {
      for (const l of this.listeners) {
        try {
          l(update);
        } catch (e) {
          log('ERROR', 'PAPER', 'order update listener failed', { orderId: update.orderId, error: e });
        }
      }
    });
  }
}
