import { ValidationError, buildErrorEventMeta, toEngineError, type EngineError } from '../application/errors';
import { getEventBus, type EventBus } from '../application/events/bus';
import type { EntryCancelReason } from '../application/events/types';
import { SerialQueue } from '../application/serial-queue';
import type { LifecycleConfig } from '../config/engine-config';
import type { SymbolSpecs } from '../config/symbols';
import type { EngineStateStore, GatewayAdapter } from '../contracts';
import {
  directionSign, pnlOf, sideFor,
  type ExitReason, type OrderKind, type OrderRequest, type OrderType, type OrderUpdate,
  type Position, type Signal, type SymbolState, type TakeProfitLevel,
} from '../types/domain';
import { log } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import { RingBuffer } from '../utils/ring-buffer';
import { floorToStep } from '../utils/toolkit';
import type { Approval } from './risk';

/** Legal lifecycle moves. A state missing from a row cannot follow it. */
export const TRANSITIONS = {
  Idle: ['EntryPending', 'ManualReview'],
  EntryPending: ['Open', 'Idle', 'ManualReview'],
  Open: ['PartiallyClosed', 'Closed', 'ManualReview'],
  PartiallyClosed: ['PartiallyClosed', 'Closed', 'ManualReview'],
  Closed: ['Idle'],
  ManualReview: ['Idle'],
} as const satisfies Record<SymbolState, readonly SymbolState[]>;

export type NextState<S extends SymbolState> = (typeof TRANSITIONS)[S][number];

export function isLegalTransition(from: SymbolState, to: SymbolState): boolean {
  const allowed: readonly SymbolState[] = TRANSITIONS[from];
  return allowed.includes(to);
}

/** The part of the risk manager the lifecycle reports to. */
export interface RiskLedger {
  recordFill(pnlDelta: number, fill?: { newTrade?: boolean; reservationId?: string }): Promise<unknown>;
  releaseReservation(reservationId: string): Promise<unknown>;
  stopDistanceFor(symbol: string, atr: number, price: number): number;
}

export interface LifecycleDeps {
  config: LifecycleConfig;
  specs: SymbolSpecs;
  gateway: GatewayAdapter;
  risk: RiskLedger;
  bus?: EventBus;
  store?: EngineStateStore;
  now?: () => number;
}

interface SymbolSlot {
  state: SymbolState;
  position: Position | null;
  reviewReason: string | null;
  readonly queue: SerialQueue;
}

const EPS = 1e-9;

function tighter(p: Position, current: number, candidate: number): boolean {
  return directionSign(p.direction) > 0 ? candidate > current + EPS : candidate < current - EPS;
}

function isHolding(state: SymbolState): boolean {
  return state === 'Open' || state === 'PartiallyClosed';
}

function exitReasonOf(p: Position, orderId: string): ExitReason | null {
  if (orderId === p.stopOrderId) return 'stop-loss';
  if (orderId === p.closeOrderId) return 'close';
  if (p.takeProfitLevels.some(l => l.orderId === orderId)) return 'take-profit';
  return null;
}

/**
 * Drives each symbol's position from entry to exit. All work for one symbol
 * runs on that symbol's SerialQueue; symbols never block each other.
 */
export class PositionLifecycle {
  private readonly cfg: LifecycleConfig;
  private readonly specs: SymbolSpecs;
  private readonly gateway: GatewayAdapter;
  private readonly risk: RiskLedger;
  private readonly bus: EventBus;
  private readonly store?: EngineStateStore;
  private readonly now: () => number;
  private readonly slots = new Map<string, SymbolSlot>();
  private readonly expectedCancels = new Set<string>();
  private readonly cancelReasons = new Map<string, EntryCancelReason>();
  /** Orders known to be done: filled, or cancelled by us. */
  private readonly doneOrders = new Set<string>();
  private readonly archive: RingBuffer<Position>;

  constructor(deps: LifecycleDeps) {
    this.cfg = deps.config;
    this.specs = deps.specs;
    this.gateway = deps.gateway;
    this.risk = deps.risk;
    this.bus = deps.bus ?? getEventBus();
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
    this.archive = new RingBuffer<Position>(Math.max(1, deps.config.archiveSize));
  }

  private slot(symbol: string): SymbolSlot {
    let s = this.slots.get(symbol);
    if (!s) {
      s = { state: 'Idle', position: null, reviewReason: null, queue: new SerialQueue() };
      this.slots.set(symbol, s);
    }
    return s;
  }

  stateOf(symbol: string): SymbolState { return this.slot(symbol).state; }
  positionOf(symbol: string): Position | null { return this.slot(symbol).position; }
  reviewReasonOf(symbol: string): string | null { return this.slot(symbol).reviewReason; }
  symbols(): string[] { return [...this.slots.keys()]; }
  closedPositions(): Position[] { return this.archive.toArray(); }

  /** Live (non-closed) positions across symbols. */
  snapshots(): Position[] {
    const out: Position[] = [];
    for (const s of this.slots.values()) if (s.position) out.push(s.position);
    return out;
  }

  /** Resolves once queued work for `symbol` (or every symbol) has run. */
  async idle(symbol?: string): Promise<void> {
    if (symbol) return this.slot(symbol).queue.idle();
    await Promise.all([...this.slots.values()].map(s => s.queue.idle()));
  }

  private transition<S extends SymbolState>(slot: SymbolSlot, from: S, to: NextState<S>): void {
    if (slot.state !== from || !isLegalTransition(from, to)) {
      throw new ValidationError('ILLEGAL_TRANSITION', `cannot move ${slot.state} -> ${to} (expected ${from})`, { symbol: slot.position?.symbol, state: slot.state });
    }
    slot.state = to;
    const p = slot.position;
    if (p && (to === 'EntryPending' || to === 'Open' || to === 'PartiallyClosed' || to === 'Closed')) p.state = to;
  }

  // ---- entry ----

  open(signal: Signal, approval: Approval): Promise<Result<Position, EngineError>> {
    const slot = this.slot(signal.symbol);
    return slot.queue.run(async () => {
      if (slot.state !== 'Idle') {
        await this.risk.releaseReservation(approval.reservationId);
        return err(new ValidationError('SYMBOL_BUSY', `${signal.symbol} is ${slot.state}`, { symbol: signal.symbol, state: slot.state, action: 'open' }));
      }
      const now = this.now();
      const position: Position = {
        id: `pos-${signal.id}`,
        symbol: signal.symbol,
        direction: signal.direction,
        signalId: signal.id,
        reservationId: approval.reservationId,
        requestedSize: approval.quantity,
        atr: signal.atr,
        submittedAt: now,
        state: 'EntryPending',
        entryOrderId: null,
        entryPrice: 0,
        size: 0,
        remainingSize: 0,
        stopLossPrice: null,
        stopOrderId: null,
        closeOrderId: null,
        takeProfitLevels: [],
        exits: [],
        realizedPnl: 0,
        openedAt: null,
        closedAt: null,
        movedToBreakeven: false,
        reviewReason: null,
        fills: {},
      };
      slot.position = position;
      this.transition(slot, 'Idle', 'EntryPending');
      const limit = this.cfg.entryType === 'limit';
      try {
        const orderId = await this.gateway.placeOrder({
          clientId: `${position.id}-entry`,
          symbol: signal.symbol,
          side: sideFor(signal.direction),
          kind: 'entry',
          type: limit ? 'limit' : 'market',
          size: approval.quantity,
          price: limit ? signal.referencePrice : undefined,
          reduceOnly: false,
        });
        position.entryOrderId = orderId;
      } catch (e) {
        const tagged = toEngineError(e, { symbol: signal.symbol, state: 'EntryPending', action: 'placeEntry' });
        slot.position = null;
        this.transition(slot, 'EntryPending', 'Idle');
        await this.risk.releaseReservation(approval.reservationId);
        this.reportOrderError(signal.symbol, 'EntryPending', 'placeEntry', tagged);
        await this.persist();
        return err(tagged);
      }
      this.bus.publish({
        type: 'ENTRY_SUBMITTED',
        symbol: signal.symbol,
        positionId: position.id,
        orderId: position.entryOrderId,
        direction: signal.direction,
        size: approval.quantity,
        price: limit ? signal.referencePrice : null,
      });
      await this.persist();
      return ok(position);
    });
  }

  // ---- venue reports ----

  onOrderUpdate(update: OrderUpdate): Promise<void> {
    const slot = this.slot(update.symbol);
    return slot.queue.run(() => this.route(slot, update));
  }

  private async route(slot: SymbolSlot, u: OrderUpdate): Promise<void> {
    const p = slot.position;
    if (!p) {
      log('DEBUG', 'LIFECYCLE', 'update for no live position', { symbol: u.symbol, orderId: u.orderId, status: u.status });
      return;
    }
    if (slot.state === 'ManualReview') return this.onReviewUpdate(p, u);
    if (u.orderId === p.entryOrderId) return this.onEntryUpdate(slot, p, u);
    const reason = exitReasonOf(p, u.orderId);
    if (reason) return this.onExitUpdate(slot, p, u, reason);
    log('DEBUG', 'LIFECYCLE', 'update for unknown order', { symbol: u.symbol, orderId: u.orderId, status: u.status });
  }

  /** Size and price of the part of a cumulative report not seen before. */
  private takeDelta(p: Position, u: OrderUpdate): { size: number; price: number } | null {
    const prev = p.fills[u.orderId] ?? { size: 0, notional: 0 };
    const size = u.filledSize - prev.size;
    if (size <= EPS) return null;
    const notional = u.avgPrice * u.filledSize;
    p.fills[u.orderId] = { size: u.filledSize, notional };
    return { size, price: (notional - prev.notional) / size };
  }

  /**
   * Books confirmed fills while an operator owns the symbol. Nothing is
   * placed, amended or cancelled until the review is cleared.
   */
  private async onReviewUpdate(p: Position, u: OrderUpdate): Promise<void> {
    if (u.orderId === p.entryOrderId) {
      if (u.filledSize <= p.size + EPS) return;
      p.size = u.filledSize;
      p.entryPrice = u.avgPrice;
      p.remainingSize = Math.max(0, p.size - p.exits.reduce((acc, x) => acc + x.size, 0));
      if (p.openedAt === null) {
        p.openedAt = this.now();
        await this.risk.recordFill(0, { newTrade: true, reservationId: p.reservationId });
      }
    } else {
      const reason = exitReasonOf(p, u.orderId);
      const delta = reason ? this.takeDelta(p, u) : null;
      if (!reason || !delta) {
        log('DEBUG', 'LIFECYCLE', 'update ignored during manual review', { symbol: u.symbol, orderId: u.orderId, status: u.status });
        return;
      }
      const pnl = this.applyExit(p, reason, delta.size, delta.price);
      await this.risk.recordFill(pnl);
      const level = p.takeProfitLevels.find(l => l.orderId === u.orderId);
      if (level && u.status === 'filled') level.filled = true;
    }
    log('WARN', 'LIFECYCLE', 'fill booked during manual review', { symbol: p.symbol, orderId: u.orderId, size: p.size, remaining: p.remainingSize });
    await this.persist();
  }

  private async onEntryUpdate(slot: SymbolSlot, p: Position, u: OrderUpdate): Promise<void> {
    if (slot.state !== 'EntryPending') return;
    if (u.filledSize > p.size) {
      p.size = u.filledSize;
      p.entryPrice = u.avgPrice;
    }
    if (u.status === 'filled') return this.onEntryFilled(slot, p);
    if (u.status === 'cancelled' || u.status === 'rejected') {
      const reason = this.cancelReasons.get(p.id) ?? (u.status === 'rejected' ? 'rejected' : 'cancelled');
      return this.finishEntryCancel(slot, p, reason, u.reason);
    }
    await this.persist();
  }

  private async onEntryFilled(slot: SymbolSlot, p: Position): Promise<void> {
    const spec = this.specs.get(p.symbol);
    const sign = directionSign(p.direction);
    p.remainingSize = p.size;
    p.openedAt = this.now();
    const stopDistance = this.risk.stopDistanceFor(p.symbol, p.atr, p.entryPrice);
    const stopLossPrice = p.entryPrice - sign * stopDistance;
    p.stopLossPrice = stopLossPrice;
    p.takeProfitLevels = this.buildLadder(p, spec.qtyStep);
    this.cancelReasons.delete(p.id);
    this.transition(slot, 'EntryPending', 'Open');
    await this.risk.recordFill(0, { newTrade: true, reservationId: p.reservationId });

    try {
      p.stopOrderId = await this.place(p, 'stop', 'stop', p.remainingSize, stopLossPrice);
    } catch (e) {
      this.reportOrderError(p.symbol, 'Open', 'placeStop', toEngineError(e, { symbol: p.symbol, action: 'placeStop' }));
      this.enterReview(slot, 'stop order could not be placed');
      await this.persist();
      return;
    }
    for (const level of p.takeProfitLevels) {
      try {
        level.orderId = await this.place(p, 'take-profit', 'limit', level.size, level.price);
      } catch (e) {
        this.reportOrderError(p.symbol, 'Open', 'placeTakeProfit', toEngineError(e, { symbol: p.symbol, action: 'placeTakeProfit', level: level.index }));
      }
    }
    this.bus.publish({
      type: 'POSITION_OPENED',
      symbol: p.symbol,
      positionId: p.id,
      direction: p.direction,
      entryPrice: p.entryPrice,
      size: p.size,
      stopLossPrice,
      takeProfits: p.takeProfitLevels.map(l => ({ price: l.price, size: l.size, fraction: l.fraction })),
    });
    await this.persist();
  }

  /**
   * Target i sits at entry ± multiple·ATR. Sizes are floored to the lot step
   * and the last level is the final target: it takes whatever is left.
   */
  private buildLadder(p: Position, step: number): TakeProfitLevel[] {
    const sign = directionSign(p.direction);
    const steps = this.cfg.takeProfit;
    const levels: TakeProfitLevel[] = [];
    let assigned = 0;
    let assignedFraction = 0;
    steps.forEach((s, i) => {
      const last = i === steps.length - 1;
      const size = last ? floorToStep(p.size - assigned, step) : floorToStep(p.size * s.fraction, step);
      if (size <= 0) return;
      const fraction = last ? 1 - assignedFraction : s.fraction;
      assigned += size;
      assignedFraction += s.fraction;
      levels.push({ index: levels.length, price: p.entryPrice + sign * s.atrMultiple * p.atr, fraction, size, orderId: null, filled: false });
    });
    return levels;
  }

  private place(p: Position, kind: OrderKind, type: OrderType, size: number, price?: number): Promise<string> {
    const req: OrderRequest = {
      clientId: `${p.id}-${kind}-${p.exits.length}-${this.now()}`,
      symbol: p.symbol,
      side: sideFor(p.direction, true),
      kind,
      type,
      size,
      price,
      reduceOnly: true,
    };
    return this.gateway.placeOrder(req);
  }

  private async finishEntryCancel(slot: SymbolSlot, p: Position, reason: EntryCancelReason, detail?: string): Promise<void> {
    if (p.size > EPS) {
      log('INFO', 'LIFECYCLE', 'entry cancelled after partial fill, opening filled size', { symbol: p.symbol, size: p.size, requested: p.requestedSize, reason });
      return this.onEntryFilled(slot, p);
    }
    this.cancelReasons.delete(p.id);
    slot.position = null;
    this.transition(slot, 'EntryPending', 'Idle');
    await this.risk.releaseReservation(p.reservationId);
    this.bus.publish({ type: 'ENTRY_CANCELLED', symbol: p.symbol, positionId: p.id, reason, detail });
    await this.persist();
  }

  private async onExitUpdate(slot: SymbolSlot, p: Position, u: OrderUpdate, reason: ExitReason): Promise<void> {
    if (slot.state !== 'Open' && slot.state !== 'PartiallyClosed') return;
    if (u.status === 'cancelled' || u.status === 'rejected') {
      if (this.expectedCancels.delete(u.orderId)) return;
      if (reason === 'stop-loss') {
        this.reportOrderError(p.symbol, slot.state, 'stopOrder', new ValidationError('STOP_LOST', `stop order ${u.status} by venue`, { symbol: p.symbol, orderId: u.orderId }));
        this.enterReview(slot, `stop order ${u.status} by venue`);
        await this.persist();
        return;
      }
      this.doneOrders.add(u.orderId);
      log('WARN', 'LIFECYCLE', 'exit order ended without fill', { symbol: p.symbol, orderId: u.orderId, status: u.status, reason });
      return;
    }
    if (u.status === 'filled') this.doneOrders.add(u.orderId);
    const delta = this.takeDelta(p, u);
    if (!delta) return;
    const pnl = this.applyExit(p, reason, delta.size, delta.price);
    await this.risk.recordFill(pnl);

    if (reason === 'take-profit') {
      const level = p.takeProfitLevels.find(l => l.orderId === u.orderId);
      if (level && u.status === 'filled') {
        level.filled = true;
        this.bus.publish({ type: 'TAKE_PROFIT_HIT', symbol: p.symbol, positionId: p.id, level: level.index, price: delta.price, size: u.filledSize, pnl, remainingSize: p.remainingSize });
        if (p.remainingSize > EPS) {
          this.transition(slot, slot.state, 'PartiallyClosed');
          await this.trailAfterTarget(p, level.index);
        }
      }
    } else if (reason === 'stop-loss') {
      this.bus.publish({ type: 'STOP_LOSS_HIT', symbol: p.symbol, positionId: p.id, price: delta.price, size: delta.size, pnl });
    }
    if (p.remainingSize <= EPS) return this.finalize(slot, p, reason);
    await this.persist();
  }

  private applyExit(p: Position, reason: ExitReason, size: number, price: number): number {
    const qty = Math.min(size, p.remainingSize);
    const pnl = pnlOf(p.direction, p.entryPrice, price, qty);
    p.exits.push({ reason, price, size: qty, fraction: p.size > 0 ? qty / p.size : 0, pnl, ts: this.now() });
    p.remainingSize = p.remainingSize - qty <= EPS ? 0 : p.remainingSize - qty;
    p.realizedPnl += pnl;
    return pnl;
  }

  private async trailAfterTarget(p: Position, levelIndex: number): Promise<void> {
    let target: number | null = null;
    if (this.cfg.trailMode === 'breakeven' && levelIndex === 0) target = p.entryPrice;
    if (this.cfg.trailMode === 'ladder') target = levelIndex === 0 ? p.entryPrice : p.takeProfitLevels[levelIndex - 1].price;
    await this.adjustStop(p, target, target === p.entryPrice ? 'breakeven' : 'trail');
  }

  /** Moves the stop to `target` when that tightens it, and keeps the stop size in line with the remaining size. */
  private async adjustStop(p: Position, target: number | null, reason: 'breakeven' | 'trail'): Promise<void> {
    if (!p.stopOrderId || p.stopLossPrice === null) return;
    const from = p.stopLossPrice;
    const move = target !== null && tighter(p, from, target);
    try {
      await this.gateway.amendOrder(p.stopOrderId, p.symbol, { price: move && target !== null ? target : undefined, size: p.remainingSize });
    } catch (e) {
      this.reportOrderError(p.symbol, p.state, 'amendStop', toEngineError(e, { symbol: p.symbol, action: 'amendStop' }));
      return;
    }
    if (move && target !== null) {
      p.stopLossPrice = target;
      if (target === p.entryPrice) p.movedToBreakeven = true;
      this.bus.publish({ type: 'STOP_MOVED', symbol: p.symbol, positionId: p.id, from, to: target, reason });
    }
  }

  private async finalize(slot: SymbolSlot, p: Position, reason: ExitReason): Promise<void> {
    const leftovers = [p.stopOrderId, p.closeOrderId, ...p.takeProfitLevels.filter(l => !l.filled).map(l => l.orderId)];
    for (const id of leftovers) {
      if (!id || this.doneOrders.has(id)) continue;
      await this.cancelQuietly(p, id);
    }
    p.closedAt = this.now();
    const from = slot.state;
    if (from !== 'Open' && from !== 'PartiallyClosed') return;
    this.transition(slot, from, 'Closed');
    const exitFraction = p.exits.reduce((acc, x) => acc + x.fraction, 0);
    this.bus.publish({ type: 'POSITION_CLOSED', symbol: p.symbol, positionId: p.id, reason, realizedPnl: p.realizedPnl, exitFraction });
    log('INFO', 'LIFECYCLE', 'position closed', { symbol: p.symbol, positionId: p.id, pnl: p.realizedPnl, reason });
    this.archive.push(p);
    for (const id of [p.entryOrderId, p.stopOrderId, p.closeOrderId, ...p.takeProfitLevels.map(l => l.orderId)]) {
      if (!id) continue;
      this.doneOrders.delete(id);
      this.expectedCancels.delete(id);
    }
    slot.position = null;
    this.transition(slot, 'Closed', 'Idle');
    await this.persist();
  }

  private async cancelQuietly(p: Position, orderId: string): Promise<void> {
    this.expectedCancels.add(orderId);
    try {
      await this.gateway.cancelOrder(orderId, p.symbol);
      this.doneOrders.add(orderId);
    } catch (e) {
      this.expectedCancels.delete(orderId);
      const tagged = toEngineError(e, { symbol: p.symbol, action: 'cancelOrder', orderId });
      // already gone at the venue: nothing left to cancel
      if (tagged.code === 'ORDER_CLOSED' || tagged.code === 'UNKNOWN_ORDER') {
        this.doneOrders.add(orderId);
        log('DEBUG', 'LIFECYCLE', 'cancel skipped, order already closed', { symbol: p.symbol, orderId });
        return;
      }
      this.reportOrderError(p.symbol, p.state, 'cancelOrder', tagged);
    }
  }

  // ---- price-driven management ----

  /**
   * `trailing` keeps the stop `trailingStopPct`% behind price, moving it in
   * steps of at least `trailMinStepPct`% of the current stop. The other modes
   * move the stop to breakeven once price has run `breakevenTriggerAtr` ATRs
   * in favour before any target fills.
   */
  onPrice(symbol: string, price: number): Promise<void> {
    const slot = this.slots.get(symbol);
    if (!slot || !isHolding(slot.state) || this.cfg.trailMode === 'none') return Promise.resolve();
    return slot.queue.run(async () => {
      const p = slot.position;
      if (!p || p.stopLossPrice === null || !isHolding(slot.state)) return;
      if (this.cfg.trailMode === 'trailing') {
        const target = this.trailingStopFor(p, p.stopLossPrice, price);
        if (target === null) return;
        await this.adjustStop(p, target, 'trail');
      } else {
        if (slot.state !== 'Open' || p.movedToBreakeven || !(this.cfg.breakevenTriggerAtr > 0)) return;
        const excursion = directionSign(p.direction) * (price - p.entryPrice);
        if (excursion < this.cfg.breakevenTriggerAtr * p.atr) return;
        await this.adjustStop(p, p.entryPrice, 'breakeven');
      }
      await this.persist();
    });
  }

  private trailingStopFor(p: Position, current: number, price: number): number | null {
    const candidate = price * (1 - directionSign(p.direction) * this.cfg.trailingStopPct / 100);
    if (!tighter(p, current, candidate)) return null;
    if ((Math.abs(candidate - current) / current) * 100 < this.cfg.trailMinStepPct) return null;
    return candidate;
  }

  /** Cancels entries pending longer than entryTimeoutMs. */
  async checkTimeouts(now = this.now()): Promise<void> {
    const due = [...this.slots.values()].filter(s => s.state === 'EntryPending');
    await Promise.all(due.map(slot => slot.queue.run(async () => {
      const p = slot.position;
      if (!p || slot.state !== 'EntryPending' || this.cancelReasons.has(p.id)) return;
      if (now - p.submittedAt < this.cfg.entryTimeoutMs) return;
      await this.cancelEntry(slot, p, 'timeout');
    })));
  }

  private async cancelEntry(slot: SymbolSlot, p: Position, reason: EntryCancelReason): Promise<void> {
    this.cancelReasons.set(p.id, reason);
    if (!p.entryOrderId) return this.finishEntryCancel(slot, p, reason);
    try {
      await this.gateway.cancelOrder(p.entryOrderId, p.symbol);
    } catch (e) {
      const tagged = toEngineError(e, { symbol: p.symbol, state: 'EntryPending', action: 'cancelEntry' });
      // filled in the meantime: the fill report completes the entry
      if (tagged.code === 'ORDER_CLOSED') return;
      this.reportOrderError(p.symbol, 'EntryPending', 'cancelEntry', tagged);
      if (tagged.retryable) {
        // still pending: the next housekeeping pass tries again
        this.cancelReasons.delete(p.id);
        return;
      }
      this.enterReview(slot, `entry cancel failed: ${tagged.message}`);
      await this.persist();
      return;
    }
    // the venue acknowledged: no more fills will arrive for this order
    if (slot.state === 'EntryPending' && slot.position === p) await this.finishEntryCancel(slot, p, reason);
  }

  // ---- operator actions ----

  /** Cancels a pending entry or flattens the open position for `symbol`. */
  closeSymbol(symbol: string): Promise<boolean> {
    const slot = this.slot(symbol);
    return slot.queue.run(async () => {
      let p = slot.position;
      if (!p) return false;
      if (slot.state === 'EntryPending') {
        await this.cancelEntry(slot, p, 'close-all');
        p = slot.position;
        if (!p) return true;
      }
      if (slot.state !== 'Open' && slot.state !== 'PartiallyClosed') return false;
      if (p.closeOrderId) return true;
      for (const id of [p.stopOrderId, ...p.takeProfitLevels.filter(l => !l.filled).map(l => l.orderId)]) {
        if (id && !this.doneOrders.has(id)) await this.cancelQuietly(p, id);
      }
      try {
        p.closeOrderId = await this.place(p, 'close', 'market', p.remainingSize);
      } catch (e) {
        this.reportOrderError(p.symbol, slot.state, 'closePosition', toEngineError(e, { symbol, action: 'closePosition' }));
        this.enterReview(slot, 'close order failed');
      }
      await this.persist();
      return true;
    });
  }

  async closeAll(): Promise<number> {
    const results = await Promise.all(this.symbols().map(s => this.closeSymbol(s)));
    return results.filter(Boolean).length;
  }

  // ---- recovery ----

  /** Reinstates persisted live positions before reconciliation. */
  restore(positions: Position[]): void {
    for (const p of positions) {
      if (p.state === 'Closed') continue;
      const slot = this.slot(p.symbol);
      slot.position = p;
      slot.state = p.reviewReason === null ? p.state : 'ManualReview';
      slot.reviewReason = p.reviewReason;
    }
  }

  markManualReview(symbol: string, reason: string): Promise<void> {
    const slot = this.slot(symbol);
    return slot.queue.run(async () => {
      if (slot.state === 'ManualReview') return;
      this.enterReview(slot, reason);
      await this.persist();
    });
  }

  /** Operator resolved the venue state by hand; forget the local position. */
  clearReview(symbol: string): Promise<boolean> {
    const slot = this.slot(symbol);
    return slot.queue.run(async () => {
      if (slot.state !== 'ManualReview') return false;
      const p = slot.position;
      slot.position = null;
      slot.reviewReason = null;
      this.transition(slot, 'ManualReview', 'Idle');
      if (p && p.openedAt === null) await this.risk.releaseReservation(p.reservationId);
      await this.persist();
      return true;
    });
  }

  private enterReview(slot: SymbolSlot, reason: string): void {
    const from = slot.state;
    if (from === 'Closed' || from === 'ManualReview') return;
    this.transition(slot, from, 'ManualReview');
    slot.reviewReason = reason;
    if (slot.position) slot.position.reviewReason = reason;
    log('WARN', 'LIFECYCLE', 'symbol moved to manual review', { symbol: slot.position?.symbol, reason, from });
  }

  private reportOrderError(symbol: string, state: SymbolState, action: string, e: EngineError): void {
    const meta = buildErrorEventMeta(e, { symbol, state, action });
    this.bus.publish({ type: 'ORDER_ERROR', symbol, state, action, kind: meta.kind, code: meta.code, message: meta.message, context: meta.context });
  }

  private async persist(): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.savePositions(this.snapshots());
    } catch (e) {
      log('ERROR', 'LIFECYCLE', 'positions not persisted', { error: e });
    }
  }
}
