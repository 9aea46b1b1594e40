import { DataError, RiskLimitError, ValidationError, toEngineError } from "../application/errors";
import { getEventBus, type EventBus } from "../application/events/bus";
import { SerialQueue } from "../application/serial-queue";
import type { RiskConfig } from "../config/engine-config";
import type { SymbolSpecs } from "../config/symbols";
import type { EngineStateStore } from "../contracts";
import type { RiskState, Signal } from "../types/domain";
import { dayKey, dayStart, nextReset, type ResetBoundary } from "../utils/day-boundary";
import { log } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import { floorToStep } from "../utils/toolkit";

export interface Approval {
  readonly reservationId: string;
  readonly signalId: string;
  readonly symbol: string;
  readonly quantity: number;
  /** Price distance from entry to the initial stop. */
  readonly stopDistance: number;
  /** quantity × stopDistance */
  readonly riskAmount: number;
}

export type Denial = RiskLimitError | ValidationError | DataError;
export type AuthorizeResult = Result<Approval, Denial>;

export interface FillRecord {
  /** Counts the fill as a new trade against maxTradesPerDay. */
  newTrade?: boolean;
  /** Reservation consumed by this fill, if any. */
  reservationId?: string;
}

export interface RiskManagerDeps {
  config: RiskConfig;
  boundary: ResetBoundary;
  specs: SymbolSpecs;
  /** Available margin in quote currency; usually the gateway's queryMargin. */
  margin: () => Promise<number>;
  bus?: EventBus;
  store?: EngineStateStore;
  now?: () => number;
}

type MutableRiskState = { -readonly [K in keyof RiskState]: RiskState[K] };

interface Reservation { symbol: string; signalId: string; at: number }

/**
 * Single owner of the shared daily counters. Every read-modify-write runs on
 * one SerialQueue, so concurrent symbol loops see a consistent RiskState.
 */
export class RiskManager {
  private readonly cfg: RiskConfig;
  private readonly boundary: ResetBoundary;
  private readonly specs: SymbolSpecs;
  private readonly margin: () => Promise<number>;
  private readonly bus: EventBus;
  private readonly store?: EngineStateStore;
  private readonly now: () => number;
  private readonly queue = new SerialQueue();
  private readonly reservations = new Map<string, Reservation>();
  private readonly consumed = new Set<string>();
  private state: MutableRiskState;
  private seq = 0;

  constructor(deps: RiskManagerDeps) {
    this.cfg = deps.config;
    this.boundary = deps.boundary;
    this.specs = deps.specs;
    this.margin = deps.margin;
    this.bus = deps.bus ?? getEventBus();
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
    this.state = this.freshState(this.now());
  }

  private freshState(now: number): MutableRiskState {
    return {
      day: dayKey(now, this.boundary),
      dailyRealizedPnl: 0,
      dailyTradeCount: 0,
      lastResetAt: dayStart(now, this.boundary),
      haltedUntil: null,
      paused: false,
      haltOverridden: false,
      consumedSignalIds: [],
    };
  }

  snapshot(): RiskState {
    return { ...this.state, consumedSignalIds: [...this.consumed] };
  }

  get reservedCount(): number { return this.reservations.size; }

  isHalted(now = this.now()): boolean {
    return this.state.haltedUntil !== null && this.state.haltedUntil > now;
  }

  /**
   * Loads persisted counters. A halt is kept only with persistHaltAcrossRestart;
   * otherwise the restart counts as an operator override for the rest of the day.
   */
  restore(): Promise<RiskState> {
    return this.queue.run(async () => {
      const saved = this.store ? await this.store.loadRisk() : null;
      if (saved) {
        this.state = { ...saved, consumedSignalIds: [] };
        this.consumed.clear();
        for (const id of saved.consumedSignalIds) this.consumed.add(id);
        if (!this.cfg.persistHaltAcrossRestart && saved.haltedUntil !== null) {
          this.state.haltedUntil = null;
          this.state.haltOverridden = true;
          log('WARN', 'RISK', 'persisted halt dropped on restart', { day: saved.day });
        }
      }
      this.rolloverIfDue(this.now());
      await this.persist();
      return this.snapshot();
    });
  }

  authorize(signal: Signal): Promise<AuthorizeResult> {
    return this.queue.run(async () => {
      const now = this.now();
      if (this.rolloverIfDue(now)) await this.persist();
      const ctx = { symbol: signal.symbol, action: 'authorize', signalId: signal.id };
      const s = this.state;

      if (s.paused) return err(new RiskLimitError('PAUSED', 'entries paused by operator', ctx));
      if (this.isHalted(now)) {
        return err(new RiskLimitError('HALTED', `halted until ${new Date(s.haltedUntil ?? now).toISOString()}`, ctx));
      }
      const committed = s.dailyTradeCount + this.reservations.size;
      if (committed >= this.cfg.maxTradesPerDay) {
        return err(new RiskLimitError('MAX_TRADES', `daily trade cap reached (${s.dailyTradeCount} filled, ${this.reservations.size} pending, max ${this.cfg.maxTradesPerDay})`, ctx));
      }
      if (!s.haltOverridden && !(s.dailyRealizedPnl > -this.cfg.maxDailyLoss)) {
        return err(new RiskLimitError('MAX_DAILY_LOSS', `daily loss ${s.dailyRealizedPnl.toFixed(2)} at limit ${-this.cfg.maxDailyLoss}`, ctx));
      }
      if (this.consumed.has(signal.id)) {
        return err(new ValidationError('SIGNAL_CONSUMED', `signal ${signal.id} already authorized`, ctx));
      }

      const sized = await this.size(signal, ctx);
      if (!sized.ok) return sized;

      const reservationId = `rsv-${signal.id}-${++this.seq}`;
      this.reservations.set(reservationId, { symbol: signal.symbol, signalId: signal.id, at: now });
      this.consumed.add(signal.id);
      await this.persist();
      return ok({ reservationId, signalId: signal.id, symbol: signal.symbol, ...sized.value });
    });
  }

  /** Effective stop distance: ATR-based, floored at the symbol's minimum distance. */
  stopDistanceFor(symbol: string, atr: number, price: number): number {
    const spec = this.specs.get(symbol);
    return Math.max(atr * this.cfg.stopMultiplier, price * spec.minStopDistancePct);
  }

  private async size(signal: Signal, ctx: { symbol: string; action: string; signalId: string }): Promise<Result<{ quantity: number; stopDistance: number; riskAmount: number }, Denial>> {
    const spec = this.specs.get(signal.symbol);
    if (!(signal.atr > 0) || !(signal.referencePrice > 0)) {
      return err(new ValidationError('BAD_SIGNAL', 'signal has no usable ATR or price', ctx));
    }
    const stopDistance = this.stopDistanceFor(signal.symbol, signal.atr, signal.referencePrice);
    let available: number;
    try {
      available = await this.margin();
    } catch (e) {
      const cause = toEngineError(e, ctx);
      return err(new DataError('MARGIN_UNAVAILABLE', `margin query failed: ${cause.message}`, ctx, cause));
    }
    const byRisk = this.cfg.riskPerTrade / stopDistance;
    const byMargin = Math.max(0, available) * this.cfg.leverage / signal.referencePrice;
    const quantity = floorToStep(Math.min(byRisk, this.cfg.maxPositionSize, byMargin), spec.qtyStep);
    if (quantity < spec.minQty) {
      return err(new ValidationError('SIZE_TOO_SMALL', `size ${quantity} below minimum ${spec.minQty} (risk ${byRisk.toFixed(6)}, margin ${byMargin.toFixed(6)})`, ctx));
    }
    return ok({ quantity, stopDistance, riskAmount: quantity * stopDistance });
  }

  /** Frees a trade slot held for an entry that never filled. */
  releaseReservation(reservationId: string): Promise<boolean> {
    return this.queue.run(async () => {
      const had = this.reservations.delete(reservationId);
      if (had) await this.persist();
      return had;
    });
  }

  /**
   * Applies a confirmed fill. Crossing the loss limit latches a halt until the
   * next reset boundary and publishes RISK_HALT once per latch.
   */
  recordFill(pnlDelta: number, fill: FillRecord = {}): Promise<RiskState> {
    return this.queue.run(async () => {
      const now = this.now();
      this.rolloverIfDue(now);
      if (!Number.isFinite(pnlDelta)) throw new ValidationError('BAD_PNL', `non-finite pnl ${pnlDelta}`, { action: 'recordFill' });
      const s = this.state;
      if (fill.reservationId) this.reservations.delete(fill.reservationId);
      if (fill.newTrade) s.dailyTradeCount++;
      s.dailyRealizedPnl += pnlDelta;
      if (pnlDelta < 0 && s.dailyRealizedPnl <= -this.cfg.maxDailyLoss && !this.isHalted(now)) {
        s.haltedUntil = nextReset(now, this.boundary);
        s.haltOverridden = false;
        log('WARN', 'RISK', 'daily loss limit reached, entries halted', { pnl: s.dailyRealizedPnl, haltedUntil: s.haltedUntil });
        this.bus.publish({ type: 'RISK_HALT', haltedUntil: s.haltedUntil, dailyRealizedPnl: s.dailyRealizedPnl, maxDailyLoss: this.cfg.maxDailyLoss });
      }
      await this.persist();
      return this.snapshot();
    });
  }

  pause(): Promise<RiskState> { return this.mutate(s => { s.paused = true; }); }
  resume(): Promise<RiskState> { return this.mutate(s => { s.paused = false; }); }

  /** Operator override: lifts the loss halt until the next boundary. */
  clearHalt(): Promise<RiskState> {
    return this.mutate(s => {
      s.haltedUntil = null;
      s.haltOverridden = true;
    });
  }

  /** Housekeeping entry point; true when a new trading day started. */
  checkRollover(): Promise<boolean> {
    return this.queue.run(async () => {
      const rolled = this.rolloverIfDue(this.now());
      if (rolled) await this.persist();
      return rolled;
    });
  }

  private mutate(fn: (s: MutableRiskState) => void): Promise<RiskState> {
    return this.queue.run(async () => {
      this.rolloverIfDue(this.now());
      fn(this.state);
      await this.persist();
      return this.snapshot();
    });
  }

  private rolloverIfDue(now: number): boolean {
    if (now < nextReset(this.state.lastResetAt, this.boundary)) return false;
    const previousDay = this.state.day;
    const paused = this.state.paused;
    const keepHalt = this.state.haltedUntil !== null && this.state.haltedUntil > now;
    const haltedUntil = keepHalt ? this.state.haltedUntil : null;
    this.state = { ...this.freshState(now), paused, haltedUntil };
    this.consumed.clear();
    log('INFO', 'RISK', 'daily counters reset', { day: this.state.day, previousDay });
    this.bus.publish({ type: 'RISK_RESET', day: this.state.day, previousDay });
    return true;
  }

  private async persist(): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.saveRisk(this.snapshot());
    } catch (e) {
      log('ERROR', 'RISK', 'risk state not persisted', { error: e });
    }
  }
}
