export type Direction = 'long' | 'short';
export type OrderSide = 'buy' | 'sell';

export interface Candle {
  readonly openTime: number; // ms epoch
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface Trade {
  readonly ts: number;
  readonly price: number;
  readonly size: number;
  readonly side: OrderSide; // aggressor side
}

export interface BookLevel {
  readonly price: number;
  readonly size: number;
}

export interface OrderBookSnapshot {
  readonly ts: number;
  readonly bids: readonly BookLevel[]; // best first
  readonly asks: readonly BookLevel[];
}

export type MarketUpdate =
  | { readonly type: 'candle'; readonly symbol: string; readonly candle: Candle }
  | { readonly type: 'trade'; readonly symbol: string; readonly trade: Trade }
  | { readonly type: 'orderbook'; readonly symbol: string; readonly book: OrderBookSnapshot };

// ---- Indicators ----

export type IndicatorName = 'sma' | 'emaFast' | 'emaSlow' | 'atr' | 'rsi' | 'vwap';

export type IndicatorReading =
  | { readonly status: 'warming'; readonly have: number; readonly need: number }
  | { readonly status: 'ready'; readonly value: number; readonly history: readonly number[] };

export interface IndicatorState {
  readonly symbol: string;
  readonly asOf: number; // openTime of the candle that produced this state
  readonly close: number;
  readonly readings: Readonly<Record<IndicatorName, IndicatorReading>>;
}

// ---- Confirmation ----

export type ConfirmationMetrics =
  | {
    readonly status: 'fresh';
    readonly imbalanceRatio: number;
    readonly relativeVolume: number;
    readonly unusualVolume: boolean;
    readonly bookAt: number;
  }
  | { readonly status: 'stale'; readonly reason: string }
  | { readonly status: 'warming'; readonly reason: string };

// ---- Signals ----

export interface Signal {
  readonly id: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly confidence: number;
  readonly triggers: readonly string[];
  readonly timestamp: number;
  readonly referencePrice: number;
  readonly atr: number;
}

// ---- Orders ----

export type OrderKind = 'entry' | 'stop' | 'take-profit' | 'close';
export type OrderType = 'market' | 'limit' | 'stop';
export type OrderStatus = 'new' | 'partially_filled' | 'filled' | 'cancelled' | 'rejected';

export interface OrderRequest {
  readonly clientId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly kind: OrderKind;
  readonly type: OrderType;
  readonly size: number;
  readonly price?: number; // limit price or stop trigger
  readonly reduceOnly: boolean;
}

export interface Order extends OrderRequest {
  readonly id: string;
  status: OrderStatus;
}

/** Venue report for one of our orders; filledSize/avgPrice are cumulative. */
export interface OrderUpdate {
  readonly orderId: string;
  readonly symbol: string;
  readonly status: OrderStatus;
  readonly filledSize: number;
  readonly avgPrice: number;
  readonly ts: number;
  readonly reason?: string;
}

export interface VenuePosition {
  readonly symbol: string;
  readonly direction: Direction;
  readonly size: number;
  readonly entryPrice: number;
}

export function sideFor(direction: Direction, closing = false): OrderSide {
  const opening: OrderSide = direction === 'long' ? 'buy' : 'sell';
  if (!closing) return opening;
  return opening === 'buy' ? 'sell' : 'buy';
}

/** +1 for long, -1 for short. */
export function directionSign(direction: Direction): 1 | -1 {
  return direction === 'long' ? 1 : -1;
}

// ---- Risk ----

export interface RiskState {
  readonly day: string;
  readonly dailyRealizedPnl: number;
  readonly dailyTradeCount: number;
  readonly lastResetAt: number;
  readonly haltedUntil: number | null;
  readonly paused: boolean;
  /** Operator lifted the loss halt for the rest of the trading day. */
  readonly haltOverridden: boolean;
  /** Signal ids already authorized this trading day. */
  readonly consumedSignalIds: readonly string[];
}

// ---- Positions ----

/** Per-symbol lifecycle state. Idle and ManualReview have no live position. */
export type SymbolState = 'Idle' | 'EntryPending' | 'Open' | 'PartiallyClosed' | 'Closed' | 'ManualReview';
export type PositionState = 'EntryPending' | 'Open' | 'PartiallyClosed' | 'Closed';

export interface TakeProfitLevel {
  readonly index: number;
  readonly price: number;
  readonly fraction: number;
  readonly size: number;
  orderId: string | null;
  filled: boolean;
}

export type ExitReason = 'take-profit' | 'stop-loss' | 'close';

export interface PositionExit {
  readonly reason: ExitReason;
  readonly price: number;
  readonly size: number;
  /** size / filled entry size */
  readonly fraction: number;
  readonly pnl: number;
  readonly ts: number;
}

/** Cumulative fill seen for one order. */
export interface OrderFill {
  size: number;
  notional: number;
}

export interface Position {
  readonly id: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly signalId: string;
  readonly reservationId: string;
  readonly requestedSize: number;
  readonly atr: number;
  readonly submittedAt: number;
  state: PositionState;
  entryOrderId: string | null;
  entryPrice: number;
  size: number;
  remainingSize: number;
  stopLossPrice: number | null;
  stopOrderId: string | null;
  closeOrderId: string | null;
  takeProfitLevels: TakeProfitLevel[];
  exits: PositionExit[];
  realizedPnl: number;
  openedAt: number | null;
  closedAt: number | null;
  movedToBreakeven: boolean;
  /** Set while the symbol waits for an operator; survives restarts. */
  reviewReason: string | null;
  /** Cumulative fills per exit order id, so a repeated report applies once. */
  fills: Record<string, OrderFill>;
}

export function pnlOf(direction: Direction, entry: number, exit: number, size: number): number {
  return directionSign(direction) * (exit - entry) * size;
}
