import type { EngineErrorKind, ErrorContext } from '../errors';
import type { Direction, ExitReason, Signal, SymbolState, VenuePosition } from '../../types/domain';

export interface EventBase {
  eventId: string;
  ts: number;
}

export type SignalEvent = {
  type: 'SIGNAL_GENERATED';
  symbol: string;
  signal: Signal;
};

export type EntryDeniedEvent = {
  type: 'ENTRY_DENIED';
  symbol: string;
  signalId: string;
  kind: EngineErrorKind;
  code: string;
  message: string;
};

export type EntrySubmittedEvent = {
  type: 'ENTRY_SUBMITTED';
  symbol: string;
  positionId: string;
  orderId: string;
  direction: Direction;
  size: number;
  price: number | null;
};

export type PositionOpenedEvent = {
  type: 'POSITION_OPENED';
  symbol: string;
  positionId: string;
  direction: Direction;
  entryPrice: number;
  size: number;
  stopLossPrice: number;
  takeProfits: Array<{ price: number; size: number; fraction: number }>;
};

export type EntryCancelReason = 'timeout' | 'rejected' | 'cancelled' | 'close-all';

export type EntryCancelledEvent = {
  type: 'ENTRY_CANCELLED';
  symbol: string;
  positionId: string;
  reason: EntryCancelReason;
  detail?: string;
};

export type TakeProfitEvent = {
  type: 'TAKE_PROFIT_HIT';
  symbol: string;
  positionId: string;
  level: number;
  price: number;
  size: number;
  pnl: number;
  remainingSize: number;
};

export type StopMovedEvent = {
  type: 'STOP_MOVED';
  symbol: string;
  positionId: string;
  from: number;
  to: number;
  reason: 'breakeven' | 'trail';
};

export type StopLossEvent = {
  type: 'STOP_LOSS_HIT';
  symbol: string;
  positionId: string;
  price: number;
  size: number;
  pnl: number;
};

export type PositionClosedEvent = {
  type: 'POSITION_CLOSED';
  symbol: string;
  positionId: string;
  reason: ExitReason;
  realizedPnl: number;
  exitFraction: number;
};

export type RiskHaltEvent = {
  type: 'RISK_HALT';
  haltedUntil: number;
  dailyRealizedPnl: number;
  maxDailyLoss: number;
};

export type RiskResetEvent = {
  type: 'RISK_RESET';
  day: string;
  previousDay: string;
};

export type OrderErrorEvent = {
  type: 'ORDER_ERROR';
  symbol: string;
  state: SymbolState;
  action: string;
  kind: EngineErrorKind;
  code: string;
  message: string;
  context: ErrorContext;
};

export type DataErrorEvent = {
  type: 'DATA_ERROR';
  symbol: string;
  code: string;
  message: string;
};

export type DataStaleEvent = {
  type: 'DATA_STALE';
  symbol: string;
  lastUpdateAt: number | null;
  ageMs: number | null;
};

export type ReconciliationEvent = {
  type: 'RECONCILIATION_REQUIRED';
  symbol: string;
  local: { direction: Direction; size: number } | null;
  venue: VenuePosition | null;
  message: string;
};

export type CommandExecutedEvent = {
  type: 'COMMAND_EXECUTED';
  command: string;
  ok: boolean;
  message: string;
};

export type EngineEventPayload =
  | SignalEvent
  | EntryDeniedEvent
  | EntrySubmittedEvent
  | PositionOpenedEvent
  | EntryCancelledEvent
  | TakeProfitEvent
  | StopMovedEvent
  | StopLossEvent
  | PositionClosedEvent
  | RiskHaltEvent
  | RiskResetEvent
  | OrderErrorEvent
  | DataErrorEvent
  | DataStaleEvent
  | ReconciliationEvent
  | CommandExecutedEvent;

export type EngineEvent = EngineEventPayload & EventBase;
export type EngineEventType = EngineEventPayload['type'];
export type EventOfType<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;
