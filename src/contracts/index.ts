// Centralized contracts for the venue gateway, state persistence and notifications.
// The engine core depends only on these interfaces.

import type { MarketUpdate, OrderRequest, OrderUpdate, Position, RiskState, VenuePosition } from '../types/domain';
import type { EngineEvent } from '../application/events/types';

export interface AmendRequest {
  price?: number;
  size?: number;
}

export type OrderUpdateListener = (update: OrderUpdate) => void;

/**
 * Venue connectivity. Implementations throw tagged EngineErrors
 * (TransientGatewayError for network and rate-limit failures).
 */
export interface GatewayAdapter {
  /** Candle, trade and order-book updates for one symbol; ends when the feed closes. */
  subscribeMarketData(symbol: string): AsyncIterable<MarketUpdate>;
  /** Fill and status reports for orders placed through this gateway. */
  subscribeOrderUpdates(listener: OrderUpdateListener): () => void;
  placeOrder(request: OrderRequest): Promise<string>;
  cancelOrder(orderId: string, symbol: string): Promise<void>;
  amendOrder(orderId: string, symbol: string, amend: AmendRequest): Promise<void>;
  /** Margin available for new positions, in quote currency. */
  queryMargin(): Promise<number>;
  queryPositions(): Promise<VenuePosition[]>;
}

export interface PersistedEngineState {
  risk: RiskState | null;
  positions: Position[];
}

export interface EngineStateStore {
  loadRisk(): Promise<RiskState | null>;
  saveRisk(state: RiskState): Promise<void>;
  loadPositions(): Promise<Position[]>;
  savePositions(positions: Position[]): Promise<void>;
}

export interface NotificationChannel {
  readonly name: string;
  send(event: EngineEvent, text: string): Promise<void>;
}
