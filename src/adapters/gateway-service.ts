import { BaseService } from "./base-service";
import type { AmendRequest, GatewayAdapter, OrderUpdateListener } from "../contracts";
import type { RetryConfig } from "../config/engine-config";
import type { Logger } from "../utils/logger";
import type { MarketUpdate, OrderRequest, VenuePosition } from "../types/domain";

/**
 * Gateway decorator adding bounded retries for transient failures.
 * Streams pass through untouched.
 */
export class GatewayService extends BaseService implements GatewayAdapter {
  constructor(private readonly inner: GatewayAdapter, retry: Partial<RetryConfig> = {}, logger?: Logger) {
    super(retry, logger);
  }

  subscribeMarketData(symbol: string): AsyncIterable<MarketUpdate> {
    return this.inner.subscribeMarketData(symbol);
  }

  subscribeOrderUpdates(listener: OrderUpdateListener): () => void {
    return this.inner.subscribeOrderUpdates(listener);
  }

  placeOrder(request: OrderRequest): Promise<string> {
    return this.withRetry(() => this.inner.placeOrder(request), 'placeOrder', {
      category: 'EXEC',
      context: { symbol: request.symbol, kind: request.kind, side: request.side, size: request.size, clientId: request.clientId },
    });
  }

  cancelOrder(orderId: string, symbol: string): Promise<void> {
    return this.withRetry(() => this.inner.cancelOrder(orderId, symbol), 'cancelOrder', { category: 'EXEC', context: { symbol, orderId } });
  }

  amendOrder(orderId: string, symbol: string, amend: AmendRequest): Promise<void> {
    return this.withRetry(() => this.inner.amendOrder(orderId, symbol, amend), 'amendOrder', {
      category: 'EXEC',
      context: { symbol, orderId, price: amend.price, size: amend.size },
    });
  }

  queryMargin(): Promise<number> {
    return this.withRetry(() => this.inner.queryMargin(), 'queryMargin', { category: 'API' });
  }

  queryPositions(): Promise<VenuePosition[]> {
    return this.withRetry(() => this.inner.queryPositions(), 'queryPositions', { category: 'API' });
  }
}
