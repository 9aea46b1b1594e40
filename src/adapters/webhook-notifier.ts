import axios from "axios";
import { BaseService } from "./base-service";
import type { NotificationChannel } from "../contracts";
import type { EngineEvent } from "../application/events/types";
import type { RetryConfig } from "../config/engine-config";
import type { Logger } from "../utils/logger";

export interface WebhookNotifierOptions {
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

/** Posts `{ text, event }` as JSON to a chat or alerting webhook. */
export class WebhookNotifier extends BaseService implements NotificationChannel {
  readonly name = 'webhook';
  private readonly timeoutMs: number;

  constructor(private readonly url: string, opts: WebhookNotifierOptions = {}) {
    super({ attempts: 2, ...opts.retry }, opts.logger);
    this.timeoutMs = opts.timeoutMs ?? 5000;
  }

  async send(event: EngineEvent, text: string): Promise<void> {
    await this.withRetry(
      () => axios.post(this.url, { text, event }, { timeout: this.timeoutMs, headers: { 'Content-Type': 'application/json' } }),
      'notify',
      { category: 'NOTIFY', context: { type: event.type, eventId: event.eventId } },
    );
  }
}
