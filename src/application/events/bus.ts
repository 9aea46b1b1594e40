import type { EngineEvent, EngineEventPayload, EngineEventType, EventOfType } from './types';
import { log as logCat } from '../../utils/logger';

export type EventHandler<T extends EngineEvent = EngineEvent> = (event: T) => void | Promise<void>;
export type EventBusErrorHandler = (error: unknown, event: EngineEvent) => void;

export interface PublishOptions {
  /** Default true: handlers run in a microtask after publish returns. */
  async?: boolean;
}

export interface EventBus {
  publish(event: EngineEventPayload, opts?: PublishOptions): EngineEvent;
  publishAndWait(event: EngineEventPayload, opts?: { timeoutMs?: number }): Promise<EngineEvent>;
  subscribe<K extends EngineEventType>(type: K, handler: EventHandler<EventOfType<K>>): () => void;
  subscribeAll(handler: EventHandler): () => void;
  clear(): void;
  has(type: EngineEventType): boolean;
  flush(): Promise<void>;
  setErrorHandler(h: EventBusErrorHandler): void;
}

function isType<K extends EngineEventType>(event: EngineEvent, type: K): event is EventOfType<K> {
  return event.type === type;
}

function defaultErrorHandler(error: unknown, event: EngineEvent) {
  logCat('ERROR', 'EVENT', 'handler failed', { type: event.type, eventId: event.eventId, error });
}

export class InMemoryEventBus implements EventBus {
  private handlers = new Map<EngineEventType, Set<EventHandler>>();
  private wildcard = new Set<EventHandler>();
  private onError: EventBusErrorHandler = defaultErrorHandler;
  private pending = new Set<Promise<void>>();
  private seq = 0;

  constructor(private readonly now: () => number = Date.now) {}

  setErrorHandler(h: EventBusErrorHandler) { this.onError = h; }

  has(type: EngineEventType): boolean {
    const set = this.handlers.get(type);
    return this.wildcard.size > 0 || !!(set && set.size > 0);
  }

  private stamp(payload: EngineEventPayload): EngineEvent {
    const ts = this.now();
    return { ...payload, eventId: `${ts}-${++this.seq}`, ts };
  }

  private targets(type: EngineEventType): EventHandler[] {
    return [...(this.handlers.get(type) ?? []), ...this.wildcard];
  }

  private invoke(handler: EventHandler, event: EngineEvent): Promise<void> {
    return Promise.resolve()
      .then(() => handler(event))
      .catch((err: unknown) => { this.onError(err, event); });
  }

  publish(payload: EngineEventPayload, opts?: PublishOptions): EngineEvent {
    const event = this.stamp(payload);
    const handlers = this.targets(event.type);
    if (handlers.length === 0) return event;
    const async_ = opts?.async !== false; // default async
    if (!async_) {
      for (const h of handlers) {
        try {
          const r = h(event);
          if (r instanceof Promise) this.track(r.catch((err: unknown) => { this.onError(err, event); }));
        } catch (err) {
          this.onError(err, event);
        }
      }
      return event;
    }
    for (const h of handlers) this.track(this.invoke(h, event));
    return event;
  }

  async publishAndWait(payload: EngineEventPayload, opts?: { timeoutMs?: number }): Promise<EngineEvent> {
    const event = this.stamp(payload);
    const timeoutMs = Math.max(0, Number(opts?.timeoutMs ?? (process.env.EVENTBUS_HANDLER_TIMEOUT_MS || 2000)));
    const tasks = this.targets(event.type).map(h => {
      const run = this.invoke(h, event);
      if (!timeoutMs) return run;
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>(resolve => {
        timer = setTimeout(() => {
          this.onError(new Error(`event handler timeout after ${timeoutMs}ms`), event);
          resolve();
        }, timeoutMs);
      });
      return Promise.race([run, timeout]).finally(() => clearTimeout(timer));
    });
    await Promise.all(tasks);
    return event;
  }

  private track(p: Promise<void>) {
    this.pending.add(p);
    void p.finally(() => this.pending.delete(p));
  }

  subscribe<K extends EngineEventType>(type: K, handler: EventHandler<EventOfType<K>>): () => void {
    const wrapped: EventHandler = ev => (isType(ev, type) ? handler(ev) : undefined);
    let set = this.handlers.get(type);
    if (!set) { set = new Set(); this.handlers.set(type, set); }
    const target = set;
    target.add(wrapped);
    return () => { target.delete(wrapped); };
  }

  subscribeAll(handler: EventHandler): () => void {
    this.wildcard.add(handler);
    return () => { this.wildcard.delete(handler); };
  }

  /** Resolves once every handler started so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) await Promise.all([...this.pending]);
  }

  clear() {
    this.handlers.clear();
    this.wildcard.clear();
  }
}

let _bus: EventBus | undefined;
export function getEventBus(): EventBus {
  if (!_bus) _bus = new InMemoryEventBus();
  return _bus;
}
export function setEventBus(bus: EventBus) {
  _bus = bus;
}
