// Public API of the engine. Process entry points (src/tools/*) load .env themselves.

export * from './contracts';
export * from './types/domain';
export * from './application/errors';
export { InMemoryEventBus, getEventBus, setEventBus } from './application/events/bus';
export type { EventBus, EventHandler, EventBusErrorHandler, PublishOptions } from './application/events/bus';
export type * from './application/events/types';
export { formatEvent, formatPositions } from './application/events/format-event';
export { registerLoggerSubscriber } from './application/events/subscribers/logger-subscriber';
export { registerNotificationSubscriber, DEFAULT_NOTIFY_TYPES } from './application/events/subscribers/notification-subscriber';
export { loadEngineConfig, getEngineConfig, buildEngineConfig } from './config/engine-config';
export type { EngineConfig, ConfigOverrides } from './config/engine-config';
export { loadSymbolSpecs, SymbolSpecs, DEFAULT_SYMBOL_SPEC } from './config/symbols';
export { validateConfig } from './config/validate-config';
export { IndicatorPipeline } from './core/indicator-pipeline';
export { MarketAnalyzer, imbalanceRatio } from './core/market-analyzer';
export { SignalEngine, DEFAULT_RULES, trendMomentumRule, vwapBandRule } from './core/signal-engine';
export type { SignalRule, RuleVote, SignalDecision, NoSignalReason } from './core/signal-engine';
export { RiskManager } from './core/risk';
export type { Approval, AuthorizeResult, Denial } from './core/risk';
export { PositionLifecycle, TRANSITIONS, isLegalTransition } from './core/position-lifecycle';
export { GatewayService } from './adapters/gateway-service';
export { PaperGateway } from './adapters/paper-gateway';
export { FileStateStore, MemoryStateStore } from './adapters/state-store-fs';
export { WebhookNotifier } from './adapters/webhook-notifier';
export { ScalpingEngine } from './app/engine';
export type { EngineCommand, CommandResult, EngineStatus, StartOptions } from './app/engine';
export { SymbolWorker } from './app/symbol-worker';
export type { CycleOutcome } from './app/symbol-worker';
export * from './utils/indicators';
