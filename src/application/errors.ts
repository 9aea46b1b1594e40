export type EngineErrorKind =
  | 'DATA'
  | 'VALIDATION'
  | 'TRANSIENT_GATEWAY'
  | 'GATEWAY_AUTH'
  | 'RISK_LIMIT'
  | 'RECONCILIATION';

export interface ErrorContext {
  symbol?: string;
  state?: string;
  action?: string;
  [key: string]: string | number | boolean | undefined;
}

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
  abstract readonly retryable: boolean;
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** Stale or malformed market data. The cycle is skipped. */
export class DataError extends EngineError {
  readonly kind = 'DATA' as const;
  readonly retryable = false;
}

/** Bad order parameters or a venue rejection. Terminal for the signal. */
export class ValidationError extends EngineError {
  readonly kind = 'VALIDATION' as const;
  readonly retryable = false;
}

/** Network or rate-limit failure talking to the venue. */
export class TransientGatewayError extends EngineError {
  readonly kind = 'TRANSIENT_GATEWAY' as const;
  readonly retryable = true;
}

export class GatewayAuthError extends EngineError {
  readonly kind = 'GATEWAY_AUTH' as const;
  readonly retryable = false;
}

/** Daily loss or trade cap reached, engine paused or halted. */
export class RiskLimitError extends EngineError {
  readonly kind = 'RISK_LIMIT' as const;
  readonly retryable = false;
}

/** Local state disagrees with the venue's live position. */
export class ReconciliationError extends EngineError {
  readonly kind = 'RECONCILIATION' as const;
  readonly retryable = false;
}

export function isEngineError(e: unknown): e is EngineError {
  return e instanceof EngineError;
}

export function isTransient(e: unknown): e is TransientGatewayError {
  return e instanceof TransientGatewayError;
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENETUNREACH', 'ECONNREFUSED', 'EAI_AGAIN', 'ECONNABORTED', 'EPIPE']);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function readProp(e: unknown, key: string): unknown {
  return isRecord(e) ? e[key] : undefined;
}

function httpStatusOf(e: unknown): number | undefined {
  const direct = readProp(e, 'status');
  if (typeof direct === 'number') return direct;
  const status = readProp(readProp(e, 'response'), 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Tags a foreign error by its `code` or HTTP status. Message text is never inspected.
 */
export function toEngineError(e: unknown, context: ErrorContext = {}): EngineError {
  if (e instanceof EngineError) return e;
  const message = e instanceof Error ? e.message : String(e);
  const rawCode = readProp(e, 'code');
  const code = typeof rawCode === 'string' ? rawCode.toUpperCase() : '';
  const status = httpStatusOf(e);
  if (NETWORK_CODES.has(code)) return new TransientGatewayError(code, message, context, e);
  if (status === 429 || code === 'RATE_LIMITED') return new TransientGatewayError('RATE_LIMITED', message, context, e);
  if (status !== undefined && status >= 500) return new TransientGatewayError(`HTTP_${status}`, message, context, e);
  if (status === 401 || status === 403) return new GatewayAuthError(`HTTP_${status}`, message, context, e);
  return new ValidationError(code || (status !== undefined ? `HTTP_${status}` : 'UNCLASSIFIED'), message, context, e);
}

export interface ErrorEventMeta {
  kind: EngineErrorKind;
  code: string;
  message: string;
  context: ErrorContext;
}

export function buildErrorEventMeta(e: unknown, context: ErrorContext = {}): ErrorEventMeta {
  const tagged = toEngineError(e, context);
  return {
    kind: tagged.kind,
    code: tagged.code,
    message: tagged.message,
    context: { ...tagged.context, ...context },
  };
}
