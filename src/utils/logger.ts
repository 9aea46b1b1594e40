// Thin interface and default logger instance
export type Level = "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface Logger {
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
  log?(level: Level, category: string, msg: string, meta?: unknown): void;
}

let context: Record<string, string | number | boolean> = {};
const redactKeys = new Set<string>([
  'apikey', 'key', 'secret', 'passphrase', 'signature', 'token', 'refreshtoken',
  'privatekey', 'authorization', 'auth', 'password', 'webhookurl'
]);
const onceFlags = new Set<string>();

/**
 * Converts a log level string to its corresponding numeric value.
 * - "TRACE" = 0
 * - "DEBUG" = 10
 * - "INFO"  = 20
 * - "WARN"  = 30
 * - "ERROR" = 40
 * - "FATAL" = 50
 */
function levelValue(l: Level): number {
  switch (l) {
    case "TRACE": return 0;
    case "DEBUG": return 10;
    case "INFO": return 20;
    case "WARN": return 30;
    case "ERROR": return 40;
    case "FATAL": return 50;
  }
}

const LEVELS: readonly Level[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

function isLevel(v: string): v is Level {
  return (LEVELS as readonly string[]).includes(v);
}

/**
 * Current threshold from LOG_LEVEL; defaults to INFO when unset or invalid.
 */
function currentThreshold(): number {
  const env = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  return levelValue(isLevel(env) ? env : "INFO");
}
function ts(): string { return new Date().toISOString(); }

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function redactMeta(meta: unknown): unknown {
  if (meta == null) return meta;
  if (meta instanceof Error) return { name: meta.name, message: meta.message };
  if (Array.isArray(meta)) return meta.map(redactMeta);
  if (!isRecord(meta)) return meta;
  const out: Record<string, unknown> = {};
  let redacted = false;
  for (const [k, v] of Object.entries(meta)) {
    if (redactKeys.has(k.toLowerCase())) { out[k] = '***'; redacted = true; continue; }
    out[k] = redactMeta(v);
  }
  if (redacted) out.redacted = true;
  return out;
}

/**
 * Emits a log line if its level is at or above the current threshold.
 * JSON output when LOG_JSON=1, plain text otherwise. Context fields are appended to both.
 */
function emit(level: Level, category: string | undefined, message: string, meta?: unknown) {
  // TEST_MODE keeps test output readable: only ERROR and above
  if (process.env.TEST_MODE === '1' && levelValue(level) < 40) return;
  if (levelValue(level) < currentThreshold()) return;
  const redMeta = redactMeta(meta);
  if (process.env.LOG_JSON === "1") {
    const entry = {
      ts: ts(),
      level,
      category,
      message,
      data: redMeta != null ? [redMeta] : [],
      ...context
    };
    const line = JSON.stringify(entry);
    if (level === "ERROR" || level === "FATAL") console.error(line);
    else if (level === "WARN") console.warn(line);
    else console.log(line);
    return;
  }

  let ctxStr = "";
  if (Object.keys(context).length > 0) {
    ctxStr = " " + Object.entries(context).map(([k, v]) => `[${k}=${String(v)}]`).join(" ");
  }
  const prefix = `[${level}]${category ? `[${category}]` : ''}`;
  const line = `${prefix} ${message}${ctxStr}`;
  const rest = redMeta != null ? [redMeta] : [];

  if (level === "ERROR" || level === "FATAL") console.error(line, ...rest);
  else if (level === "WARN") console.warn(line, ...rest);
  else console.log(line, ...rest);
}

/**
 * Merges the provided context into the logger context. Existing keys are overwritten.
 */
export function setLoggerContext(ctx: Record<string, string | number | boolean>) {
  context = { ...context, ...ctx };
}

/** Clears the whole context, or only the given keys. */
export function clearLoggerContext(keys?: string[]) {
  if (!keys) { context = {}; return; }
  const next = { ...context };
  for (const k of keys) delete next[k];
  context = next;
}

export function addLoggerRedactFields(keys: string[]) {
  for (const k of keys) redactKeys.add(String(k).toLowerCase());
}

export function warnOnce(id: string, message: string, meta?: unknown) {
  if (onceFlags.has(id)) return;
  onceFlags.add(id);
  emit('WARN', 'CONFIG', message, meta);
}

/** Test helper: forget which warnOnce ids have fired. */
export function resetWarnOnce() { onceFlags.clear(); }

export function logTrace(message: string, meta?: unknown) { emit("TRACE", undefined, message, meta); }
export function logDebug(message: string, meta?: unknown) { emit("DEBUG", undefined, message, meta); }
export function logInfo(message: string, meta?: unknown) { emit("INFO", undefined, message, meta); }
export function logWarn(message: string, meta?: unknown) { emit("WARN", undefined, message, meta); }
export function logError(message: string, meta?: unknown) { emit("ERROR", undefined, message, meta); }
export function logFatal(message: string, meta?: unknown) { emit("FATAL", undefined, message, meta); }

// category-aware API
export function log(level: Level, category: string, message: string, meta?: unknown) {
  emit(level, category, message, meta);
}

// Default DI-friendly logger implementation
export const logger: Logger = {
  debug: (msg, meta) => emit("DEBUG", undefined, msg, meta),
  info: (msg, meta) => emit("INFO", undefined, msg, meta),
  warn: (msg, meta) => emit("WARN", undefined, msg, meta),
  error: (msg, meta) => emit("ERROR", undefined, msg, meta),
  log: (level, category, msg, meta) => emit(level, category, msg, meta),
};
