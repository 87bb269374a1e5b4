/**
 * Simple logging utility for the assessment engine.
 *
 * Lines look like `[12:03:44.512] [INFO] [runner] message {"json":"data"}`.
 * The threshold is read from ASSESS_LOG_LEVEL on every call so tests can
 * silence output without re-importing the module.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentThreshold(): number {
  const raw = (process.env.ASSESS_LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function formatTs(): string {
  return new Date().toISOString().slice(11, 23);
}

function log(level: Exclude<LogLevel, "silent">, component: string, message: string, data?: unknown) {
  if (LEVEL_ORDER[level] < currentThreshold()) return;

  const prefix = `[${formatTs()}] [${level.toUpperCase()}] [${component}]`;
  const write = level === "error" || level === "warn" ? console.error : console.log;
  if (data !== undefined) {
    write(`${prefix} ${message}`, typeof data === "object" ? JSON.stringify(data) : data);
  } else {
    write(`${prefix} ${message}`);
  }
}

/** Message text of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default {
  debug: (component: string, message: string, data?: unknown) => {
    log("debug", component, message, data);
  },
  info: (component: string, message: string, data?: unknown) => {
    log("info", component, message, data);
  },
  warn: (component: string, message: string, data?: unknown) => {
    log("warn", component, message, data);
  },
  error: (component: string, message: string, data?: unknown) => {
    log("error", component, message, data);
  },
  transition: (from: string, to: string, data?: unknown) => {
    log("debug", "runner", `${from} -> ${to}`, data);
  },
  lifecycle: (message: string, data?: unknown) => {
    log("info", "session", message, data);
  },
};
