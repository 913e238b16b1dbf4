export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(v: string | undefined): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function ts() {
  return new Date().toISOString();
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta)
};

export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const base = { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // Keep it simple: JSON line logs.
  const line = JSON.stringify(out);
  // eslint-disable-next-line no-console
  if (level === "warn" || level === "error") console.error(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}
