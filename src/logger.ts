// ── Scoped logger ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let defaultLevel: LogLevel = "info";

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function formatLogLine(
  level: Exclude<LogLevel, "silent">,
  scope: string,
  message: string,
  meta?: LogMeta,
  now: Date = new Date(),
): string {
  const parts = [now.toISOString(), level.toUpperCase(), `[${scope}]`, message];
  if (meta && Object.keys(meta).length > 0) {
    parts.push(JSON.stringify(meta));
  }
  return parts.join(" ");
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) => {
    if (RANK[lvl] < RANK[level ?? defaultLevel]) {
      return;
    }
    const line = formatLogLine(lvl, scope, message, meta);
    if (lvl === "warn" || lvl === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  };
  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
