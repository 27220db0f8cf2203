export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.MONOWEAVE_LOG_LEVEL || process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let current: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel) {
  current = level;
}

export function getLogLevel(): LogLevel {
  return current;
}

function fmt(tag: string, level: Exclude<LogLevel, "silent">, msg: string, extra?: unknown) {
  const time = new Date().toISOString();
  if (extra === undefined) { return `[${tag}] ${time} ${level.toUpperCase()} ${msg}`; }
  return `[${tag}] ${time} ${level.toUpperCase()} ${msg} ${stringify(extra)}`;
}

function stringify(extra: unknown): string {
  if (extra instanceof Error) {
    return JSON.stringify({ name: extra.name, message: extra.message });
  }
  try {
    return JSON.stringify(extra, (_key, value: unknown) => (value instanceof Set ? [...value] : value));
  } catch {
    return String(extra);
  }
}

export interface Logger {
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
  child(scope: string): Logger;
}

export function createLogger(scope?: string): Logger {
  const tag = scope ? `monoweave:${scope}` : "monoweave";
  const enabled = (level: Exclude<LogLevel, "silent">) => LEVELS[current] <= LEVELS[level];

  return {
    debug(msg, extra) {
      if (enabled("debug")) { console.debug(fmt(tag, "debug", msg, extra)); }
    },
    info(msg, extra) {
      if (enabled("info")) { console.info(fmt(tag, "info", msg, extra)); }
    },
    warn(msg, extra) {
      if (enabled("warn")) { console.warn(fmt(tag, "warn", msg, extra)); }
    },
    error(msg, extra) {
      if (enabled("error")) { console.error(fmt(tag, "error", msg, extra)); }
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
