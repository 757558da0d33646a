export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Logger whose lines carry `[scope]` and whose data is merged with `bound`. */
  child(scope: string, bound?: LogData): Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string, msg: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

function createLogger(scope: string, bound: LogData): Logger {
  const merge = (data?: LogData): LogData | undefined =>
    Object.keys(bound).length > 0 ? { ...bound, ...data } : data;

  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", scope, msg, merge(data)));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", scope, msg, merge(data)));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", scope, msg, merge(data)));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", scope, msg, merge(data)));
    },
    child(childScope, childBound) {
      const nextScope = scope ? `${scope}:${childScope}` : childScope;
      return createLogger(nextScope, { ...bound, ...childBound });
    },
  };
}

export const log: Logger = createLogger("", {});
