// Prefixed console logger shared by every function and script.
// LOG_LEVEL (debug | info | warn | error) filters output; default is info.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, data?: unknown) => void;
  info:  (msg: string, data?: unknown) => void;
  warn:  (msg: string, data?: unknown) => void;
  error: (msg: string, data?: unknown) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export function createLogger(functionName: string): Logger {
  const prefix = `[${functionName}]`;

  const emit = (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (msg: string, data?: unknown) => {
      if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel()]) return;
      sink(`${prefix} ${level.toUpperCase()}:`, msg, data ?? "");
    };

  return {
    debug: emit("debug", console.log),
    info:  emit("info",  console.log),
    warn:  emit("warn",  console.warn),
    error: emit("error", console.error),
  };
}
