export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger. Every line is prefixed with `[scope]`; anything
 * below `level` is dropped.
 */
export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    if (typeof console === "undefined") return;
    const line = `${prefix} ${message}`;
    switch (lvl) {
      case "debug":
        console.debug(line, ...details);
        break;
      case "info":
        console.info(line, ...details);
        break;
      case "warn":
        console.warn(line, ...details);
        break;
      case "error":
        console.error(line, ...details);
        break;
    }
  };

  return {
    scope,
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
