/**
 * stderr logger. stdout is reserved for the JSON the agent supervisor reads,
 * so every diagnostic goes through console.error.
 */

export type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

export type Logger = {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warning(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
};

function parseLevel(raw: string | undefined): LogLevel {
  const v = String(raw ?? "").trim().toLowerCase();
  if (v === "warn") return "warning";
  if (v === "debug" || v === "info" || v === "warning" || v === "error") return v;
  return "warning";
}

export function currentLogLevel(): LogLevel {
  return parseLevel(process.env.HOOKWARDEN_LOG_LEVEL);
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, args: unknown[]) => {
    // Read per call so tests and the CLI can change the level at runtime.
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) return;
    console.error(`hookwarden:${scope}: [${level}] ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warning: (message, ...args) => emit("warning", message, args),
    error: (message, ...args) => emit("error", message, args),
  };
}
