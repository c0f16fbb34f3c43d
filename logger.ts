import type { LogLevel, MemoryLogger } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger that writes every level to stderr, so command output on stdout
 * stays parseable.
 */
export function createConsoleLogger(level: LogLevel = "info"): MemoryLogger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: LogLevel) => (message: string) => {
    if (LEVEL_ORDER[at] < threshold) return;
    console.error(`[${at}] ${message}`);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
