export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

type Sink = (line: string) => void;

const sinks: Record<LogLevel, Sink> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Console logger. Lines look like
 * `2026-01-01T00:00:00.000Z INFO  [weather] Stored 3 samples`.
 */
export function createLogger(level: LogLevel, scope?: string): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (messageLevel: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(messageLevel) < threshold) return;
    const prefix = `${new Date().toISOString()} ${messageLevel.toUpperCase().padEnd(5)}`;
    sinks[messageLevel](scope ? `${prefix} [${scope}] ${message}` : `${prefix} ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
