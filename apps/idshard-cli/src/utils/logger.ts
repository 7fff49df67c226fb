export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

type LogSink = (...data: unknown[]) => void;

/**
 * Level-filtered logger. Everything goes to stderr so stdout only ever carries the report.
 */
export function createLogger(level: LogLevel = "warn", sink: LogSink = console.error): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const emit =
    (messageLevel: LogLevel) =>
    (...data: unknown[]) => {
      if (LOG_LEVELS.indexOf(messageLevel) < threshold) {
        return;
      }
      sink(`[${messageLevel}]`, ...data);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = createLogger("error", () => {});
