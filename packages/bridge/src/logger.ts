/**
 * Minimal leveled logger. The bridge logs through whatever Logger the handle
 * was created with; `silentLogger` is the default.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/** Where console lines go. Defaults to the global console. */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) =>
      `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`,
    );
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/**
 * Console logger writing `[call-bridge] <level> <message> key=value ...`.
 * `warn` and `error` go to the sink's error stream.
 */
export function createConsoleLogger(
  level: LogLevel = "info",
  sink: LogSink = console,
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: Exclude<LogLevel, "silent">) =>
    (message: string, fields?: LogFields): void => {
      if (LEVEL_ORDER[lineLevel] < threshold) return;
      const line = `[call-bridge] ${lineLevel} ${message}${formatFields(fields)}`;
      if (lineLevel === "warn" || lineLevel === "error") {
        sink.error(line);
      } else {
        sink.log(line);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
