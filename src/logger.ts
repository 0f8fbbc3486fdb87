import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

// stdout carries command output; diagnostics always go to stderr.
export function createLogger(level: LogLevel): Logger {
  if (level === "debug" || level === "trace") {
    return pino({
      name: "pymanager",
      level,
      transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
    });
  }
  return pino({ name: "pymanager", level }, pino.destination(2));
}
