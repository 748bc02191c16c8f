import pino, { type Level, type Logger } from "pino";

export type { Logger } from "pino";

/** Numeric console level used when the flag is absent or not an integer (pino "info"). */
export const CONSOLE_DEFAULT_LEVEL = 30;

export type ConsoleLevel = Level | "silent";

export interface LoggerOptions {
  level?: ConsoleLevel;
  pretty?: boolean;
  name?: string;
}

/**
 * Parse the value of `--console-log-level`.
 * Anything that is not an integer falls back to CONSOLE_DEFAULT_LEVEL.
 */
export function parseConsoleLevel(raw: string | number | undefined | null): number {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? raw : CONSOLE_DEFAULT_LEVEL;
  }
  if (raw == null) return CONSOLE_DEFAULT_LEVEL;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return CONSOLE_DEFAULT_LEVEL;
  return Number.parseInt(trimmed, 10);
}

/** Map a numeric verbosity onto pino's level names (10 trace ... 60 fatal). */
export function toPinoLevel(numeric: number): ConsoleLevel {
  if (numeric <= 10) return "trace";
  if (numeric <= 20) return "debug";
  if (numeric <= 30) return "info";
  if (numeric <= 40) return "warn";
  if (numeric <= 50) return "error";
  if (numeric <= 60) return "fatal";
  return "silent";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "gallery-uploader",
    level: options.level ?? "info",
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  });
}

/** A logger that drops everything; used by tests and library callers that pass none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
