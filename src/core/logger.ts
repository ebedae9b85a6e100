/**
 * Minimal leveled logger on top of console, optionally mirrored to a file.
 */
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

let threshold: LogLevel = "info";
let logFile: string | null = null;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Append every emitted line to `path` as well; null turns the file sink off. */
export function setLogFile(path: string | null): void {
  if (path !== null) mkdirSync(dirname(path), { recursive: true });
  logFile = path;
}

export function formatLine(scope: string, level: LogLevel, message: string, now = new Date()): string {
  return `${now.toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string) => {
    if (LEVELS[level] < LEVELS[threshold]) return;
    const line = formatLine(scope, level, message);
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
    if (logFile !== null) appendFileSync(logFile, `${line}\n`);
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (sub) => createLogger(`${scope}.${sub}`),
  };
}
