/**
 * Logging goes to stderr: stdout carries the MCP stdio transport and must
 * only ever see protocol frames.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let currentLevel: LogLevel = resolveLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function write(level: LogLevel, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  console.error(prefix, ...args);
}

export function logDebug(...args: unknown[]): void {
  write("debug", args);
}

export function logInfo(...args: unknown[]): void {
  write("info", args);
}

export function logWarn(...args: unknown[]): void {
  write("warn", args);
}

export function logError(...args: unknown[]): void {
  write("error", args);
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
