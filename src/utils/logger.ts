export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives every emitted line without colour codes, e.g. the active run log */
export type LogSink = (line: string) => void;

let currentLevel: LogLevel = "info";
let sink: LogSink | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogSink(next: LogSink | null): void {
  sink = next;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === "object") return ` ${JSON.stringify(data, null, 2)}`;
  return ` ${String(data)}`;
}

function emit(level: LogLevel, message: string, data: unknown, write: (line: string) => void): void {
  if (!shouldLog(level)) return;

  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const body = `${message}${formatData(data)}`;

  write(`${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET} ${body}`);
  sink?.(`[${timestamp}] ${levelStr} ${body}`);
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data, (line) => console.log(line));
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data, (line) => console.log(line));
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data, (line) => console.warn(line));
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data, (line) => console.error(line));
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setSink: setLogSink,
};
