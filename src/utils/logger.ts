import { appendFileSync, mkdirSync } from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let currentLevel: LogLevel = "info";
let logFilePath: string | null = null;

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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Mirror every emitted line to a file (without color codes).
 * Pass null to stop writing to the file.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    mkdirSync(path.dirname(filePath), { recursive: true });
  }
  logFilePath = filePath;
}

export function getLogFile(): string | null {
  return logFilePath;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return ` ${data.message}`;
  }
  if (typeof data === "object" && data !== null) {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  colorize: boolean = true,
): string {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const suffix = data !== undefined ? formatData(data) : "";

  if (!colorize) {
    return `[${timestamp}] ${levelStr} ${message}${suffix}`;
  }

  const color = LEVEL_COLORS[level];
  return `${color}[${timestamp}] ${levelStr}${RESET} ${message}${suffix}`;
}

function writeToFile(level: LogLevel, message: string, data?: unknown): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, `${formatMessage(level, message, data, false)}\n`);
  } catch (e) {
    const target = logFilePath;
    // Stop retrying on every line; the console still gets the output
    logFilePath = null;
    console.error(formatMessage("error", `Cannot write to log file ${target}`, e));
  }
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data));
    writeToFile("debug", message, data);
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data));
    writeToFile("info", message, data);
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data));
    writeToFile("warn", message, data);
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data));
    writeToFile("error", message, data);
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setFile: setLogFile,
};
