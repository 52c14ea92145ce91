/**
 * Leveled console logger with an optional plain-text file sink
 */

import { appendFileSync, mkdirSync } from "node:fs";
import * as path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LevelStyle {
  priority: number;
  /** ANSI color of the timestamp and label */
  color: string;
  write: (line: string) => void;
}

const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { priority: 0, color: "\x1b[90m", write: (line) => console.log(line) },
  info: { priority: 1, color: "\x1b[36m", write: (line) => console.log(line) },
  warn: { priority: 2, color: "\x1b[33m", write: (line) => console.warn(line) },
  error: { priority: 3, color: "\x1b[31m", write: (line) => console.error(line) },
};

const RESET = "\x1b[0m";

let currentLevel: LogLevel = "info";
let logFile: string | null = null;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror every emitted line, without colors, to a file. Pass null to stop.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    mkdirSync(path.dirname(filePath), { recursive: true });
  }
  logFile = filePath;
}

export function getLogFile(): string | null {
  return logFile;
}

function describe(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.name}: ${data.message}`;
  if (typeof data === "object" && data !== null) return ` ${JSON.stringify(data, null, 2)}`;
  return ` ${String(data)}`;
}

function appendToFile(file: string, line: string): void {
  try {
    appendFileSync(file, `${line}\n`);
  } catch (err) {
    logFile = null;
    emit("error", `Cannot write log file ${file}, disabling it`, err);
  }
}

function emit(level: LogLevel, message: string, data?: unknown): void {
  const style = LEVELS[level];
  if (style.priority < LEVELS[currentLevel].priority) {
    return;
  }

  const prefix = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)}`;
  const text = `${message}${describe(data)}`;

  style.write(`${style.color}${prefix}${RESET} ${text}`);
  if (logFile) {
    appendToFile(logFile, `${prefix} ${text}`);
  }
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data);
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
