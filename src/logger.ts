/**
 * Logging
 *
 * Console output for the operator plus an append-only log file in the
 * state directory. Log lines use the `[timestamp] [LEVEL] message` format.
 */

import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const MAX_LOG_SIZE = 1024 * 1024; // 1MB

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}\n`;
}

/**
 * Rotate the log file to `<file>.old` once it grows past 1MB.
 */
export function rotateLogFile(logPath: string, maxSize: number = MAX_LOG_SIZE): void {
  try {
    const stats = fs.statSync(logPath);
    if (stats.size > maxSize) {
      fs.renameSync(logPath, `${logPath}.old`);
    }
  } catch {
    // File doesn't exist yet
  }
}

export type ConsoleLoggerOptions = {
  /** Print debug messages to the console */
  verbose?: boolean;
  /** Append every message (debug included) to this file */
  logFile?: string;
};

/**
 * Create the CLI logger.
 *
 * Info goes to stdout; warnings and errors go to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, logFile } = options;
  let fileReady = false;

  const writeFile = (level: LogLevel, message: string): void => {
    if (!logFile) return;
    try {
      if (!fileReady) {
        fs.mkdirSync(path.dirname(logFile), { recursive: true });
        rotateLogFile(logFile);
        fileReady = true;
      }
      fs.appendFileSync(logFile, formatLogLine(level, message));
    } catch (error) {
      console.error(`Failed to write log: ${error}`);
    }
  };

  return {
    debug(message) {
      writeFile("debug", message);
      if (verbose) console.error(`  ${message}`);
    },
    info(message) {
      writeFile("info", message);
      console.log(message);
    },
    warn(message) {
      writeFile("warn", message);
      console.error(`Warning: ${message}`);
    },
    error(message) {
      writeFile("error", message);
      console.error(`Error: ${message}`);
    },
  };
}

export type LogEntry = { level: LogLevel; message: string };

export type MemoryLogger = Logger & { readonly entries: LogEntry[] };

/**
 * Logger that keeps messages in memory (tests, previews).
 */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
