/**
 * Unified logger (console + JSONL on disk).
 *
 * Key points
 * - The log directory is bound at startup; until then entries only reach the console.
 * - Structured details are written as JSONL, one file per day.
 */

import fs from "fs-extra";
import path from "path";
import { getTimestamp } from "../../process/utils/time.js";
import type { JsonObject } from "../../types/Json.js";

type LogDetails = {
  [key: string]: JsonObject[keyof JsonObject] | undefined;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function normalizeLogDetails(details?: LogDetails): JsonObject | undefined {
  if (!details) return undefined;
  const normalized: JsonObject = {};
  for (const [key, value] of Object.entries(details)) {
    if (value !== undefined) {
      normalized[key] = value;
    }
  }
  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

/**
 * Single logger interface for the agent.
 *
 * Notes:
 * - `log(level, ...)` is async because it may write to disk.
 * - Convenience methods (`info/warn/...`) are sync and fire-and-forget.
 * - Persistence is append-only.
 */
export interface LogEntry {
  id: string;
  timestamp: string;
  type: "info" | "warn" | "error" | "debug" | "action";
  message: string;
  details?: JsonObject;
}

export class Logger {
  private logLevel: LogLevel;
  private writeChain: Promise<void> = Promise.resolve();
  private logDir: string | null = null;

  constructor(logLevel: LogLevel = "info") {
    this.logLevel = logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Enables JSONL persistence under `dir`. Passing an empty value turns it off again.
   */
  bindLogDir(dir: string | undefined): void {
    const trimmed = String(dir ?? "").trim();
    this.logDir = trimmed ? path.resolve(trimmed) : null;
  }

  /**
   * Generic async entry point; resolves once the entry is on disk (when a directory is bound).
   */
  async log(type: LogEntry["type"], message: string, details?: LogDetails): Promise<void> {
    await this.emit(type, message, details);
  }

  info(message: string, details?: LogDetails): void {
    void this.emit("info", message, details);
  }

  warn(message: string, details?: LogDetails): void {
    void this.emit("warn", message, details);
  }

  error(message: string, details?: LogDetails): void {
    void this.emit("error", message, details);
  }

  debug(message: string, details?: LogDetails): void {
    void this.emit("debug", message, details);
  }

  action(message: string, details?: LogDetails): void {
    void this.emit("action", message, details);
  }

  /**
   * Console first, then a serialized append to the JSONL file so concurrent
   * writes never interleave.
   */
  private async emit(
    type: LogEntry["type"],
    message: string,
    details?: LogDetails,
  ): Promise<void> {
    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: getTimestamp(),
      type,
      message,
      details: normalizeLogDetails(details),
    };

    this.printLog(entry);

    this.writeChain = this.writeChain
      .then(() => this.saveToFile(entry))
      .catch((error: unknown) => {
        // The console is the only place left to report a broken log file.
        console.error(`[logger] failed to persist log entry: ${String(error)}`);
      });
    await this.writeChain;
  }

  private shouldPrint(type: LogEntry["type"]): boolean {
    const rank = type === "action" ? LEVEL_RANK.info : LEVEL_RANK[type];
    return rank >= LEVEL_RANK[this.logLevel];
  }

  private printLog(entry: LogEntry): void {
    if (!this.shouldPrint(entry.type)) return;
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.type.toUpperCase().padEnd(7);
    const message = `[${timestamp}] [${level}] ${entry.message}`;

    switch (entry.type) {
      case "error":
        console.error(`\x1b[31m${message}\x1b[0m`);
        break;
      case "warn":
        console.warn(`\x1b[33m${message}\x1b[0m`);
        break;
      case "debug":
        console.log(`\x1b[90m${message}\x1b[0m`);
        break;
      case "action":
        console.log(`\x1b[36m${message}\x1b[0m`);
        break;
      default:
        console.log(message);
    }
  }

  /**
   * One file per day: `<logDir>/YYYY-MM-DD.jsonl`, one JSON entry per line.
   */
  private async saveToFile(entry: LogEntry): Promise<void> {
    if (!this.logDir) return;
    const date = entry.timestamp.split("T")[0];
    const logFile = path.join(this.logDir, `${date}.jsonl`);

    await fs.ensureDir(this.logDir);
    await fs.appendFile(logFile, JSON.stringify(entry) + "\n", "utf8");
  }

  private generateId(): string {
    return Date.now().toString(36) + Math.random().toString(36).slice(2, 8);
  }

  async saveAllLogs(): Promise<void> {
    await this.writeChain;
  }
}

export const logger = new Logger();

/**
 * Process-wide logger. Components accept a `Logger` at construction and fall back to this.
 */
export function getLogger(): Logger {
  return logger;
}
