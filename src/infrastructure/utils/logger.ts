/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "../../shared/utils/RandomUtils";

/**
 * Logging utility for the compatibility layer.
 *
 * Features:
 * - Console output with colored levels
 * - Minimum level filtering
 * - Category-based logging for subsystem identification
 * - Memory buffer with optional evacuation to JSON Lines files
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry with category support.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Aggregated metrics for analysis.
 */
interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  totalCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, counted from the newest entry */
  limit?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  /** Write console output; the memory buffer is always filled */
  console: boolean;
  maxMemoryLogs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
  /** Append evacuated entries to `<logDir>/logs-YYYY-MM-DD.jsonl` */
  toFile: boolean;
  logDir: string;
  writeIntervalMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

function isLogCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" &&
    Object.values(LogCategory).some((category) => category === value)
  );
}

const envLevel = (process.env.LOG_LEVEL ?? "info").toLowerCase();

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: isLogLevel(envLevel) ? envLevel : LogLevel.INFO,
  console: process.env.LOG_CONSOLE !== "false",
  maxMemoryLogs: 2000,
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  toFile: false,
  logDir: path.join(process.cwd(), "logs"),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
};

/**
 * Generate a unique ID for log entries.
 */
function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.float().toString(36).substring(2, 9)}`;
}

/**
 * Get current date string for file naming (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

/**
 * Logger with level filtering, memory buffering and optional file output.
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private writeInterval?: NodeJS.Timeout;
  private writePromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.toFile) {
      this.startFileOutput();
    }
  }

  private startFileOutput(): void {
    this.ensureLogDir();
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
    }
    this.writeInterval = setInterval(
      () => this.evacuateToFile(),
      this.config.writeIntervalMs,
    );
    this.writeInterval.unref();
  }

  private initMetrics(): LogMetrics {
    const byLevel = Object.fromEntries(
      Object.values(LogLevel).map((level) => [level, 0]),
    ) as Record<LogLevel, number>;
    const byCategory = Object.fromEntries(
      Object.values(LogCategory).map((cat) => [cat, 0]),
    ) as Record<LogCategory, number>;

    return { byLevel, byCategory, totalCount: 0 };
  }

  private ensureLogDir(): void {
    try {
      if (!fs.existsSync(this.config.logDir)) {
        fs.mkdirSync(this.config.logDir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private getLogFilePath(): string {
    return path.join(this.config.logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.category}]${reset} ${entry.message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.shift();
    }
    if (this.config.toFile) {
      this.pendingWrites.push(entry);
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.totalCount++;
  }

  private evacuateToFile(): void {
    this.writePromise = this.writePromise.then(() => this.doEvacuate());
  }

  private async doEvacuate(): Promise<void> {
    if (this.pendingWrites.length === 0) return;

    const logsToWrite = this.pendingWrites;
    this.pendingWrites = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrites = [...logsToWrite, ...this.pendingWrites];
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    }
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      data,
    };
    this.addToMemory(entry);

    if (!this.config.console) return;

    const consoleMsg = this.formatConsoleMessage(entry);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, data);
    } else {
      this.log(level, LogCategory.GENERAL, message, categoryOrData);
    }
  }

  debug(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * Starts appending entries logged from now on to JSON Lines files in
   * `logDir`.
   */
  configureFile(logDir: string): void {
    this.config.toFile = true;
    this.config.logDir = path.resolve(logDir);
    this.startFileOutput();
  }

  /**
   * Number of entries waiting to be written to file.
   */
  getPendingWriteCount(): number {
    return this.pendingWrites.length;
  }

  /**
   * Get current aggregated metrics.
   */
  getMetrics(): LogMetrics {
    return {
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
      totalCount: this.metrics.totalCount,
    };
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Force immediate evacuation of pending entries to file.
   */
  async flush(): Promise<void> {
    this.evacuateToFile();
    await this.writePromise;
  }

  /**
   * Drops buffered entries, metrics and throttle state.
   */
  clear(): void {
    this.memoryBuffer = [];
    this.pendingWrites = [];
    this.throttleMap.clear();
    this.metrics = this.initMetrics();
  }

  destroy(): void {
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
      this.writeInterval = undefined;
    }
  }

  hasWriteTimer(): boolean {
    return this.writeInterval !== undefined;
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
