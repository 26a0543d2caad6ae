/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "../../shared/utils/RandomUtils";
import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Logging utility for the quest engine.
 *
 * Features:
 * - Console output with colored levels, filtered by LOG_LEVEL
 * - Bounded memory buffer holding every entry for queries
 * - Optional JSON Lines evacuation to disk (LOG_TO_FILE)
 * - Category-based logging for subsystem identification
 * - Correlation IDs for tracking related events
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam
 */

/**
 * Log entry with category and correlation support.
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
  /** Optional correlation ID to link related events */
  correlationId?: string;
  /** Optional player ID if the log relates to a specific player */
  playerId?: string;
  data?: unknown;
}

export interface LogMetrics {
  byLevel: Partial<Record<LogLevel, number>>;
  byCategory: Partial<Record<LogCategory, number>>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  correlationId?: string;
  playerId?: string;
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, newest kept */
  limit?: number;
}

export type ConsoleThreshold = LogLevel | "silent";

export interface LoggerConfig {
  maxMemoryLogs: number;
  consoleLevel: ConsoleThreshold;
  toFile: boolean;
  logDir: string;
  writeIntervalMs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function isLogLevel(value: unknown): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

function parseConsoleThreshold(value: string | undefined): ConsoleThreshold {
  if (value === "silent") return "silent";
  return isLogLevel(value) ? value : LogLevel.INFO;
}

export function createDefaultLoggerConfig(
  env: NodeJS.ProcessEnv = process.env,
): LoggerConfig {
  return {
    maxMemoryLogs: Number(env.LOG_MAX_MEMORY ?? 5000),
    consoleLevel: parseConsoleThreshold(env.LOG_LEVEL),
    toFile: env.LOG_TO_FILE === "true",
    logDir: env.LOG_DIR
      ? path.resolve(env.LOG_DIR)
      : path.join(process.cwd(), "logs"),
    writeIntervalMs: Number(env.LOG_WRITE_INTERVAL_MS ?? 5000),
    throttleWindowMs: Number(env.LOG_THROTTLE_WINDOW_MS ?? 5000),
    maxThrottleCount: Number(env.LOG_MAX_THROTTLE_COUNT ?? 3),
  };
}

function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.token()}`;
}

/**
 * Logger class with memory buffering and optional file evacuation.
 * Console: levels at or above the configured threshold, with colors
 * Memory: all levels with full metadata
 * Files: JSONL, only when enabled
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private activeCorrelationId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...createDefaultLoggerConfig(), ...config };
    this.metrics = this.initMetrics();

    if (this.config.toFile) {
      this.ensureLogDir();
      this.evacuationInterval = setInterval(
        () => this.evacuateToFile(),
        this.config.writeIntervalMs,
      );
      this.evacuationInterval.unref();
      process.once("beforeExit", () => {
        this.flush().catch((error: unknown) => {
          console.error(
            "Failed to flush logs on exit:",
            error instanceof Error ? error.message : String(error),
          );
        });
      });
    }
  }

  private initMetrics(): LogMetrics {
    const now = Date.now();
    return {
      byLevel: {},
      byCategory: {},
      startTime: now,
      endTime: now,
      totalCount: 0,
    };
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
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.config.logDir, `quests-${date}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
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

  private shouldPrint(level: LogLevel): boolean {
    const threshold = this.config.consoleLevel;
    if (threshold === "silent") return false;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private updateMetrics(entry: LogEntry): void {
    this.metrics.byLevel[entry.level] =
      (this.metrics.byLevel[entry.level] ?? 0) + 1;
    this.metrics.byCategory[entry.category] =
      (this.metrics.byCategory[entry.category] ?? 0) + 1;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.toFile) {
      this.pendingWrites.push(entry);
    }
    this.updateMetrics(entry);
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
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
      this.pendingWrites = [...logsToWrite, ...this.pendingWrites].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    }
  }

  /**
   * Start a correlation context for related logs.
   * @returns The correlation ID to pass to related operations
   */
  startCorrelation(prefix?: string): string {
    this.activeCorrelationId = `${prefix || "corr"}-${generateLogId()}`;
    return this.activeCorrelationId;
  }

  endCorrelation(): void {
    this.activeCorrelationId = undefined;
  }

  getActiveCorrelationId(): string | undefined {
    return this.activeCorrelationId;
  }

  private createEntry(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { correlationId?: string; playerId?: string; data?: unknown },
  ): LogEntry {
    const now = Date.now();
    return {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      correlationId: options?.correlationId || this.activeCorrelationId,
      playerId: options?.playerId,
      data: options?.data,
    };
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { correlationId?: string; playerId?: string; data?: unknown },
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const entry = this.createEntry(level, category, message, options);
    this.addToMemory(entry);

    if (!this.shouldPrint(level)) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, options?.data ?? "");
        break;
    }
  }

  private logWithOptionalCategory(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
      return;
    }
    this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.logWithOptionalCategory(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log a player-specific event.
   */
  playerLog(
    level: LogLevel,
    category: LogCategory,
    playerId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Player:${playerId}] ${message}`, {
      playerId,
      data,
    });
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, correlationId, playerId, messageContains } =
      filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (!correlationId || e.correlationId === correlationId) &&
        (!playerId || e.playerId === playerId) &&
        (!search || e.message.toLowerCase().includes(search)),
    );

    return filter.limit ? results.slice(-filter.limit) : results;
  }

  /**
   * Force immediate evacuation of pending logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }

  destroy(): void {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
