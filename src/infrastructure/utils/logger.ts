/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Logging utility for the ledger backend.
 *
 * Features:
 * - Console output with colored levels, filtered by a minimum level
 * - Memory buffer with query and metrics support
 * - Optional JSON Lines evacuation to daily files
 * - Category-based logging for subsystem identification
 * - Correlation IDs to link the logs of a single command
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
  /** Optional actor the log relates to */
  actorId?: string;
  /** Logical block height when the log was created */
  block?: number;
  /** Additional structured data */
  data?: unknown;
}

export interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
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
  actorId?: string;
  startTime?: number;
  endTime?: number;
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, most recent kept */
  limit?: number;
}

export interface LoggerConfig {
  maxMemoryLogs: number;
  evacuationThreshold: number;
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  /** Write buffered entries to `logs-YYYY-MM-DD.jsonl` */
  toFile: boolean;
  /** Lowest level printed to the console; the buffer keeps every level */
  consoleLevel: LogLevel;
  writeIntervalMs: number;
}

interface LogOptions {
  correlationId?: string;
  actorId?: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  return Object.values(LogLevel).find((level) => level === raw) ?? LogLevel.INFO;
}

function readNumber(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  return raw !== undefined && Number.isFinite(parsed) ? parsed : fallback;
}

const DEFAULT_CONFIG: LoggerConfig = {
  maxMemoryLogs: 5000,
  evacuationThreshold: readNumber(process.env.LOG_EVACUATION_THRESHOLD, 4000),
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  throttleWindowMs: readNumber(process.env.LOG_THROTTLE_WINDOW_MS, 5000),
  maxThrottleCount: readNumber(process.env.LOG_MAX_THROTTLE_COUNT, 3),
  toFile: process.env.LOG_TO_FILE !== "false",
  consoleLevel: parseLogLevel(process.env.LOG_LEVEL),
  writeIntervalMs: readNumber(process.env.LOG_WRITE_INTERVAL_MS, 5000),
};

let logSequence = 0;

function generateLogId(): string {
  logSequence = (logSequence + 1) % Number.MAX_SAFE_INTEGER;
  return `${Date.now().toString(36)}-${logSequence.toString(36)}`;
}

/**
 * Current date string for file rotation (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

/**
 * Logger with memory buffering and optional file evacuation.
 * Console: levels at or above `consoleLevel`, with colors
 * Memory: all levels with full metadata
 * Files: one JSON Lines file per day
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private lastThrottlePrune = 0;
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentBlock = 0;
  private activeCorrelationId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.toFile) {
      this.ensureLogDir();
      this.evacuationInterval = setInterval(
        () => this.evacuateToFile(),
        this.config.writeIntervalMs,
      );
      this.evacuationInterval.unref();
      process.on("beforeExit", () => {
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
    const byLevel = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 0,
      [LogLevel.WARN]: 0,
      [LogLevel.ERROR]: 0,
    };
    const byCategory = Object.fromEntries(
      Object.values(LogCategory).map((category) => [category, 0]),
    ) as Record<LogCategory, number>;

    return {
      byLevel,
      byCategory,
      startTime: Date.now(),
      endTime: Date.now(),
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
    return path.join(this.config.logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const reset = "\x1b[0m";
    return `${LEVEL_COLORS[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      if (now - this.lastThrottlePrune > this.config.throttleWindowMs) {
        this.pruneThrottleMap(now);
      }
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

  private pruneThrottleMap(now: number): void {
    this.lastThrottlePrune = now;
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;

    if (this.memoryBuffer.length < this.config.evacuationThreshold) return;

    if (this.config.toFile) {
      this.evacuateToFile();
    } else if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer = this.memoryBuffer.slice(-this.config.maxMemoryLogs);
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (!this.config.toFile || this.memoryBuffer.length === 0) return;

    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
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
   * Set the current block height for log context.
   */
  setBlock(block: number): void {
    this.currentBlock = block;
  }

  /**
   * Start a correlation context for related logs.
   * @returns The correlation ID attached to every log until `endCorrelation`
   */
  startCorrelation(prefix?: string): string {
    this.activeCorrelationId = `${prefix || "corr"}-${generateLogId()}`;
    return this.activeCorrelationId;
  }

  endCorrelation(): void {
    this.activeCorrelationId = undefined;
  }

  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: LogOptions,
  ): void {
    if (this.shouldThrottle(message)) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      correlationId: options?.correlationId ?? this.activeCorrelationId,
      actorId: options?.actorId,
      block: this.currentBlock,
      data: options?.data,
    };
    this.addToMemory(entry);

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.consoleLevel]) return;

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
   * Log an event performed by, or affecting, a specific actor.
   */
  actorLog(
    level: LogLevel,
    category: LogCategory,
    actorId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Actor:${actorId}] ${message}`, {
      actorId,
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
   * Query logs from the memory buffer.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, correlationId, actorId, startTime, endTime } =
      filter;
    const search = filter.messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (!correlationId || e.correlationId === correlationId) &&
        (!actorId || e.actorId === actorId) &&
        (startTime === undefined || e.timestampMs >= startTime) &&
        (endTime === undefined || e.timestampMs <= endTime) &&
        (!search || e.message.toLowerCase().includes(search)),
    );

    return filter.limit ? results.slice(-filter.limit) : results;
  }

  /**
   * Force immediate evacuation of buffered logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  getThrottledKeyCount(): number {
    return this.throttleMap.size;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  clearBuffer(): void {
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
