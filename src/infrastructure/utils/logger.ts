/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Logging utility for the simulation backend.
 *
 * Features:
 * - Console output with colored levels
 * - Category-based logging for subsystem identification
 * - Simulated tick attached to every entry
 * - Memory buffer with queries and aggregated metrics
 * - Optional JSON Lines evacuation to a daily file
 * - Throttling to prevent log spam from busy-wait loops
 */

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  /** Simulated tick when the entry was created */
  tick: number;
  /** Robot the entry relates to, when any */
  robotId?: number;
  data?: unknown;
}

export interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  startTime: number;
  endTime: number;
  totalCount: number;
  throttledCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  robotId?: number;
  fromTick?: number;
  toTick?: number;
  messageContains?: string;
  limit?: number;
}

interface LoggerConfig {
  maxMemoryLogs: number;
  logDir: string;
  writeToFile: boolean;
  silent: boolean;
  throttleWindowMs: number;
  maxThrottleCount: number;
  writeIntervalMs: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  maxMemoryLogs: Number(process.env.LOG_MAX_MEMORY ?? 5000),
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  writeToFile: process.env.LOG_TO_FILE === "true",
  silent: process.env.LOG_SILENT === "true",
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 20),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

let logSequence = 0;

function generateLogId(): string {
  logSequence += 1;
  return `${Date.now()}-${logSequence.toString(36)}`;
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

function isLogCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" &&
    Object.values<string>(LogCategory).includes(value)
  );
}

/**
 * Logger with memory buffering, tick context and optional file output.
 * Console: all levels with colors, unless silenced
 * Memory: all levels with full metadata, capped at `maxMemoryLogs`
 * Files: one JSON Lines file per day when `LOG_TO_FILE=true`
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrites: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private writeInterval?: NodeJS.Timeout;
  private writePromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();

    if (this.config.writeToFile) {
      this.ensureLogDir();
      this.writeInterval = setInterval(
        () => this.scheduleWrite(),
        this.config.writeIntervalMs,
      );
      this.writeInterval.unref();
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
    const byLevel: Record<LogLevel, number> = {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 0,
      [LogLevel.WARN]: 0,
      [LogLevel.ERROR]: 0,
    };
    const byCategory: Record<LogCategory, number> = {
      [LogCategory.SIMULATION]: 0,
      [LogCategory.SCHEDULER]: 0,
      [LogCategory.PATHFINDING]: 0,
      [LogCategory.FLEET]: 0,
      [LogCategory.PICKER]: 0,
      [LogCategory.INVENTORY]: 0,
      [LogCategory.HTTP]: 0,
      [LogCategory.GENERAL]: 0,
    };

    return {
      byLevel,
      byCategory,
      startTime: Date.now(),
      endTime: Date.now(),
      totalCount: 0,
      throttledCount: 0,
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
    entry: Pick<LogEntry, "level" | "category" | "message" | "tick">,
  ): string {
    const reset = "\x1b[0m";
    const color = LEVEL_COLORS[entry.level];
    return `${color}[t=${entry.tick}] [${entry.level.toUpperCase()}] [${entry.category}]${reset} ${entry.message}`;
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
      this.memoryBuffer.splice(
        0,
        this.memoryBuffer.length - this.config.maxMemoryLogs,
      );
    }
    if (this.config.writeToFile) {
      this.pendingWrites.push(entry);
    }

    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;
  }

  private scheduleWrite(): void {
    this.writePromise = this.writePromise.then(() => this.writePending());
  }

  private async writePending(): Promise<void> {
    if (this.pendingWrites.length === 0) return;

    const batch = this.pendingWrites;
    this.pendingWrites = [];
    const lines = batch.map((entry) => JSON.stringify(entry)).join("\n");

    try {
      await fs.promises.appendFile(this.getLogFilePath(), `${lines}\n`, "utf-8");
    } catch (error) {
      this.pendingWrites = [...batch, ...this.pendingWrites].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to write logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: batch.length,
      });
    }
  }

  /**
   * Sets the simulated tick attached to subsequent entries.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { robotId?: number; data?: unknown },
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) {
      this.metrics.throttledCount++;
      return;
    }

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      tick: this.currentTick,
      robotId: options?.robotId,
      data: options?.data,
    };
    this.addToMemory(entry);

    if (this.config.silent) return;

    const consoleMsg = this.formatConsoleMessage(entry);
    const data = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data);
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
   * Log an event about a specific robot.
   */
  robotLog(
    level: LogLevel,
    category: LogCategory,
    robotId: number,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Robot:${robotId}] ${message}`, {
      robotId,
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

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, robotId, fromTick, toTick, messageContains } =
      filter;
    const search = messageContains?.toLowerCase();

    const results = this.memoryBuffer.filter(
      (e) =>
        (!levels?.length || levels.includes(e.level)) &&
        (!categories?.length || categories.includes(e.category)) &&
        (robotId === undefined || e.robotId === robotId) &&
        (fromTick === undefined || e.tick >= fromTick) &&
        (toTick === undefined || e.tick <= toTick) &&
        (search === undefined || e.message.toLowerCase().includes(search)),
    );

    return filter.limit ? results.slice(-filter.limit) : results;
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }

  /**
   * Writes pending entries to the log file, when file output is enabled.
   */
  async flush(): Promise<void> {
    if (!this.config.writeToFile) return;
    this.scheduleWrite();
    await this.writePromise;
  }

  destroy(): void {
    if (this.writeInterval) {
      clearInterval(this.writeInterval);
      this.writeInterval = undefined;
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
