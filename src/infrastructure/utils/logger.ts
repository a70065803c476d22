/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Logging utility for the navigation core.
 *
 * Features:
 * - Console output with colored levels, filtered by LOG_LEVEL
 * - Memory ring buffer queryable by level/category/agent
 * - Optional JSON Lines evacuation to disk (LOG_TO_FILE=true)
 * - Category-based logging for subsystem identification
 * - Throttling so per-frame messages cannot flood the console
 */

export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  timestampMs: number;
  /** Simulation tick when the entry was created */
  tick: number;
  agentId?: string;
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  throttled: number;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: string;
  messageContains?: string;
  limit?: number;
}

interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  toFile: boolean;
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  silent: boolean;
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

function parseLevel(raw: string | undefined): LogLevel {
  const match = Object.values(LogLevel).find((level) => level === raw);
  return match ?? LogLevel.INFO;
}

function isCategory(value: unknown): value is LogCategory {
  return (
    typeof value === "string" &&
    Object.values(LogCategory).some((category) => category === value)
  );
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLevel(process.env.LOG_LEVEL),
  maxMemoryLogs: 2000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 1500),
  toFile: process.env.LOG_TO_FILE === "true",
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  silent: process.env.LOG_SILENT === "true",
};

/**
 * Logger with level filtering, memory buffering and optional file evacuation.
 * Every entry reaches the memory buffer; only entries at or above the
 * configured level reach the console.
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private lastThrottlePrune = Date.now();
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();
  }

  private initMetrics(): LogMetrics {
    const byLevel = Object.fromEntries(
      Object.values(LogLevel).map((level) => [level, 0]),
    ) as Record<LogLevel, number>;
    const byCategory = Object.fromEntries(
      Object.values(LogCategory).map((category) => [category, 0]),
    ) as Record<LogCategory, number>;

    return { byLevel, byCategory, throttled: 0, totalCount: 0 };
  }

  private getLogFilePath(): string {
    const date = new Date().toISOString().split("T")[0];
    return path.join(this.config.logDir, `nav-${date}.jsonl`);
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
    this.pruneThrottleMap(now);
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

  /**
   * Drops throttle entries idle for two windows. Runs at most once per window.
   */
  private pruneThrottleMap(now: number): void {
    if (now - this.lastThrottlePrune < this.config.throttleWindowMs) return;
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
    this.metrics.totalCount++;

    if (this.config.toFile && this.memoryBuffer.length >= this.config.evacuationThreshold) {
      this.evacuateToFile();
      return;
    }
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.splice(0, this.memoryBuffer.length - this.config.maxMemoryLogs);
    }
  }

  private evacuateToFile(): void {
    const batch = this.memoryBuffer.splice(0);
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.writeBatch(batch),
    );
  }

  private async writeBatch(batch: LogEntry[]): Promise<void> {
    if (batch.length === 0) return;
    try {
      await fs.promises.mkdir(this.config.logDir, { recursive: true });
      const lines = batch.map((entry) => JSON.stringify(entry)).join("\n");
      await fs.promises.appendFile(this.getLogFilePath(), lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...batch, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error(
        "Failed to evacuate logs:",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Set the current simulation tick attached to subsequent entries.
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
    options?: { agentId?: string; data?: unknown },
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) {
      this.metrics.throttled++;
      return;
    }

    const now = Date.now();
    this.addToMemory({
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      tick: this.currentTick,
      agentId: options?.agentId,
      data: options?.data,
    });

    if (this.config.silent || LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) {
      return;
    }

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    const payload = options?.data ?? "";
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, payload);
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, payload);
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, payload);
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, payload);
        break;
    }
  }

  private route(
    level: LogLevel,
    message: string,
    categoryOrData?: LogCategory | unknown,
    data?: unknown,
  ): void {
    if (isCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  debug(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.route(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.route(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.route(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: LogCategory | unknown, data?: unknown): void {
    this.route(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Log an agent-specific event.
   */
  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, { agentId, data });
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
   * Query buffered logs, newest last.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    let results = this.memoryBuffer.filter((entry) => {
      if (filter.levels && !filter.levels.includes(entry.level)) return false;
      if (filter.categories && !filter.categories.includes(entry.category)) return false;
      if (filter.agentId && entry.agentId !== filter.agentId) return false;
      if (filter.messageContains && !entry.message.includes(filter.messageContains)) {
        return false;
      }
      return true;
    });

    if (filter.limit !== undefined) {
      results = results.slice(-filter.limit);
    }
    return results;
  }

  /** Distinct messages currently tracked by the throttle. */
  getThrottledKeyCount(): number {
    return this.throttleMap.size;
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  /**
   * Write any buffered entries to disk when file output is enabled.
   */
  async flush(): Promise<void> {
    if (this.config.toFile) {
      this.evacuateToFile();
    }
    await this.evacuationPromise;
  }

  /**
   * Drop buffered entries and throttle state.
   */
  destroy(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
