/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the simulation engine.
 *
 * Features:
 * - Console output with colored levels and a minimum level (LOG_LEVEL)
 * - Buffer with periodic evacuation to JSON Lines files (LOG_TO_FILE)
 * - Daily rotating log files
 * - Category-based logging for subsystem identification
 * - Generation (tick) stamp on every entry
 * - Throttling to prevent log spam
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry with category and simulation context.
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
  /** Generation published when the log was created */
  tick?: number;
  /** Additional structured data */
  data?: unknown;
}

interface LoggerConfig {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  writeToFile: boolean;
  logDir: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  maxRotationDays: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const parseLevel = (raw: string | undefined): LogLevel => {
  const match = Object.values(LogLevel).find(
    (level) => level === raw?.toLowerCase(),
  );
  return match ?? LogLevel.INFO;
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLevel(process.env.LOG_LEVEL),
  maxMemoryLogs: 5000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 4000),
  writeToFile: process.env.LOG_TO_FILE !== "false",
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  maxRotationDays: Number(process.env.LOG_MAX_ROTATION_DAYS ?? 7),
};

let logSequence = 0;

function generateLogId(): string {
  logSequence = (logSequence + 1) % Number.MAX_SAFE_INTEGER;
  return `${Date.now()}-${logSequence.toString(36)}`;
}

/**
 * Get current date string for file rotation (YYYY-MM-DD).
 */
function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

const isCategory = (value: unknown): value is LogCategory =>
  typeof value === "string" &&
  Object.values(LogCategory).some((category) => category === value);

/**
 * Logger with console output and buffered file evacuation.
 * Console: levels at or above `minLevel`, with colors
 * Files: all levels, rotated daily, JSON Lines
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private isEvacuating = false;
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private currentLogDate: string;
  private currentTick = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.currentLogDate = getDateString();

    if (this.config.writeToFile) {
      this.ensureLogDir();
      const writeIntervalMs = Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000);
      this.evacuationInterval = setInterval(
        () => this.checkEvacuation(),
        writeIntervalMs,
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
    return path.join(this.config.logDir, `logs-${this.currentLogDate}.jsonl`);
  }

  private checkDateRotation(): void {
    const today = getDateString();
    if (today !== this.currentLogDate) {
      this.currentLogDate = today;
      this.cleanupOldLogs();
    }
  }

  private cleanupOldLogs(): void {
    try {
      const files = fs.readdirSync(this.config.logDir);
      const cutoffDate = new Date();
      cutoffDate.setDate(cutoffDate.getDate() - this.config.maxRotationDays);

      for (const file of files) {
        const match = file.match(/^logs-(\d{4}-\d{2}-\d{2})\.jsonl$/);
        if (match && new Date(match[1]) < cutoffDate) {
          fs.unlinkSync(path.join(this.config.logDir, file));
        }
      }
    } catch (error) {
      console.warn("Failed to cleanup old logs:", error);
    }
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const timestamp = new Date().toISOString();
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${timestamp}] [${level.toUpperCase()}] [${category}] [gen ${this.currentTick}]${reset} ${message}`;
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
    if (!this.config.writeToFile) return;
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length >= this.config.evacuationThreshold) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (!this.config.writeToFile) return;
    if (this.isEvacuating) return;
    if (this.memoryBuffer.length === 0) return;

    this.checkDateRotation();
    this.isEvacuating = true;
    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        0,
        this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  private checkEvacuation(): void {
    if (this.memoryBuffer.length > 0) {
      this.evacuateToFile();
    }

    const now = Date.now();
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  /**
   * Set the current generation for log context.
   */
  setTick(tick: number): void {
    this.currentTick = tick;
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { data?: unknown },
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const now = Date.now();
    this.addToMemory({
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      tick: this.currentTick,
      data: options?.data,
    });

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
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

  private write(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.write(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.write(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.write(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
