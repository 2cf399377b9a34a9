import "colorts/lib/string";
import fs from "fs-extra";
import path from "path";

/**
 * Log levels for the logging service
 */
export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
  FATAL = "FATAL",
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.FATAL];

export const MAX_BUFFERED_ENTRIES = 500;
const FLUSH_INTERVAL_MS = 5000;

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  logDir: string | null;
  logToConsole: boolean;
  logLevel: LogLevel;
}

/**
 * Centralized logging service for cipherbox
 *
 * Console output goes to stderr so CLI results on stdout stay clean.
 * When a log directory is configured, buffered entries are appended to a
 * daily file on every flush.
 */
export class LoggerService {
  private static instance: LoggerService | undefined;
  private config: LoggerConfig = {
    logDir: null,
    logToConsole: true,
    logLevel: LogLevel.INFO,
  };
  private logBuffer: LogEntry[] = [];
  private pending: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;

  public static getInstance(): LoggerService {
    if (!LoggerService.instance) {
      LoggerService.instance = new LoggerService();
    }
    return LoggerService.instance;
  }

  /**
   * Merge new settings into the current configuration
   */
  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };

    if (this.config.logDir && !this.flushInterval) {
      this.flushInterval = setInterval(() => {
        this.flush().catch((error: unknown) => {
          console.error("[CIPHERBOX - Logger] Failed to flush logs:".red, error);
        });
      }, FLUSH_INTERVAL_MS);
      // Never keep the process alive just to write logs.
      this.flushInterval.unref();
    } else if (!this.config.logDir && this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.logLevel);
  }

  /**
   * Format log entry for file
   */
  public formatLogEntry(entry: LogEntry): string {
    const base = `[${entry.timestamp}] [${entry.level}] [${entry.component}] ${entry.message}`;
    if (entry.metadata) {
      return `${base} | ${JSON.stringify(entry.metadata)}`;
    }
    return base;
  }

  /**
   * Format log for console with colors
   */
  private formatConsoleLog(entry: LogEntry): string {
    const line = `[CIPHERBOX - ${entry.component}] ${entry.message}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        return line.gray;
      case LogLevel.INFO:
        return line.green;
      case LogLevel.WARN:
        return line.yellow;
      case LogLevel.ERROR:
        return line.red;
      case LogLevel.FATAL:
        return line.bgRed.white;
    }
  }

  private addToBuffer(level: LogLevel, component: string, message: string, metadata?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...(metadata ? { metadata } : {}),
    };

    this.logBuffer.push(entry);
    if (this.logBuffer.length > MAX_BUFFERED_ENTRIES) {
      this.logBuffer.splice(0, this.logBuffer.length - MAX_BUFFERED_ENTRIES);
    }
    if (this.config.logDir) {
      this.pending.push(entry);
    }

    if (this.config.logToConsole) {
      console.error(this.formatConsoleLog(entry));
    }
  }

  private getLogFilePath(logDir: string): string {
    const dateStr = new Date().toISOString().split("T")[0];
    return path.resolve(process.cwd(), logDir, `cipherbox-${dateStr}.log`);
  }

  /**
   * Append pending entries to the daily log file
   */
  public async flush(): Promise<void> {
    const { logDir } = this.config;
    if (!logDir || this.pending.length === 0) return;

    const entries = this.pending.splice(0, this.pending.length);
    const content = entries.map((e) => this.formatLogEntry(e)).join("\n") + "\n";
    const logFile = this.getLogFilePath(logDir);

    await fs.ensureDir(path.dirname(logFile));
    await fs.appendFile(logFile, content);
  }

  // ============ Public Logging Methods ============

  public debug(component: string, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    this.addToBuffer(LogLevel.DEBUG, component, message, metadata);
  }

  public info(component: string, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    this.addToBuffer(LogLevel.INFO, component, message, metadata);
  }

  public warn(component: string, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    this.addToBuffer(LogLevel.WARN, component, message, metadata);
  }

  public error(component: string, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    this.addToBuffer(LogLevel.ERROR, component, message, metadata);
  }

  public fatal(component: string, message: string, metadata?: Record<string, unknown>): void {
    this.addToBuffer(LogLevel.FATAL, component, message, metadata);
  }

  /**
   * Get recent logs from buffer with optional filtering, most recent first
   */
  public getRecentLogs(count: number = 100, offset: number = 0, level?: LogLevel): LogEntry[] {
    let logs = [...this.logBuffer];

    if (level) {
      logs = logs.filter((log) => log.level === level);
    }

    return logs.reverse().slice(offset, offset + count);
  }

  /**
   * Drop buffered entries. Used between test cases.
   */
  public clear(): void {
    this.logBuffer = [];
    this.pending = [];
  }
}

// Export singleton instance
export const logger = LoggerService.getInstance();
