/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Types of events that can be logged
 */
export enum LogEventType {
  SOURCE_OPEN = "source_open",
  READER_START = "reader_start",
  HEADER_READ = "header_read",
  BODY_READ = "body_read",
  PACKET_DECODED = "packet_decoded",
  PACKET_CONSUMED = "packet_consumed",
  STREAM_END = "stream_end",
  READER_STOPPED = "reader_stopped",
  GENERIC = "generic",
}

/**
 * A single log entry
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: number;
  eventType?: LogEventType;
  data?: unknown;
};

const LEVEL_NAMES = ["DEBUG", "INFO", "WARNING", "ERROR"];

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARNING,
  WARNING: LogLevel.WARNING,
  ERROR: LogLevel.ERROR,
};

/**
 * Parses a level name such as "info" or "WARNING" into a LogLevel.
 * @returns The matching level, or null for an unknown name
 */
export function parseLogLevel(name: string): LogLevel | null {
  return LEVELS_BY_NAME[name.trim().toUpperCase()] ?? null;
}

/**
 * Logger class for handling application logging with severity levels and event tracking.
 * Supports console output at different levels (DEBUG, INFO, WARNING, ERROR) and
 * provides a listener system for external log processing.
 */
export class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<(entry: LogEntry) => void> = new Set();

  /**
   * Sets the minimum log level to output. Messages below this level will be ignored.
   * @param level Minimum log level (DEBUG, INFO, WARNING, or ERROR)
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Registers a callback to be invoked for every log entry. The level only
   * filters console output, so UI listeners see every progress event.
   * @param listener Callback function that receives the log entry
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Internal logging method. Writes to the console when the entry meets the
   * current level and notifies all listeners.
   * @private
   * @param level Severity level of the log entry
   * @param message Log message text
   * @param eventType Optional event type for categorization
   * @param data Optional additional data associated with the log entry
   */
  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    const timestamp = Date.now();
    const entry: LogEntry = { level, message, timestamp, eventType, data };

    if (this.level <= level) {
      const output = `[${LEVEL_NAMES[level]}] ${message}`;

      // stdout is reserved for decoded output, so every level goes to stderr
      // (console.debug is console.log in Node)
      switch (level) {
        case LogLevel.INFO:
        case LogLevel.WARNING:
          console.warn(output);
          break;
        case LogLevel.DEBUG:
        case LogLevel.ERROR:
          console.error(output);
          break;
      }
    }

    this.listeners.forEach((listener) => listener(entry));
  }

  /**
   * Logs a debug message. Only output if log level is DEBUG or lower.
   * @param message Debug message text
   * @param eventType Optional event type for categorization
   * @param data Optional additional data associated with this log entry
   */
  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  /**
   * Logs an info message. Only output if log level is INFO or lower.
   * @param message Info message text
   * @param eventType Optional event type for categorization
   * @param data Optional additional data associated with this log entry
   */
  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  /**
   * Logs a warning message. Only output if log level is WARNING or lower.
   */
  public warning(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  /**
   * Logs an error message. Always output regardless of log level.
   */
  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Global logger instance for application-wide logging.
 */
export const logger = new Logger();
