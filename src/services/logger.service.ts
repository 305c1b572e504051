/**
 * Logger Service
 *
 * Level-filtered console logger with an optional daily file sink.
 * Injected into every service; context objects are printed as JSON.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LogLevel } from '../types/enums';

// ============================================================================
// CONSTANTS
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type LogContext = Record<string, unknown>;

// ============================================================================
// LOGGER SERVICE
// ============================================================================

export class LoggerService {
  private logFilePath: string | null = null;

  constructor(
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly logDir: string = './logs',
    private readonly logToFile: boolean = true,
  ) {
    if (this.logToFile) {
      this.initFileSink();
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Path of the current log file (null when file logging is off)
   */
  getLogFilePath(): string | null {
    return this.logFilePath;
  }

  // ============================================================================
  // PRIVATE METHODS
  // ============================================================================

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const line = this.format(level, message, context);

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (this.logFilePath) {
      try {
        fs.appendFileSync(this.logFilePath, line + '\n');
      } catch (error) {
        // File sink broken (disk full, permissions) - keep console output only
        console.error(`Failed to write log file ${this.logFilePath}: ${String(error)}`);
        this.logFilePath = null;
      }
    }
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const suffix = context && Object.keys(context).length > 0 ? ' ' + this.serialize(context) : '';
    return `[${timestamp}] [${level}] ${message}${suffix}`;
  }

  private serialize(context: LogContext): string {
    try {
      return JSON.stringify(context, (_key, value: unknown) => {
        if (value instanceof Error) {
          return { name: value.name, message: value.message };
        }
        if (value === Infinity) {
          return 'Infinity';
        }
        return value;
      });
    } catch {
      return '[unserializable context]';
    }
  }

  private initFileSink(): void {
    try {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }
      const date = new Date().toISOString().slice(0, 10);
      this.logFilePath = path.join(this.logDir, `monitor-${date}.log`);
    } catch (error) {
      console.error(`Failed to initialize log directory ${this.logDir}: ${String(error)}`);
      this.logFilePath = null;
    }
  }
}
