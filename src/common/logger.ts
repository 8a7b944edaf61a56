// logger.ts - Centralized logging utility for the relay agent
import * as fs from 'fs';
import * as path from 'path';
import { sanitizeLogData } from '../security/sanitize';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

/**
 * The subset of the logger every component depends on. Tests hand in
 * jest mocks that satisfy it.
 */
export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown, error?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((value ?? '').toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'CRITICAL': return LogLevel.CRITICAL;
    default: return fallback;
  }
}

function errorParts(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export class Logger implements ComponentLogger {
  private logFile: string;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  constructor(component: string, logDir: string, minLevel: LogLevel = LogLevel.INFO) {
    this.component = component;
    this.minLevel = minLevel;

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logFile = path.join(logDir, `${component}.log`);
    this.rotateLogsIfNeeded();
  }

  private rotateLogsIfNeeded(): void {
    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    const sanitizedMessage = String(sanitizeLogData(message));
    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${sanitizedMessage}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(sanitizeLogData(data), null, 2)}`;
    }

    if (error !== undefined) {
      const { message: errorMessage, stack } = errorParts(error);
      logLine += `\n  Error: ${String(sanitizeLogData(errorMessage))}`;
      if (stack && level >= LogLevel.ERROR) {
        // Stack traces only for ERROR and above
        logLine += `\n  Stack: ${String(sanitizeLogData(stack))}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (level >= LogLevel.WARN) {
      console.error(logMessage.trim());
    } else {
      console.log(logMessage.trim());
    }

    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }
}

export default Logger;
