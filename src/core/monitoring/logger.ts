/**
 * Structured logging utility for the crosscheck CLI
 * Includes automatic sensitive data redaction, since prompts and agent
 * output can carry pasted credentials
 */

import * as fs from 'fs';
import * as path from 'path';

const SENSITIVE_PATTERNS = [
  /\b(api[_-]?key|apikey)\s*[:=]\s*['"]?[\w-]+['"]?/gi,
  /\b(secret|password|token|credential|auth)\s*[:=]\s*['"]?[\w-]+['"]?/gi,
  /\b(sk-[\w-]+)/gi,
  /\b(ghp_[\w]+)/gi,
  /Bearer\s+[\w.-]+/gi,
];

const SENSITIVE_FIELD_NAMES = [
  'password',
  'token',
  'apikey',
  'api_key',
  'secret',
  'credential',
  'authorization',
];

function redactString(input: string): string {
  let result = input;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

/**
 * Recursively sanitize an object for logging
 */
export function sanitizeForLogging(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(sanitizeForLogging);
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELD_NAMES.some((sf) => key.toLowerCase().includes(sf))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeForLogging(value);
      }
    }
    return sanitized;
  }

  return obj;
}

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

function levelFromEnv(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      // Console display owns stdout; only problems go to the log by default
      return LogLevel.WARN;
  }
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel;
  private logFile?: string;
  private fileLoggingDisabledNotified = false;

  private constructor() {
    this.logLevel = levelFromEnv(process.env['CROSSCHECK_LOG_LEVEL']);

    if (
      this.logLevel === LogLevel.DEBUG ||
      process.env['CROSSCHECK_LOG_FILE']
    ) {
      this.logFile =
        process.env['CROSSCHECK_LOG_FILE'] ||
        path.join(
          process.env['HOME'] || '.',
          '.crosscheck',
          'logs',
          'cli.log'
        );
      this.ensureLogDirectory();
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private ensureLogDirectory(): void {
    if (!this.logFile) return;
    const logDir = path.dirname(this.logFile);
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    } catch {
      this.disableFileLogging('failed to create log directory');
    }
  }

  private disableFileLogging(reason: string): void {
    this.logFile = undefined;
    if (!this.fileLoggingDisabledNotified) {
      this.fileLoggingDisabledNotified = true;
      // Use console directly to avoid recursion
      console.warn(
        `[Logger] File logging disabled (${reason}). Falling back to console only.`
      );
    }
  }

  private writeLog(entry: LogEntry): void {
    const sanitizedEntry = {
      ...entry,
      message: redactString(entry.message),
      context: entry.context
        ? sanitizeForLogging(entry.context)
        : undefined,
      error: entry.error?.message,
    };

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, JSON.stringify(sanitizedEntry) + '\n');
      } catch {
        this.disableFileLogging('write failed');
      }
    }

    if (entry.level <= this.logLevel) {
      const levelNames = ['ERROR', 'WARN', 'INFO', 'DEBUG'];
      const levelName = levelNames[entry.level] ?? 'UNKNOWN';

      const consoleMessage = `[${entry.timestamp}] ${levelName}: ${sanitizedEntry.message}`;

      if (entry.level === LogLevel.ERROR) {
        console.error(consoleMessage);
        if (entry.error && this.logLevel === LogLevel.DEBUG) {
          console.error(entry.error.stack);
        }
      } else if (entry.level === LogLevel.WARN) {
        console.warn(consoleMessage);
      } else {
        // stderr keeps stdout clean for the final code
        console.error(consoleMessage);
      }
    }
  }

  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    const isError = errorOrContext instanceof Error;
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context: isError ? context : errorOrContext,
      error: isError ? errorOrContext : undefined,
    });
  }

  warn(
    message: string,
    errorOrContext?: Error | Record<string, unknown>
  ): void {
    const isError = errorOrContext instanceof Error;
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.WARN,
      message,
      context: isError ? undefined : errorOrContext,
      error: isError ? errorOrContext : undefined,
    });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.INFO,
      message,
      context,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.DEBUG,
      message,
      context,
    });
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
