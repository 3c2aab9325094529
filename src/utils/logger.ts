/**
 * @fileOverview: Structured logger with stderr and rotating JSONL file output
 * @module: Logger
 * @keyFunctions:
 *   - info(): Log informational messages with context
 *   - warn(): Log warning messages with context
 *   - error(): Log error messages with context
 *   - debug(): Log debug messages with environment-based filtering
 * @dependencies:
 *   - fs: Log file management and rotation
 *   - path: Log file location
 * @context: Server logs go to stderr so stdout stays free for CLI output; a JSONL copy under ~/.repo-query/logs keeps request history across restarts
 */
import * as fs from 'fs';
import * as path from 'path';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private prefix: string;
  private logFilePath: string | null;
  private readonly maxSizeBytes = 10 * 1024 * 1024; // 10 MB
  private readonly maxArchives = 3;

  constructor(prefix: string = 'RepoQuery') {
    this.prefix = prefix;
    this.logFilePath = process.env.NODE_ENV === 'test' ? null : this.initializeFileLogging();
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.DEBUG || process.env.NODE_ENV === 'development' || this.shouldLog('debug')) {
      this.log('DEBUG', message, context);
    }
  }

  private shouldLog(level: string): boolean {
    const logLevel = process.env.LOG_LEVEL?.toLowerCase() || 'info';
    const currentLevelIndex = Math.max(0, LEVEL_ORDER.indexOf(logLevel));
    const messageLevelIndex = LEVEL_ORDER.indexOf(level.toLowerCase());

    return messageLevelIndex >= currentLevelIndex;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      prefix: this.prefix,
      message,
      ...(context && { context }),
    };

    const formattedMessage = `[${timestamp}] ${level} [${this.prefix}] ${message}`;
    const contextStr = context ? safeStringify(context) : '';

    // stdout is reserved for CLI output; everything goes to stderr outside of tests
    switch (level) {
      case 'ERROR':
        console.error(formattedMessage, contextStr);
        break;
      case 'WARN':
        console.warn(formattedMessage, contextStr);
        break;
      case 'DEBUG':
        if (process.env.NODE_ENV === 'test') {
          console.debug(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
        break;
      default:
        if (process.env.NODE_ENV === 'test') {
          console.info(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
    }

    if (this.logFilePath) {
      try {
        this.rotateLogsIfNeeded();
        fs.appendFileSync(this.logFilePath, safeStringify(logEntry) + '\n', { encoding: 'utf8' });
      } catch (fileError) {
        // Stop writing to a sink that keeps failing; console output continues
        console.error(`[${timestamp}] WARN [${this.prefix}] File logging disabled`, String(fileError));
        this.logFilePath = null;
      }
    }
  }

  private initializeFileLogging(): string | null {
    try {
      const home = process.env.USERPROFILE || process.env.HOME || process.cwd();
      const dir = path.join(home, '.repo-query', 'logs');
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      const logPath = path.join(dir, 'repo-query.log');
      if (!fs.existsSync(logPath)) {
        fs.writeFileSync(logPath, '', { encoding: 'utf8' });
      }
      return logPath;
    } catch (initError) {
      console.error(`WARN [${this.prefix}] File logging unavailable`, String(initError));
      return null;
    }
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFilePath) return;
    const stats = fs.existsSync(this.logFilePath) ? fs.statSync(this.logFilePath) : null;
    if (!stats || stats.size < this.maxSizeBytes) return;

    const base = this.logFilePath;
    const oldest = `${base}.${this.maxArchives}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }

    for (let i = this.maxArchives - 1; i >= 1; i--) {
      const src = `${base}.${i}`;
      if (fs.existsSync(src)) {
        fs.renameSync(src, `${base}.${i + 1}`);
      }
    }

    if (fs.existsSync(base)) {
      fs.renameSync(base, `${base}.1`);
    }
    fs.writeFileSync(base, '', { encoding: 'utf8' });
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (v instanceof Error ? v.message : v));
  } catch {
    return '[unserializable context]';
  }
}

// Default logger instance
export const logger = new Logger('RepoQuery');
