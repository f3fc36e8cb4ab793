import { performance } from 'perf_hooks';
import * as fs from 'fs';
import * as path from 'path';
import { isErrorWithCode } from '../types/index.js';

/**
 * Structured Logger for the task coordinator
 * One JSON line per entry, written to stderr so command output on stdout
 * stays machine-readable.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface LogContext {
  agentId?: string;
  taskId?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

// Shared by a logger and every child derived from it
interface LevelSetting {
  current: LogLevel;
}

class Logger {
  private level: LevelSetting;
  private serviceName: string;
  private environment: string;
  private version: string;
  private baseContext: LogContext;
  private testLogFile?: string;

  constructor(
    serviceName: string = 'task-coordinator',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '1.0.0',
    baseContext: LogContext = {},
    level: LevelSetting = { current: logLevel }
  ) {
    this.serviceName = serviceName;
    this.level = level;
    this.environment = environment;
    this.version = version;
    this.baseContext = baseContext;

    // Tests stay silent unless TEST_LOG_FILE names a file to append to
    const testLogFile = process.env.TEST_LOG_FILE;
    if (this.environment === 'test' && testLogFile && testLogFile !== 'false') {
      const logDir = path.dirname(path.resolve(testLogFile));
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.testLogFile = path.resolve(testLogFile);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level.current);
  }

  formatLogEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version
      }
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: isErrorWithCode(error) ? error.code : undefined
      };
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);

    if (this.testLogFile) {
      fs.appendFileSync(this.testLogFile, output + '\n');
      return;
    }
    if (this.environment === 'test') {
      return;
    }
    process.stderr.write(output + '\n');
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.writeLog(this.formatLogEntry(level, message, context, error));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  /**
   * Time an async operation; logs duration at trace, failures at error
   */
  async timeAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    try {
      const result = await fn();
      this.trace(`Operation completed: ${operation}`, {
        ...operationContext,
        duration: performance.now() - startTime
      });
      return result;
    } catch (error) {
      this.error(`Operation failed: ${operation}`,
        { ...operationContext, duration: performance.now() - startTime },
        error instanceof Error ? error : new Error(String(error))
      );
      throw error;
    }
  }

  /**
   * Create a child logger whose entries carry additional context.
   * The child follows later level changes made on its parent.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.level.current,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext },
      this.level
    );
  }

  setLogLevel(level: LogLevel): void {
    this.level.current = level;
  }

  getLogLevel(): LogLevel {
    return this.level.current;
  }
}

// Create default logger instance
export const logger = new Logger();

// Export Logger class for custom instances
export { Logger };
