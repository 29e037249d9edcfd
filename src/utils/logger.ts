/**
 * Winston-based logging for wiki-sync
 * Console output is colorized; file output is JSON and only enabled on request
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Log levels enumeration
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  HTTP = 'http',
  DEBUG = 'debug'
}

/**
 * Structured metadata attached to a single log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Log context interface for structured logging
 */
export interface LogContext {
  /** Component or module name */
  component?: string;
  /** Wiki name or id the run works against */
  wiki?: string;
  /** Run ID */
  runId?: string;
  /** Additional metadata */
  metadata?: LogMeta;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Log level threshold */
  level: LogLevel;
  /** Output directory for log files */
  logDir: string;
  /** Whether to log to console */
  enableConsole: boolean;
  /** Whether to log to file */
  enableFile: boolean;
  /** Maximum size of each log file in bytes */
  maxFileSize: number;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Whether to include stack traces for errors */
  includeStackTrace: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  logDir: './logs',
  enableConsole: true,
  enableFile: false,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  includeStackTrace: true
};

/**
 * The slice of the logger that sync components depend on
 */
export type Logger = Pick<
  SyncLogger,
  'error' | 'warn' | 'info' | 'http' | 'debug' | 'pageExported' | 'pageUpserted' | 'pageFailed'
>;

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export class SyncLogger {
  private logger: winston.Logger;
  private config: LoggerConfig;
  private context: LogContext = {};

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = this.createLogger();
  }

  /**
   * Create the Winston logger instance with configured transports
   */
  private createLogger(): winston.Logger {
    if (this.config.enableFile && !fs.existsSync(this.config.logDir)) {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    }

    const transports: winston.transport[] = [];

    // Silent when every output is off, otherwise winston complains about missing transports
    if (this.config.enableConsole || !this.config.enableFile) {
      transports.push(
        new winston.transports.Console({
          level: this.config.level,
          silent: !this.config.enableConsole,
          format: winston.format.combine(
            winston.format.colorize({ all: true }),
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              let output = `${String(timestamp)} [${level}]`;

              if (this.context.component) {
                output += ` [${this.context.component}]`;
              }
              if (this.context.wiki) {
                output += ` [${this.context.wiki}]`;
              }

              output += `: ${String(message)}`;

              const { component: _component, wiki: _wiki, service: _service, ...rest } = meta;
              if (Object.keys(rest).length > 0) {
                output += ` ${JSON.stringify(rest)}`;
              }

              return output;
            })
          )
        })
      );
    }

    if (this.config.enableFile) {
      transports.push(
        new winston.transports.File({
          filename: path.join(this.config.logDir, 'combined.log'),
          level: this.config.level,
          maxsize: this.config.maxFileSize,
          maxFiles: this.config.maxFiles,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: this.config.includeStackTrace }),
            winston.format.json()
          )
        })
      );

      transports.push(
        new winston.transports.File({
          filename: path.join(this.config.logDir, 'error.log'),
          level: LogLevel.ERROR,
          maxsize: this.config.maxFileSize,
          maxFiles: this.config.maxFiles,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          )
        })
      );
    }

    return winston.createLogger({
      level: this.config.level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: this.config.includeStackTrace }),
        winston.format.json()
      ),
      defaultMeta: { service: 'wiki-sync' },
      transports
    });
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, { ...this.context, ...meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, { ...this.context, ...meta });
  }

  http(message: string, meta?: LogMeta): void {
    this.logger.http(message, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, { ...this.context, ...meta });
  }

  /**
   * Log a page written to the local mirror
   */
  pageExported(pagePath: string, filePath: string): void {
    this.info(`Exported: ${pagePath} -> ${filePath}`, {
      event: 'page_exported',
      pagePath,
      filePath
    });
  }

  /**
   * Log a page created or updated on the remote wiki
   */
  pageUpserted(pagePath: string, action: 'created' | 'updated'): void {
    this.info(`Page ${action}: ${pagePath}`, {
      event: 'page_upserted',
      pagePath,
      action
    });
  }

  pageFailed(pagePath: string, reason: string): void {
    this.error(`Page failed: ${pagePath}`, {
      event: 'page_failed',
      pagePath,
      reason
    });
  }

  /**
   * Log the counters of a finished run
   */
  runSummary(command: string, counts: Record<string, number>, duration: number): void {
    this.info(`${command} finished in ${duration}ms`, {
      event: 'run_summary',
      command,
      duration,
      ...counts
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): SyncLogger {
    const childLogger = new SyncLogger(this.config);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }

  /**
   * Change the log level at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.logger.level = level;

    this.logger.transports.forEach(transport => {
      transport.level = level;
    });
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * End the logger and wait until every transport has written its buffer
   */
  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Create a logger instance with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): SyncLogger {
  return new SyncLogger(config);
}
