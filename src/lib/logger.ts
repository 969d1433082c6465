/**
 * Structured Logger Utility
 *
 * A lightweight, structured logging utility for the shredding pipeline.
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Structured output with timestamp, level, context
 * - Environment-based level control (LOG_LEVEL env var)
 * - JSON output format option for production (LOG_FORMAT=json)
 * - Context-based child loggers for module-specific logging
 * - Article context tracking so every line emitted while an article is
 *   processed carries its id
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Article context stored in AsyncLocalStorage */
export interface ArticleContext {
  /** Id of the article being processed */
  articleId: string;
  /** Additional context fields to include in all logs */
  fields?: Record<string, unknown>;
}

const articleContextStorage = new AsyncLocalStorage<ArticleContext>();

/**
 * Run a function with article context
 * All logs within the callback will include the article id
 */
export function withArticleContext<T>(context: ArticleContext, fn: () => T): T {
  return articleContextStorage.run(context, fn);
}

/**
 * Run an async function with article context
 */
export async function withArticleContextAsync<T>(
  context: ArticleContext,
  fn: () => Promise<T>
): Promise<T> {
  return articleContextStorage.run(context, fn);
}

/**
 * Get the current article context
 * Returns undefined outside of an article context
 */
export function getArticleContext(): ArticleContext | undefined {
  return articleContextStorage.getStore();
}

/** Numeric values for log level comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Logger context (module name) */
  context: string;
  message: string;
  /** Optional structured data */
  data?: Record<string, unknown>;
  /** Error stack trace (for error level) */
  stack?: string;
  /** Optional operation name */
  operation?: string;
  /** Article id (from AsyncLocalStorage) */
  articleId?: string;
  /** Service name for log aggregation */
  service?: string;
  /** Environment (development, staging, production) */
  environment?: string;
  /** Hostname */
  host?: string;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format: 'text' for human-readable, 'json' for structured */
  format: 'text' | 'json';
  /** Logger context (module name) */
  context: string;
  /** Whether to include timestamps */
  timestamps: boolean;
  /** Service name for log aggregation (defaults to 'wiki-shredder') */
  service?: string;
  /** Default fields to include in all log entries */
  defaultFields?: Record<string, unknown>;
}

const DEFAULT_SERVICE = 'wiki-shredder';

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'text',
  context: 'app',
  timestamps: true,
  service: DEFAULT_SERVICE,
};

function getServiceFromEnv(): string {
  return process.env['SERVICE_NAME'] ?? DEFAULT_SERVICE;
}

function getEnvironmentFromEnv(): string {
  return process.env['NODE_ENV'] ?? 'development';
}

function getHostFromEnv(): string | undefined {
  return process.env['HOSTNAME'];
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  // Default to debug in development, info in production
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

/**
 * Get log format from environment variable
 */
function getLogFormatFromEnv(): 'text' | 'json' {
  const envFormat = process.env['LOG_FORMAT']?.toLowerCase();
  if (envFormat === 'json') {
    return 'json';
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

/**
 * Format a log entry as human-readable text
 */
function formatText(entry: LogEntry, config: LoggerConfig): string {
  const parts: string[] = [];

  if (config.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${COLORS.reset}`);

  if (entry.articleId) {
    parts.push(`${COLORS.dim}<${entry.articleId}>${COLORS.reset}`);
  }

  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);

  if (entry.operation) {
    parts.push(`${COLORS.dim}(${entry.operation})${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${dataStr}${COLORS.reset}`);
  }

  let output = parts.join(' ');

  if (entry.stack) {
    output += `\n${COLORS.dim}${entry.stack}${COLORS.reset}`;
  }

  return output;
}

/**
 * Logger class for structured logging
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;
  private readonly service: string;
  private readonly environment: string;
  private readonly host: string | undefined;

  constructor(config: Partial<LoggerConfig> = {}) {
    const resolved: LoggerConfig = {
      ...DEFAULT_CONFIG,
      level: config.level ?? getLogLevelFromEnv(),
      format: config.format ?? getLogFormatFromEnv(),
      context: config.context ?? DEFAULT_CONFIG.context,
      timestamps: config.timestamps ?? DEFAULT_CONFIG.timestamps,
      service: config.service ?? getServiceFromEnv(),
    };
    if (config.defaultFields !== undefined) {
      resolved.defaultFields = config.defaultFields;
    }
    this.config = resolved;
    this.minLevel = LOG_LEVEL_VALUES[resolved.level];
    this.service = resolved.service ?? DEFAULT_SERVICE;
    this.environment = getEnvironmentFromEnv();
    this.host = getHostFromEnv();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.minLevel;
  }

  private write(entry: LogEntry): void {
    const output =
      this.config.format === 'json' ? JSON.stringify(entry) : formatText(entry, this.config);

    // stderr for warn and error, stdout for others
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const articleContext = getArticleContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.service,
      environment: this.environment,
    };

    if (articleContext?.articleId) {
      entry.articleId = articleContext.articleId;
    }

    if (this.host) {
      entry.host = this.host;
    }

    if (this.config.defaultFields) {
      entry.data = { ...this.config.defaultFields };
    }

    if (articleContext?.fields) {
      entry.data = { ...entry.data, ...articleContext.fields };
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        data = { ...data, error: error.message };
      }
      entry.data = { ...entry.data, ...data };
    }

    if (operation) {
      entry.operation = operation;
    }

    this.write(entry);
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      ...this.config,
      context: `${this.config.context}:${context}`,
    });
  }

  /**
   * Create a logger bound to a specific operation
   */
  withOperation(operation: string): OperationLogger {
    return new OperationLogger(this, operation);
  }

  /**
   * Create a child logger with additional default fields
   */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Operation-scoped logger that automatically includes operation name
 */
export class OperationLogger {
  constructor(
    private readonly logger: Logger,
    private readonly operation: string
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(message, data, this.operation);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(message, data, this.operation);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(message, data, this.operation);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(message, data, this.operation);
  }
}

/**
 * Logger provider interface for dependency injection
 */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggerCache = new Map<string, Logger>();

  createLogger(context: string): Logger {
    let logger = this.loggerCache.get(context);
    if (!logger) {
      logger = new Logger({ context });
      this.loggerCache.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

export function getLoggerProvider(): LoggerProvider {
  return loggerProvider;
}

/**
 * Set a custom logger provider (useful for testing)
 * @returns The previous logger provider for restoration
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Create a logger for a specific module
 * Uses the current logger provider (supports dependency injection)
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}
