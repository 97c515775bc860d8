/**
 * 统一的日志系统
 * 结构化 JSON 文件日志 + 开发环境彩色控制台输出
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { env } from '../core/env';
import { ScraperError } from '../core/errors';

const logDir = path.resolve(process.cwd(), env.LOG_DIR);

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

export const logger: Logger = createWinstonLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'fetch-orchestrator' },
  transports: []
});

if (env.LOG_TO_FILE) {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    })
  );
  logger.add(
    new transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    })
  );
}

if (env.NODE_ENV !== 'production') {
  logger.add(
    new transports.Console({
      format: consoleFormat,
      silent: env.NODE_ENV === 'test'
    })
  );
}

export type LogContext = Record<string, unknown>;

export interface ModuleLogger {
  info: (message: string, meta?: LogContext) => void;
  warn: (message: string, meta?: LogContext) => void;
  error: (message: string, error?: unknown, meta?: LogContext) => void;
  debug: (message: string, meta?: LogContext) => void;
}

export function describeError(error: unknown): LogContext {
  if (error instanceof ScraperError) {
    const errorMeta: LogContext = {
      errorCode: error.code,
      errorMessage: error.message,
      retryable: error.retryable,
      errorContext: error.context
    };
    if (error.originalError) {
      errorMeta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message
      };
    }
    return errorMeta;
  }
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message, meta = {}) => logger.info(message, { module, ...meta }),
    warn: (message, meta = {}) => logger.warn(message, { module, ...meta }),
    error: (message, error, meta = {}) => {
      logger.error(message, { module, ...meta, ...describeError(error) });
    },
    debug: (message, meta = {}) => logger.debug(message, { module, ...meta })
  };
}

/**
 * 增强的模块日志器（上下文合并 + 耗时追踪）
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;
  private context: LogContext = {};

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, { ...this.context, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogContext): void {
    this.baseLogger.error(message, error, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, { ...this.context, ...meta });
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.debug(`[PERF] ${operation}`, {
      ...this.context,
      ...metadata,
      duration,
      operation,
      type: 'performance'
    });
  }

  startOperation(operation: string, metadata?: LogContext): () => void {
    const startTime = Date.now();
    this.debug(`[START] ${operation}`, metadata);
    return () => {
      const duration = Date.now() - startTime;
      this.performance(operation, duration, metadata);
    };
  }

  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    metadata?: LogContext
  ): Promise<T> {
    const endOperation = this.startOperation(operation, metadata);
    try {
      const result = await fn();
      endOperation();
      return result;
    } catch (error: unknown) {
      endOperation();
      this.error(`[FAILED] ${operation}`, error, metadata);
      throw error;
    }
  }
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;

export type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
