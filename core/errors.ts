/**
 * Error Handling Module (Consolidated)
 * Contains Error Codes, ScraperError, Classifier, Utils and the ScraperErrors factory.
 */

// ==========================================
// Part 1: Error Codes & Types
// ==========================================

export enum ErrorCode {
  // Transport Errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  HTTP_ERROR = 'HTTP_ERROR',
  // Identity Errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  BLOCKED = 'BLOCKED',
  NO_ACTIVE_CREDENTIAL = 'NO_ACTIVE_CREDENTIAL',
  IDENTITY_EXHAUSTED = 'IDENTITY_EXHAUSTED',
  // Rate Limiting
  RATE_LIMITED = 'RATE_LIMITED',
  // Signing
  SIGN_FAILURE = 'SIGN_FAILURE',
  // Resource Pools
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  PROXY_UNAVAILABLE = 'PROXY_UNAVAILABLE',
  // System Errors
  CHECKPOINT_ERROR = 'CHECKPOINT_ERROR',
  STORAGE_ERROR = 'STORAGE_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CANCELLED = 'CANCELLED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorContext {
  operation?: string;
  itemId?: string;
  keyword?: string;
  checkpointId?: string;
  cursor?: string | number;
  statusCode?: number;
  appStatusCode?: number;
  retryCount?: number;
  [key: string]: unknown;
}

const TRANSIENT_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.NETWORK_ERROR,
  ErrorCode.TIMEOUT,
  ErrorCode.INVALID_RESPONSE,
  ErrorCode.HTTP_ERROR,
]);

const IDENTITY_CODES: ReadonlySet<ErrorCode> = new Set([ErrorCode.UNAUTHORIZED, ErrorCode.BLOCKED]);

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.IDENTITY_EXHAUSTED,
  ErrorCode.CANCELLED,
]);

const NETWORK_ERROR_CODES = [
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_NETWORK',
];

const TIMEOUT_ERROR_CODES = ['ETIMEDOUT', 'ECONNABORTED', 'ERR_CANCELED'];

// ==========================================
// Part 2: ScraperError Class
// ==========================================

export class ScraperError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      originalError?: Error;
      statusCode?: number;
    } = {},
  ) {
    super(message);
    this.name = 'ScraperError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScraperError);
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      statusCode: this.statusCode,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
            stack: this.originalError.stack,
          }
        : undefined,
    };
  }

  static fromHttpResponse(
    response: { status: number; statusText?: string },
    context?: ErrorContext,
  ): ScraperError {
    const statusCode = response.status;
    const statusText = response.statusText || String(statusCode);
    const ctx: ErrorContext = { ...(context || {}), statusCode };

    if (statusCode === 401) {
      return new ScraperError(ErrorCode.UNAUTHORIZED, `Account unauthorized: ${statusText}`, {
        statusCode,
        context: ctx,
      });
    }
    if (statusCode === 403) {
      return new ScraperError(ErrorCode.BLOCKED, `Account blocked: ${statusText}`, {
        statusCode,
        context: ctx,
      });
    }
    if (statusCode === 429) {
      return new ScraperError(ErrorCode.RATE_LIMITED, `Rate limited: ${statusText}`, {
        retryable: true,
        statusCode,
        context: ctx,
      });
    }
    return new ScraperError(ErrorCode.HTTP_ERROR, `HTTP ${statusCode}: ${statusText}`, {
      retryable: true,
      statusCode,
      context: ctx,
    });
  }
}

// ==========================================
// Part 3: Error Classifier
// ==========================================

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class ErrorClassifier {
  /**
   * Maps any thrown value onto the taxonomy. ScraperErrors pass through with the extra
   * context merged in; transport failures are recognized by their socket error code first and
   * by message text second.
   */
  static classify(error: unknown, context?: ErrorContext): ScraperError {
    if (error instanceof ScraperError) {
      if (context) Object.assign(error.context, context);
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();
    const sysCode = errorCodeOf(error);

    if (
      (sysCode && TIMEOUT_ERROR_CODES.includes(sysCode)) ||
      lowerMessage.includes('timeout') ||
      lowerMessage.includes('timed out')
    ) {
      return new ScraperError(ErrorCode.TIMEOUT, message, { retryable: true, context, originalError });
    }

    if (
      (sysCode && NETWORK_ERROR_CODES.includes(sysCode)) ||
      lowerMessage.includes('network') ||
      lowerMessage.includes('socket hang up') ||
      lowerMessage.includes('proxy')
    ) {
      return new ScraperError(ErrorCode.NETWORK_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (error instanceof SyntaxError || lowerMessage.includes('json')) {
      return new ScraperError(ErrorCode.INVALID_RESPONSE, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    return new ScraperError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }
}

// ==========================================
// Part 4: Error Utilities
// ==========================================

export function handleError(error: unknown, context?: ErrorContext): ScraperError {
  const scraperError = ErrorClassifier.classify(error);
  if (context && Object.keys(context).length > 0) Object.assign(scraperError.context, context);
  return scraperError;
}

export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return error instanceof ScraperError && error.code === code;
}

/** Transport-level failures the same identity may retry. */
export function isTransientError(error: unknown): boolean {
  return error instanceof ScraperError && TRANSIENT_CODES.has(error.code);
}

/** Failures that condemn the bound identity. */
export function isIdentityError(error: unknown): boolean {
  return error instanceof ScraperError && IDENTITY_CODES.has(error.code);
}

/** Failures that end the whole run rather than one crawl unit. */
export function isFatalError(error: unknown): boolean {
  return error instanceof ScraperError && FATAL_CODES.has(error.code);
}

// ==========================================
// Part 5: ScraperErrors Factory
// ==========================================

export const ScraperErrors = {
  networkError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.NETWORK_ERROR, message, { retryable: true, context, originalError }),

  invalidResponse: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.INVALID_RESPONSE, message, { retryable: true, context, originalError }),

  unauthorized: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.UNAUTHORIZED, message, { context }),

  blocked: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.BLOCKED, message, { context }),

  rateLimited: (message: string = 'Rate limited', context?: ErrorContext) =>
    new ScraperError(ErrorCode.RATE_LIMITED, message, { retryable: true, context }),

  signFailure: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.SIGN_FAILURE, message, { context, originalError }),

  identityExhausted: (attempts: number, originalError?: Error) =>
    new ScraperError(
      ErrorCode.IDENTITY_EXHAUSTED,
      `No usable identity after ${attempts} attempts`,
      { context: { retryCount: attempts }, originalError },
    ),

  noActiveCredential: () =>
    new ScraperError(ErrorCode.NO_ACTIVE_CREDENTIAL, 'No active credential in pool'),

  sourceUnavailable: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.SOURCE_UNAVAILABLE, message, { context, originalError }),

  providerError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.PROVIDER_ERROR, message, { context, originalError }),

  proxyUnavailable: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.PROXY_UNAVAILABLE, message, { retryable: true, context, originalError }),

  checkpointError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.CHECKPOINT_ERROR, message, { context, originalError }),

  storageError: (message: string, context?: ErrorContext, originalError?: Error) =>
    new ScraperError(ErrorCode.STORAGE_ERROR, message, { context, originalError }),

  validationError: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.VALIDATION_ERROR, message, { context }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.CONFIG_ERROR, message, { context }),

  cancelled: (context?: ErrorContext) =>
    new ScraperError(ErrorCode.CANCELLED, 'Crawl cancelled', { context }),
};
