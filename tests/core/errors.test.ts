import { describe, expect, it } from 'vitest';
import {
  ErrorClassifier,
  ErrorCode,
  handleError,
  isFatalError,
  isIdentityError,
  isTransientError,
  ScraperError,
  ScraperErrors,
} from '../../core/errors';

describe('ScraperError', () => {
  describe('fromHttpResponse', () => {
    it('maps 401 to UNAUTHORIZED', () => {
      const error = ScraperError.fromHttpResponse({ status: 401, statusText: 'Unauthorized' });
      expect(error.code).toBe(ErrorCode.UNAUTHORIZED);
      expect(error.statusCode).toBe(401);
      expect(error.retryable).toBe(false);
      expect(error.message).toBe('Account unauthorized: Unauthorized');
    });

    it('maps 403 to BLOCKED', () => {
      const error = ScraperError.fromHttpResponse({ status: 403 });
      expect(error.code).toBe(ErrorCode.BLOCKED);
      expect(error.message).toBe('Account blocked: 403');
    });

    it('maps 429 to a retryable RATE_LIMITED', () => {
      const error = ScraperError.fromHttpResponse({ status: 429 }, { operation: 'searchPage' });
      expect(error.code).toBe(ErrorCode.RATE_LIMITED);
      expect(error.retryable).toBe(true);
      expect(error.context).toEqual({ operation: 'searchPage', statusCode: 429 });
    });

    it('maps other statuses to HTTP_ERROR', () => {
      const error = ScraperError.fromHttpResponse({ status: 502, statusText: 'Bad Gateway' });
      expect(error.code).toBe(ErrorCode.HTTP_ERROR);
      expect(error.message).toBe('HTTP 502: Bad Gateway');
    });
  });

  it('serializes with its original error', () => {
    const original = new Error('socket closed');
    const error = ScraperErrors.networkError('request failed', { itemId: '42' }, original);
    const json = error.toJSON();

    expect(json.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(json.message).toBe('request failed');
    expect(json.retryable).toBe(true);
    expect(json.context).toEqual({ itemId: '42' });
    expect(json.originalError).toMatchObject({ name: 'Error', message: 'socket closed' });
  });
});

describe('ErrorClassifier', () => {
  it('passes ScraperErrors through and merges context', () => {
    const error = ScraperErrors.blocked('Blocked');
    const classified = ErrorClassifier.classify(error, { keyword: 'cats' });
    expect(classified).toBe(error);
    expect(classified.context.keyword).toBe('cats');
  });

  it('classifies socket timeout codes as TIMEOUT', () => {
    const error = Object.assign(new Error('aborted'), { code: 'ECONNABORTED' });
    expect(ErrorClassifier.classify(error).code).toBe(ErrorCode.TIMEOUT);
  });

  it('classifies socket failures as NETWORK_ERROR', () => {
    const error = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });
    const classified = ErrorClassifier.classify(error);
    expect(classified.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(classified.retryable).toBe(true);
    expect(classified.originalError).toBe(error);
  });

  it('classifies by message when no code is present', () => {
    expect(ErrorClassifier.classify(new Error('Request timed out')).code).toBe(ErrorCode.TIMEOUT);
    expect(ErrorClassifier.classify(new Error('socket hang up')).code).toBe(ErrorCode.NETWORK_ERROR);
    expect(ErrorClassifier.classify(new SyntaxError('Unexpected token <')).code).toBe(ErrorCode.INVALID_RESPONSE);
  });

  it('falls back to UNKNOWN_ERROR', () => {
    const classified = ErrorClassifier.classify('something odd');
    expect(classified.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(classified.message).toBe('something odd');
    expect(classified.retryable).toBe(false);
  });
});

describe('error predicates', () => {
  it('recognizes transient transport errors', () => {
    expect(isTransientError(ScraperErrors.networkError('down'))).toBe(true);
    expect(isTransientError(ScraperErrors.invalidResponse('bad json'))).toBe(true);
    expect(isTransientError(ScraperErrors.rateLimited())).toBe(false);
    expect(isTransientError(new Error('plain'))).toBe(false);
  });

  it('recognizes identity errors', () => {
    expect(isIdentityError(ScraperErrors.unauthorized('login'))).toBe(true);
    expect(isIdentityError(ScraperErrors.blocked('blocked'))).toBe(true);
    expect(isIdentityError(ScraperErrors.rateLimited())).toBe(false);
  });

  it('treats exhaustion and cancellation as fatal', () => {
    expect(isFatalError(ScraperErrors.identityExhausted(10))).toBe(true);
    expect(isFatalError(ScraperErrors.cancelled())).toBe(true);
    expect(isFatalError(ScraperErrors.checkpointError('disk full'))).toBe(false);
  });

  it('handleError classifies and attaches context', () => {
    const result = handleError(new Error('network unreachable'), { operation: 'commentPage', itemId: '7' });
    expect(result.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(result.context).toEqual({ operation: 'commentPage', itemId: '7' });
  });
});

describe('ScraperErrors factory', () => {
  it('records attempts on identity exhaustion', () => {
    const error = ScraperErrors.identityExhausted(10);
    expect(error.code).toBe(ErrorCode.IDENTITY_EXHAUSTED);
    expect(error.message).toBe('No usable identity after 10 attempts');
    expect(error.context.retryCount).toBe(10);
  });
});
