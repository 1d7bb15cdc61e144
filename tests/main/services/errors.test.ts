import { describe, it, expect } from 'vitest';
import {
  APIError,
  DownloadError,
  FatalError,
  FileReadError,
  PipelineError,
  RateLimitedError,
  TransientError,
  UnsupportedFormatError,
  WriteError,
  errorMessage,
  isFatalError,
  isPipelineError,
  isRetryableError,
  wrapError,
} from '../../../src/main/services/errors';

describe('errors', () => {
  describe('PipelineError subclasses', () => {
    it('carry their category and default step', () => {
      const cases: Array<[PipelineError, string, string]> = [
        [new RateLimitedError('slow down'), 'RateLimitedError', 'catalog'],
        [new TransientError('timeout'), 'TransientError', 'catalog'],
        [new FatalError('bad token'), 'FatalError', 'configuration'],
        [new APIError('not found'), 'APIError', 'catalog'],
        [new FileReadError('unreadable'), 'FileReadError', 'reading'],
        [new UnsupportedFormatError('wma'), 'UnsupportedFormatError', 'writing'],
        [new WriteError('disk full'), 'WriteError', 'writing'],
        [new DownloadError('404'), 'DownloadError', 'fetching_art'],
      ];

      for (const [error, category, step] of cases) {
        expect(error).toBeInstanceOf(PipelineError);
        expect(error).toBeInstanceOf(Error);
        expect(error.category).toBe(category);
        expect(error.name).toBe(category);
        expect(error.step).toBe(step);
      }
    });

    it('keeps file path, step and cause from options', () => {
      const cause = new Error('EACCES');
      const error = new WriteError('cannot write', { filePath: '/music/a.mp3', step: 'art', cause });

      expect(error.filePath).toBe('/music/a.mp3');
      expect(error.step).toBe('art');
      expect(error.cause).toBe(cause);
    });

    it('records retry-after seconds on rate limits', () => {
      expect(new RateLimitedError('429', { retryAfterSeconds: 30 }).retryAfterSeconds).toBe(30);
      expect(new RateLimitedError('429').retryAfterSeconds).toBeNull();
    });

    it('formats a short user message', () => {
      expect(new TransientError('HTTP 503').toUserMessage()).toBe('TransientError: HTTP 503');
    });

    it('includes the status code in the log object of API errors', () => {
      const log = new APIError('gone', { statusCode: 404, cause: new Error('Not Found') }).toLogObject();

      expect(log.category).toBe('APIError');
      expect(log.statusCode).toBe(404);
      expect(log.cause).toBe('Not Found');
    });
  });

  describe('classification helpers', () => {
    it('treats only rate limits and transient failures as retryable', () => {
      expect(isRetryableError(new RateLimitedError('x'))).toBe(true);
      expect(isRetryableError(new TransientError('x'))).toBe(true);
      expect(isRetryableError(new APIError('x'))).toBe(false);
      expect(isRetryableError(new Error('x'))).toBe(false);
    });

    it('identifies fatal and pipeline errors', () => {
      expect(isFatalError(new FatalError('x'))).toBe(true);
      expect(isFatalError(new APIError('x'))).toBe(false);
      expect(isPipelineError(new DownloadError('x'))).toBe(true);
      expect(isPipelineError(new Error('x'))).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('wraps plain errors in the requested category', () => {
      const wrapped = wrapError(new Error('boom'), 'WriteError', { filePath: '/music/a.mp3' });

      expect(wrapped).toBeInstanceOf(WriteError);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.filePath).toBe('/music/a.mp3');
      expect(wrapped.step).toBe('writing');
      expect(wrapped.cause?.message).toBe('boom');
    });

    it('wraps non-Error values', () => {
      const wrapped = wrapError('plain string', 'APIError');

      expect(wrapped).toBeInstanceOf(APIError);
      expect(wrapped.message).toBe('plain string');
    });

    it('returns pipeline errors unchanged', () => {
      const original = new TransientError('timeout');
      expect(wrapError(original, 'APIError')).toBe(original);
    });
  });

  describe('errorMessage', () => {
    it('extracts messages from anything thrown', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
