import { describe, it, expect } from 'vitest';
import {
  LumoraError,
  Errors,
  isLumoraError,
  toLumoraError,
} from '../../errors.js';

describe('LumoraError', () => {
  it('creates error with code and message', () => {
    const error = new LumoraError('VALIDATION_FAILED', 'Brand name is required');
    expect(error.code).toBe('VALIDATION_FAILED');
    expect(error.message).toBe('Brand name is required');
    expect(error.name).toBe('LumoraError');
  });

  it('accepts optional properties', () => {
    const cause = new Error('Original error');
    const error = new LumoraError('INTERNAL_ERROR', 'Something went wrong', {
      retryable: true,
      userMessage: 'Please try again',
      details: { key: 'value' },
      cause,
    });

    expect(error.retryable).toBe(true);
    expect(error.userMessage).toBe('Please try again');
    expect(error.details).toEqual({ key: 'value' });
    expect(error.cause).toBe(cause);
  });

  it('derives retryable from the code when not given', () => {
    expect(new LumoraError('RATE_LIMITED', 'Slow down').retryable).toBe(true);
    expect(new LumoraError('TIMEOUT', 'Too slow').retryable).toBe(true);
    expect(new LumoraError('AUTH_FAILED', 'Bad key').retryable).toBe(false);
  });

  it('serializes to JSON correctly', () => {
    const error = new LumoraError('RATE_LIMITED', 'Too many requests', {
      userMessage: 'Please wait',
      details: { retryAfterMs: 1000 },
    });

    expect(error.toJSON()).toEqual({
      code: 'RATE_LIMITED',
      message: 'Too many requests',
      retryable: true,
      userMessage: 'Please wait',
      details: { retryAfterMs: 1000 },
    });
  });

  it('has proper stack trace', () => {
    const error = new LumoraError('INTERNAL_ERROR', 'Test error');
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('LumoraError');
  });
});

describe('Errors factory', () => {
  it('creates unsupportedIndustry error', () => {
    const error = Errors.unsupportedIndustry('Aerospace');
    expect(error.code).toBe('UNSUPPORTED_INDUSTRY');
    expect(error.message).toBe('Industry Aerospace not supported');
    expect(error.details).toEqual({ industry: 'Aerospace' });
    expect(error.userMessage).toBeDefined();
  });

  it('creates platformQueryFailed error with the platform in the message', () => {
    const error = Errors.platformQueryFailed('gemini', 'socket hang up');
    expect(error.code).toBe('PLATFORM_QUERY_FAILED');
    expect(error.message).toBe('Error querying gemini: socket hang up');
  });

  it('creates timeout error', () => {
    const error = Errors.timeout('openai query', 30000);
    expect(error.code).toBe('TIMEOUT');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ operation: 'openai query', timeoutMs: 30000 });
  });

  it('creates competitorAnalysisFailed error from a cause', () => {
    const error = Errors.competitorAnalysisFailed('Globex', new Error('boom'));
    expect(error.code).toBe('COMPETITOR_ANALYSIS_FAILED');
    expect(error.message).toBe('Error analyzing competitor Globex: boom');
  });

  it('creates pipelineFailed error that keeps its cause', () => {
    const cause = new Error('disk full');
    const error = Errors.pipelineFailed('scoring', cause);
    expect(error.code).toBe('PIPELINE_FAILED');
    expect(error.message).toBe('Analysis failed during scoring: disk full');
    expect(error.cause).toBe(cause);
  });
});

describe('isLumoraError', () => {
  it('returns true for LumoraError', () => {
    expect(isLumoraError(new LumoraError('INTERNAL_ERROR', 'Test'))).toBe(true);
  });

  it('returns false for other values', () => {
    expect(isLumoraError(new Error('Test'))).toBe(false);
    expect(isLumoraError('error')).toBe(false);
    expect(isLumoraError(null)).toBe(false);
  });
});

describe('toLumoraError', () => {
  it('returns LumoraError unchanged', () => {
    const original = new LumoraError('VALIDATION_FAILED', 'Test');
    expect(toLumoraError(original)).toBe(original);
  });

  it('wraps Error as INTERNAL_ERROR', () => {
    const original = new Error('Standard error');
    const converted = toLumoraError(original);
    expect(converted.code).toBe('INTERNAL_ERROR');
    expect(converted.message).toBe('Standard error');
    expect(converted.cause).toBe(original);
  });

  it('converts non-errors to strings', () => {
    expect(toLumoraError('string error').message).toBe('string error');
    expect(toLumoraError(42).message).toBe('42');
  });
});
