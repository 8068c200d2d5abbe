import { APICallError } from '@ai-sdk/provider';
import { describe, expect, it } from 'vitest';

import { classifyLlmErrorKindFromMessage, mapLlmError } from '../../llm-providers/llm-error-mapping.js';

const apiError = (statusCode: number, message: string, responseHeaders?: Record<string, string>): APICallError => new APICallError({
  message,
  url: 'https://llm.example.com/v1/chat/completions',
  requestBodyValues: {},
  statusCode,
  ...(responseHeaders !== undefined ? { responseHeaders } : {}),
});

describe('mapLlmError', () => {
  it('classifies by HTTP status first', () => {
    expect(mapLlmError(apiError(429, 'Too Many Requests', { 'retry-after': '2' }))).toEqual({
      type: 'rate_limit',
      message: '429 Too Many Requests',
      retryAfterMs: 2000,
    });
    expect(mapLlmError(apiError(401, 'Unauthorized'))).toEqual({ type: 'auth_error', message: '401 Unauthorized' });
    expect(mapLlmError({ statusCode: 403, message: 'nope' })).toEqual({ type: 'auth_error', message: '403 nope' });
    expect(mapLlmError(apiError(404, 'Model not found'))).toEqual({ type: 'model_error', message: '404 Model not found', retryable: false });
    expect(mapLlmError(apiError(503, 'Service Unavailable'))).toEqual({ type: 'network_error', message: '503 Service Unavailable', retryable: true });
  });

  it('looks through retry wrappers to the last attempt', () => {
    const wrapped = Object.assign(new Error('Failed after 3 attempts'), { lastError: { statusCode: 402, message: 'Payment Required' } });

    expect(mapLlmError(wrapped)).toEqual({ type: 'quota_exceeded', message: '402 Payment Required' });
  });

  it('uses error names, codes and messages when there is no status', () => {
    const noSuchModel = Object.assign(new Error('No such model: gpt-x'), { name: 'AI_NoSuchModelError' });
    const aborted = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    const refused = new Error('fetch failed', { cause: { code: 'ECONNREFUSED' } });

    expect(mapLlmError(noSuchModel)).toEqual({ type: 'model_error', message: 'No such model: gpt-x', retryable: false });
    expect(mapLlmError(aborted)).toEqual({ type: 'timeout', message: 'This operation was aborted' });
    expect(mapLlmError(refused)).toEqual({ type: 'network_error', message: 'fetch failed', retryable: true });
    expect(mapLlmError(new Error('Rate limit reached for requests'))).toEqual({ type: 'rate_limit', message: 'Rate limit reached for requests' });
  });

  it('falls back to invalid_response', () => {
    expect(mapLlmError(new Error('unexpected token in body'))).toEqual({ type: 'invalid_response', message: 'unexpected token in body' });
    expect(mapLlmError('weird')).toEqual({ type: 'invalid_response', message: 'weird' });
    expect(mapLlmError(undefined)).toEqual({ type: 'invalid_response', message: 'Unknown error' });
  });
});

describe('classifyLlmErrorKindFromMessage', () => {
  it('matches the first kind whose fragment appears', () => {
    expect(classifyLlmErrorKindFromMessage('Insufficient credits')).toBe('quota_exceeded');
    expect(classifyLlmErrorKindFromMessage('ETIMEDOUT')).toBe('timeout');
    expect(classifyLlmErrorKindFromMessage('')).toBeUndefined();
  });
});
