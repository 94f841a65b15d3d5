import { describe, it, expect } from 'vitest';
import {
  ProviderContractError,
  errorFromPayload,
  errorFromResponse,
  extractErrorMessage,
  kindForStatus,
  parseProviderError,
  parseRetryAfter,
} from './errors.js';

describe('kindForStatus', () => {
  it('maps HTTP statuses onto error kinds', () => {
    expect(kindForStatus(401)).toBe('auth');
    expect(kindForStatus(403)).toBe('auth');
    expect(kindForStatus(404)).toBe('shape_mismatch');
    expect(kindForStatus(429)).toBe('rate_limited');
    expect(kindForStatus(408)).toBe('network');
    expect(kindForStatus(503)).toBe('network');
    expect(kindForStatus(400)).toBe('invalid_request');
  });
});

describe('parseRetryAfter', () => {
  it('prefers retry-after-ms', () => {
    const headers = new Headers({ 'retry-after-ms': '1500', 'retry-after': '9' });
    expect(parseRetryAfter(headers)).toBe(1500);
  });

  it('reads seconds and HTTP dates', () => {
    expect(parseRetryAfter(new Headers({ 'retry-after': '2' }))).toBe(2000);

    const now = Date.parse('2024-05-01T00:00:00Z');
    const headers = new Headers({ 'retry-after': 'Wed, 01 May 2024 00:00:03 GMT' });
    expect(parseRetryAfter(headers, now)).toBe(3000);
  });

  it('ignores missing or unparsable values', () => {
    expect(parseRetryAfter(new Headers())).toBeUndefined();
    expect(parseRetryAfter(new Headers({ 'retry-after': 'soon' }))).toBeUndefined();
  });
});

describe('extractErrorMessage', () => {
  it('understands the common provider error bodies', () => {
    expect(extractErrorMessage('{"error":{"message":"bad key"}}')).toBe('bad key');
    expect(extractErrorMessage('{"error":"nope"}')).toBe('nope');
    expect(extractErrorMessage('[{"error":{"code":404,"message":"model not found"}}]')).toBe('model not found');
    expect(extractErrorMessage('  plain text  ')).toBe('plain text');
  });
});

describe('errorFromResponse', () => {
  it('classifies a 404 as a shape mismatch', () => {
    const error = errorFromResponse(404, '{"error":{"message":"Not Found"}}', new Headers(), {
      provider: 'openai',
      api: 'openai-responses',
    });

    expect(error.kind).toBe('shape_mismatch');
    expect(error.status).toBe(404);
    expect(error.message).toBe('openai returned HTTP 404: Not Found');
    expect(error.transient).toBe(false);
  });

  it('carries the backoff hint of a 429', () => {
    const error = errorFromResponse(429, '', new Headers({ 'retry-after': '3' }), {});

    expect(error.kind).toBe('rate_limited');
    expect(error.retryAfterMs).toBe(3000);
    expect(error.message).toBe('provider returned HTTP 429');
    expect(error.transient).toBe(true);
  });
});

describe('errorFromPayload', () => {
  it('classifies in-stream error events by type or status', () => {
    expect(errorFromPayload({ type: 'error', error: { type: 'overloaded_error', message: 'busy' } }, {}).kind).toBe(
      'network'
    );
    expect(errorFromPayload({ error: { code: 429, status: 'RESOURCE_EXHAUSTED', message: 'quota' } }, {}).kind).toBe(
      'rate_limited'
    );
    expect(errorFromPayload({ error: { code: 'something_new' } }, {}).kind).toBe('unknown');
  });

  it('keeps the provider message', () => {
    const error = errorFromPayload({ error: { type: 'invalid_request_error', message: 'too long' } }, {
      provider: 'anthropic',
    });
    expect(error.message).toBe('too long');
    expect(error.provider).toBe('anthropic');
    expect(error.details).toEqual({ code: 'invalid_request_error' });
  });
});

describe('parseProviderError', () => {
  it('passes contract errors through unchanged', () => {
    const original = new ProviderContractError({ kind: 'auth', message: 'denied' });
    expect(parseProviderError(original, {})).toBe(original);
  });

  it('maps runtime failures', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    expect(parseProviderError(abort, {}).kind).toBe('aborted');
    expect(parseProviderError(new TypeError('fetch failed'), {}).kind).toBe('network');
    expect(parseProviderError(new SyntaxError('Unexpected token'), {}).kind).toBe('malformed_stream');
    expect(parseProviderError('weird', {}).kind).toBe('unknown');
  });

  it('maps SDK exceptions by name, then by HTTP status', () => {
    const throttled = Object.assign(new Error('slow down'), { name: 'ThrottlingException' });
    const forbidden = Object.assign(new Error('forbidden'), {
      name: 'SomeOtherException',
      $metadata: { httpStatusCode: 403 },
    });

    expect(parseProviderError(throttled, { api: 'bedrock-converse-stream' })).toMatchObject({
      kind: 'rate_limited',
      api: 'bedrock-converse-stream',
      details: { code: 'ThrottlingException' },
    });
    expect(parseProviderError(forbidden, {})).toMatchObject({ kind: 'auth', status: 403 });
  });
});
