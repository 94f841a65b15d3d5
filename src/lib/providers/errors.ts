/**
 * Error taxonomy shared by adapters, router and agent loop.
 *
 * Every failure that crosses a module boundary is a ProviderContractError
 * with one of the kinds below. The agent loop decides retry, fallback or
 * terminal failure from the kind alone.
 */

import type { ApiShape } from './providerContract.js';

export type ErrorKind =
  | 'network'          // Connection failure, timeout, 5xx
  | 'rate_limited'     // 429 or provider throttling
  | 'shape_mismatch'   // This API shape is not served at this endpoint
  | 'auth'             // Credentials rejected
  | 'config'           // Missing or unresolvable configuration
  | 'malformed_stream' // Protocol-sequence violation
  | 'tool_execution'   // Tool executor signalled a fatal condition
  | 'aborted'          // External cancellation
  | 'invalid_request'  // Provider rejected the request body
  | 'step_limit'       // Turn requested tools too many times
  | 'unknown';

export interface ErrorContext {
  provider?: string;
  api?: ApiShape;
}

export interface ProviderErrorInit extends ErrorContext {
  kind: ErrorKind;
  message: string;
  status?: number;
  retryAfterMs?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ProviderContractError extends Error {
  readonly kind: ErrorKind;
  readonly provider?: string;
  readonly api?: ApiShape;
  readonly status?: number;
  readonly retryAfterMs?: number;
  readonly details?: Record<string, unknown>;

  constructor(init: ProviderErrorInit) {
    super(init.message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'ProviderContractError';
    this.kind = init.kind;
    this.provider = init.provider;
    this.api = init.api;
    this.status = init.status;
    this.retryAfterMs = init.retryAfterMs;
    this.details = init.details;
  }

  get transient(): boolean {
    return isTransient(this.kind);
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      provider: this.provider,
      api: this.api,
      status: this.status,
      retryAfterMs: this.retryAfterMs,
      details: this.details,
    };
  }
}

export function isTransient(kind: ErrorKind): boolean {
  return kind === 'network' || kind === 'rate_limited';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// HTTP status classification
// ============================================================================

export function kindForStatus(status: number): ErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'shape_mismatch';
  if (status === 429) return 'rate_limited';
  if (status === 408 || status === 409 || status >= 500) return 'network';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

/**
 * Backoff hint from `retry-after-ms` or `retry-after` (seconds or HTTP date).
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | undefined {
  const ms = headers.get('retry-after-ms');
  if (ms !== null) {
    const value = Number(ms);
    if (Number.isFinite(value) && value >= 0) return Math.round(value);
  }

  const header = headers.get('retry-after');
  if (header === null || header.trim() === '') return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Pull a human-readable message out of a provider error body.
 * Handles `{error: {message}}`, `{error: "..."}`, `{message}` and
 * Google's `[{error: {...}}]` wrapper; falls back to the raw text.
 */
export function extractErrorMessage(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  try {
    let parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed) && parsed.length > 0) parsed = parsed[0];
    if (isRecord(parsed)) {
      const inner = parsed.error;
      if (isRecord(inner) && typeof inner.message === 'string') return inner.message;
      if (typeof inner === 'string') return inner;
      if (typeof parsed.message === 'string') return parsed.message;
    }
  } catch {
    // not JSON; use the text as-is
  }
  return trimmed.length > 500 ? `${trimmed.slice(0, 500)}…` : trimmed;
}

export function errorFromResponse(
  status: number,
  body: string,
  headers: Headers,
  ctx: ErrorContext
): ProviderContractError {
  const kind = kindForStatus(status);
  const detail = extractErrorMessage(body);
  const label = ctx.provider ?? ctx.api ?? 'provider';
  return new ProviderContractError({
    kind,
    message: detail ? `${label} returned HTTP ${status}: ${detail}` : `${label} returned HTTP ${status}`,
    status,
    retryAfterMs: kind === 'rate_limited' ? parseRetryAfter(headers) : undefined,
    provider: ctx.provider,
    api: ctx.api,
  });
}

// ============================================================================
// Provider error codes (in-stream payloads and SDK exceptions)
// ============================================================================

const CODE_KINDS: Record<string, ErrorKind> = {
  // Anthropic / OpenAI error types
  rate_limit_error: 'rate_limited',
  rate_limit_exceeded: 'rate_limited',
  too_many_requests: 'rate_limited',
  overloaded_error: 'network',
  api_error: 'network',
  server_error: 'network',
  timeout_error: 'network',
  authentication_error: 'auth',
  permission_error: 'auth',
  invalid_api_key: 'auth',
  not_found_error: 'shape_mismatch',
  invalid_request_error: 'invalid_request',
  context_length_exceeded: 'invalid_request',
  // Google RPC status names
  RESOURCE_EXHAUSTED: 'rate_limited',
  UNAVAILABLE: 'network',
  INTERNAL: 'network',
  DEADLINE_EXCEEDED: 'network',
  UNAUTHENTICATED: 'auth',
  PERMISSION_DENIED: 'auth',
  NOT_FOUND: 'shape_mismatch',
  INVALID_ARGUMENT: 'invalid_request',
  // Bedrock exceptions
  ThrottlingException: 'rate_limited',
  ServiceQuotaExceededException: 'rate_limited',
  ServiceUnavailableException: 'network',
  InternalServerException: 'network',
  ModelStreamErrorException: 'network',
  ModelTimeoutException: 'network',
  ModelNotReadyException: 'network',
  AccessDeniedException: 'auth',
  UnrecognizedClientException: 'auth',
  ExpiredTokenException: 'auth',
  ResourceNotFoundException: 'shape_mismatch',
  ValidationException: 'invalid_request',
};

export function kindForCode(code: string | undefined): ErrorKind | undefined {
  if (!code) return undefined;
  return Object.hasOwn(CODE_KINDS, code) ? CODE_KINDS[code] : undefined;
}

/**
 * Classify an error payload that arrived inside an otherwise healthy stream.
 */
export function errorFromPayload(
  payload: unknown,
  ctx: ErrorContext
): ProviderContractError {
  let code: string | undefined;
  let message = 'provider reported an error mid-stream';

  const body = isRecord(payload) && isRecord(payload.error) ? payload.error : payload;
  if (isRecord(body)) {
    for (const key of ['type', 'code', 'status']) {
      const value = body[key];
      if (typeof value === 'string' && kindForCode(value)) {
        code = value;
        break;
      }
      if (typeof value === 'string' && code === undefined) code = value;
    }
    if (typeof body.message === 'string') message = body.message;
  } else if (typeof body === 'string' && body) {
    message = body;
  }

  return new ProviderContractError({
    kind: kindForCode(code) ?? 'unknown',
    message,
    provider: ctx.provider,
    api: ctx.api,
    details: code ? { code } : undefined,
  });
}

/**
 * Normalize anything thrown during an attempt into a ProviderContractError.
 */
export function parseProviderError(error: unknown, ctx: ErrorContext): ProviderContractError {
  if (error instanceof ProviderContractError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new ProviderContractError({
        kind: 'aborted',
        message: 'request aborted',
        provider: ctx.provider,
        api: ctx.api,
        cause: error,
      });
    }

    if (error.name === 'TimeoutError') {
      return new ProviderContractError({
        kind: 'network',
        message: `request timed out: ${error.message}`,
        provider: ctx.provider,
        api: ctx.api,
        cause: error,
      });
    }

    const sdkKind = kindForCode(error.name);
    if (sdkKind) {
      return new ProviderContractError({
        kind: sdkKind,
        message: error.message,
        status: sdkStatus(error),
        provider: ctx.provider,
        api: ctx.api,
        details: { code: error.name },
        cause: error,
      });
    }

    const status = sdkStatus(error);
    if (status !== undefined) {
      return new ProviderContractError({
        kind: kindForStatus(status),
        message: error.message,
        status,
        provider: ctx.provider,
        api: ctx.api,
        cause: error,
      });
    }

    // undici reports connection failures as `TypeError: fetch failed`
    if (error instanceof TypeError) {
      return new ProviderContractError({
        kind: 'network',
        message: `connection failed: ${error.message}`,
        provider: ctx.provider,
        api: ctx.api,
        cause: error,
      });
    }

    if (error instanceof SyntaxError) {
      return new ProviderContractError({
        kind: 'malformed_stream',
        message: `unparsable stream payload: ${error.message}`,
        provider: ctx.provider,
        api: ctx.api,
        cause: error,
      });
    }

    return new ProviderContractError({
      kind: 'unknown',
      message: error.message,
      provider: ctx.provider,
      api: ctx.api,
      cause: error,
    });
  }

  return new ProviderContractError({
    kind: 'unknown',
    message: String(error),
    provider: ctx.provider,
    api: ctx.api,
    cause: error,
  });
}

function sdkStatus(error: Error): number | undefined {
  const metadata: unknown = Reflect.get(error, '$metadata');
  if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
    return metadata.httpStatusCode;
  }
  return undefined;
}

export function configError(message: string, details?: Record<string, unknown>): ProviderContractError {
  return new ProviderContractError({ kind: 'config', message, details });
}
