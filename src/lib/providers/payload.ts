/**
 * Accessors for provider JSON payloads. Wire payloads are `unknown` until a
 * field has been checked; these keep the adapters free of casts.
 */

import { v7 as uuidv7 } from 'uuid';
import { ProviderContractError, isRecord, type ErrorContext } from './errors.js';

export type Payload = Record<string, unknown>;

export function parseJsonPayload(data: string, ctx: ErrorContext): Payload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw malformed('stream payload is not valid JSON', data, ctx, error);
  }
  if (!isRecord(parsed)) {
    throw malformed('stream payload is not a JSON object', data, ctx);
  }
  return parsed;
}

export function record(value: unknown): Payload | undefined {
  return isRecord(value) ? value : undefined;
}

export function text(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function count(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Id for a tool call the provider sent without one. Ids must stay unique
 * across every step of a turn, so they cannot come from a per-stream counter.
 */
export function syntheticCallId(): string {
  return `call_${uuidv7()}`;
}

export function malformed(
  message: string,
  data: string,
  ctx: ErrorContext,
  cause?: unknown
): ProviderContractError {
  return new ProviderContractError({
    kind: 'malformed_stream',
    message,
    provider: ctx.provider,
    api: ctx.api,
    details: { payload: data.length > 200 ? `${data.slice(0, 200)}…` : data },
    cause,
  });
}
