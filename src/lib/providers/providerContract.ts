/**
 * Provider Contract
 *
 * Provider-independent vocabulary shared by every stream adapter and the
 * agent loop. Adapters translate native wire formats into these types;
 * nothing above the adapter layer sees a vendor shape.
 */

import { z } from 'zod';
import type { ProviderContractError } from './errors.js';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Wire-protocol families an adapter can speak.
 */
export const API_SHAPES = [
  'openai-completions',
  'openai-responses',
  'anthropic-messages',
  'google-generative-ai',
  'bedrock-converse-stream',
] as const;

export type ApiShape = (typeof API_SHAPES)[number];

export const ApiShapeSchema = z.enum(API_SHAPES);

export function isApiShape(value: string): value is ApiShape {
  return API_SHAPES.some((shape) => shape === value);
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Reason why generation finished
 */
export type FinishReason =
  | 'stop'           // Natural completion
  | 'tool_calls'     // Model wants to call tools
  | 'length'         // Hit max tokens
  | 'content_filter'; // Safety block or refusal

export type ReasoningEffort = 'minimal' | 'low' | 'medium' | 'high';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * A tool call after its arguments have been finalized.
 */
export interface ToolCallRecord {
  id: string;
  name: string;
  arguments: JsonObject;
}

// ============================================================================
// Conversation Messages
// ============================================================================

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  reasoning?: string;
  /** Provider signature over `reasoning`; replayed so signed thinking survives tool round trips */
  reasoningSignature?: string;
  toolCalls: ToolCallRecord[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  toolName: string;
  content: string;
  isError: boolean;
}

export type ConversationMessage = UserMessage | AssistantMessage | ToolResultMessage;

/**
 * Tool definition format
 */
export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema for the arguments object */
  parameters: JsonObject;
}

/**
 * One request, bound to a single provider and shape. Never mutated once an
 * attempt has been issued with it.
 */
export interface CompletionRequest {
  readonly provider: string;
  readonly api: ApiShape;
  readonly model: string;
  readonly systemPrompt?: string;
  readonly messages: readonly ConversationMessage[];
  readonly tools: readonly ToolDefinition[];
  readonly reasoning?: ReasoningEffort;
  readonly maxTokens?: number;
  readonly temperature?: number;
}

export function freezeRequest(request: CompletionRequest): CompletionRequest {
  return Object.freeze({
    ...request,
    messages: Object.freeze([...request.messages]),
    tools: Object.freeze([...request.tools]),
  });
}

// ============================================================================
// Canonical Events
// ============================================================================

export interface TextDeltaEvent {
  type: 'text_delta';
  text: string;
}

export interface ReasoningDeltaEvent {
  type: 'reasoning_delta';
  text: string;
  /** Signature fragment for the reasoning so far; `text` is empty when only this is set */
  signature?: string;
}

export interface ToolCallOpenEvent {
  type: 'tool_call_open';
  id: string;
  name: string;
}

/**
 * An arbitrary slice of the argument payload. Only the concatenation of all
 * fragments between open and close is meaningful.
 */
export interface ToolCallDeltaEvent {
  type: 'tool_call_delta';
  id: string;
  fragment: string;
}

export interface ToolCallCloseEvent {
  type: 'tool_call_close';
  id: string;
}

export interface UsageEvent {
  type: 'usage';
  inputTokens: number;
  outputTokens: number;
}

export interface FinishEvent {
  type: 'finish';
  reason: FinishReason;
}

export interface ErrorEvent {
  type: 'error';
  error: ProviderContractError;
}

export type CanonicalEvent =
  | TextDeltaEvent
  | ReasoningDeltaEvent
  | ToolCallOpenEvent
  | ToolCallDeltaEvent
  | ToolCallCloseEvent
  | UsageEvent
  | FinishEvent
  | ErrorEvent;

export type TerminalEvent = FinishEvent | ErrorEvent;

export function isTerminalEvent(event: CanonicalEvent): event is TerminalEvent {
  return event.type === 'finish' || event.type === 'error';
}

// ============================================================================
// Stream Adapter Interface
// ============================================================================

/**
 * Where and how one attempt connects. Resolved by the router per attempt.
 */
export interface AdapterTarget {
  baseUrl: string;
  apiKey?: string;
  region?: string;
  /** Connect + first byte */
  timeoutMs: number;
  /** Longest gap between two reads */
  idleTimeoutMs: number;
}

/**
 * Each wire format implements this once. The returned sequence is lazy and
 * ends with exactly one terminal event (finish or error).
 */
export interface StreamAdapter {
  readonly api: ApiShape;
  send(
    request: CompletionRequest,
    target: AdapterTarget,
    signal: AbortSignal
  ): AsyncIterable<CanonicalEvent>;
}
