import type {
  CanonicalEvent,
  ConversationMessage,
  FinishReason,
  JsonObject,
  JsonValue,
  ReasoningEffort,
  TokenUsage,
  ToolDefinition,
  UserMessage,
} from '../providers/providerContract.js';
import type { ProviderContractError } from '../providers/errors.js';
import type { RouteTarget } from '../routing/router.js';

/**
 * Everything the caller owns about a conversation. The loop never mutates
 * it; the TurnResult carries the messages a turn appended.
 */
export interface ConversationState {
  systemPrompt?: string;
  messages: readonly ConversationMessage[];
  tools?: readonly ToolDefinition[];
  /** Overrides the profile's setting for this turn */
  reasoning?: ReasoningEffort;
  maxTokens?: number;
}

// ============================================================================
// Tool Executor collaborator
// ============================================================================

export interface ToolExecutionError {
  message: string;
  /** A fatal error fails the turn instead of becoming a tool result */
  fatal?: boolean;
}

export type ToolResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: ToolExecutionError };

export interface ToolExecutionContext {
  toolCallId: string;
  /** Aborts when the turn is aborted */
  signal: AbortSignal;
}

export interface ToolExecutor {
  execute(name: string, args: JsonObject, context: ToolExecutionContext): Promise<ToolResult>;
}

// ============================================================================
// Turn
// ============================================================================

export type TurnState =
  | 'idle'
  | 'sending'
  | 'streaming'
  | 'tool_dispatch'
  | 'completed'
  | 'aborted'
  | 'failed';

export interface TurnStats {
  /** Request/response cycles (one per tool round trip) */
  steps: number;
  /** Network attempts including retries and fallback hops */
  attempts: number;
  retries: number;
  fallbacks: number;
  toolExecutions: number;
  usage: TokenUsage;
  durationMs: number;
}

interface TurnResultBase {
  turnId: string;
  /** Messages this turn appended, in order */
  messages: ConversationMessage[];
  stats: TurnStats;
}

export type TurnResult =
  | (TurnResultBase & { status: 'completed'; finishReason: FinishReason })
  | (TurnResultBase & {
      status: 'aborted';
      /** Tool calls that were open or pending when the abort landed */
      cancelledToolCalls: string[];
    })
  | (TurnResultBase & { status: 'failed'; error: ProviderContractError });

/**
 * One item of a turn's output stream: a canonical event tagged with the
 * step and attempt that produced it, or the final result.
 */
export type TurnStreamItem =
  | { type: 'event'; step: number; attempt: number; event: CanonicalEvent }
  | { type: 'tool_result'; step: number; toolCallId: string; toolName: string; isError: boolean; content: string }
  | { type: 'user_message'; step: number; message: UserMessage }
  | { type: 'turn_end'; result: TurnResult };

/** Drains messages the caller queued while the turn was running */
export type MessageQueue = () => readonly UserMessage[] | Promise<readonly UserMessage[]>;

export interface TurnOptions {
  target?: RouteTarget;
  signal?: AbortSignal;
  /**
   * Polled after every tool call and when the model stops. Messages found
   * after a tool call skip the step's remaining calls.
   */
  getSteeringMessages?: MessageQueue;
  /** Polled once the model stops and no steering is queued; non-empty keeps the turn going */
  getFollowUpMessages?: MessageQueue;
}

export interface TurnHandle {
  readonly id: string;
  /** Single-consumer stream; ends after the `turn_end` item */
  readonly events: AsyncIterable<TurnStreamItem>;
  readonly result: Promise<TurnResult>;
  readonly state: TurnState;
}
