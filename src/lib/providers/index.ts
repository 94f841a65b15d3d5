// Providers module exports
// Provider Contract - canonical events and request types
export {
  API_SHAPES,
  ApiShapeSchema,
  isApiShape,
  isTerminalEvent,
  freezeRequest,
  type AdapterTarget,
  type ApiShape,
  type AssistantMessage,
  type CanonicalEvent,
  type CompletionRequest,
  type ConversationMessage,
  type FinishReason,
  type JsonObject,
  type JsonValue,
  type ReasoningEffort,
  type StreamAdapter,
  type TokenUsage,
  type ToolCallRecord,
  type ToolDefinition,
  type ToolResultMessage,
  type UserMessage,
} from './providerContract.js';

// Error taxonomy
export {
  ProviderContractError,
  parseProviderError,
  isTransient,
  kindForStatus,
  parseRetryAfter,
  type ErrorKind,
} from './errors.js';

// Transport
export { SseParser, readSseEvents, type SseEvent } from './sse.js';
export { type FetchLike } from './http.js';

// Adapters
export { OpenAICompletionsAdapter } from './adapters/openaiCompletions.js';
export { OpenAIResponsesAdapter } from './adapters/openaiResponses.js';
export { AnthropicMessagesAdapter } from './adapters/anthropicMessages.js';
export { GoogleGenerativeAiAdapter } from './adapters/googleGenerativeAi.js';
export { BedrockConverseAdapter, type ConverseStreamFn } from './adapters/bedrockConverse.js';
export { AdapterRegistry, createDefaultAdapterRegistry } from './adapters/registry.js';
