// Agent module exports
export {
  AgentLoop,
  abortableSleep,
  type AgentLoopOptions,
  type AdapterSource,
  type SleepFn,
  type TurnRouter,
} from './agentLoop.js';

export type {
  ConversationState,
  MessageQueue,
  ToolExecutionContext,
  ToolExecutionError,
  ToolExecutor,
  ToolResult,
  TurnHandle,
  TurnOptions,
  TurnResult,
  TurnState,
  TurnStats,
  TurnStreamItem,
} from './types.js';

export { ToolArgumentValidator, type ArgumentCheck } from './toolArguments.js';

export { ToolCallTracker, type CompletedToolCall } from './toolCalls.js';

export {
  BackoffSchedule,
  RetryPolicy,
  classifyError,
  createRetryPolicy,
  type BackoffOptions,
  type ChainState,
  type Disposition,
  type RetryAction,
  type RetryPolicyOptions,
} from './retryPolicy.js';
