/**
 * Agent Loop
 *
 * Drives one turn: route, stream, track tool calls, dispatch tools, repeat
 * until the model stops asking for tools. Failed attempts go through the
 * retry policy; a shape mismatch takes the router's one-shot fallback hop.
 *
 *   idle -> sending -> streaming -> tool_dispatch -> sending ... -> completed
 *                                                              \-> aborted
 *                                                              \-> failed
 *
 * One turn runs at a time per conversation. Independent loops share nothing
 * mutable except the metrics recorder.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { v7 as uuidv7 } from 'uuid';
import { abortable } from '../core/abortable.js';
import { EventChannel } from '../core/channel.js';
import { silentLogger, type Logger } from '../core/logger.js';
import {
  freezeRequest,
  type ApiShape,
  type AssistantMessage,
  type CompletionRequest,
  type ConversationMessage,
  type FinishReason,
  type StreamAdapter,
  type TokenUsage,
  type ToolDefinition,
  type ToolResultMessage,
  type UserMessage,
} from '../providers/providerContract.js';
import { ProviderContractError, parseProviderError } from '../providers/errors.js';
import type { RouteTarget, RoutingDecision } from '../routing/router.js';
import { noopMetrics, type MetricsRecorder } from '../metrics/metricsEmitter.js';
import { RetryPolicy, BackoffSchedule } from './retryPolicy.js';
import { ToolArgumentValidator } from './toolArguments.js';
import { ToolCallTracker, type CompletedToolCall } from './toolCalls.js';
import type {
  ConversationState,
  MessageQueue,
  ToolExecutor,
  ToolResult,
  TurnHandle,
  TurnOptions,
  TurnResult,
  TurnState,
  TurnStats,
  TurnStreamItem,
} from './types.js';

// ----------------------------------------------------------------------------
// Collaborator seams
// ----------------------------------------------------------------------------

export interface TurnRouter {
  resolve(target?: RouteTarget): RoutingDecision;
  fallbackFor(decision: RoutingDecision): RoutingDecision | undefined;
  refresh(decision: RoutingDecision): RoutingDecision;
}

export interface AdapterSource {
  get(api: ApiShape): StreamAdapter;
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface AgentLoopOptions {
  router: TurnRouter;
  adapters: AdapterSource;
  tools?: ToolExecutor;
  metrics?: MetricsRecorder;
  logger?: Logger;
  retry?: RetryPolicy;
  /** Model calls allowed per turn */
  maxSteps?: number;
  sleep?: SleepFn;
  now?: () => number;
}

const DEFAULT_MAX_STEPS = 24;
const SKIPPED_FOR_STEERING = 'Skipped: a newer user message arrived before this call ran.';

export const abortableSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) throw signal.reason;
    throw error;
  }
};

// ----------------------------------------------------------------------------
// Turn bookkeeping
// ----------------------------------------------------------------------------

interface StepOutcome {
  assistant: AssistantMessage;
  calls: CompletedToolCall[];
  finish: FinishReason;
}

interface AttemptOutcome {
  text: string;
  reasoning: string;
  reasoningSignature: string;
  usage?: TokenUsage;
  finish?: FinishReason;
  error?: ProviderContractError;
}

class Turn implements TurnHandle {
  readonly channel = new EventChannel<TurnStreamItem>();
  readonly controller = new AbortController();
  readonly result: Promise<TurnResult>;
  /** Tool calls left undispatched when the abort landed */
  cancelled: string[] = [];
  private current: TurnState = 'idle';
  private settle: (result: TurnResult) => void = () => undefined;

  constructor(readonly id: string) {
    this.result = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get events(): AsyncIterable<TurnStreamItem> {
    return this.channel;
  }

  get state(): TurnState {
    return this.current;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get terminal(): boolean {
    return this.current === 'completed' || this.current === 'aborted' || this.current === 'failed';
  }

  enter(state: TurnState): void {
    if (!this.terminal) this.current = state;
  }

  abort(): void {
    if (this.terminal || this.signal.aborted) return;
    this.controller.abort(
      new ProviderContractError({ kind: 'aborted', message: 'turn aborted by caller' })
    );
  }

  finish(result: TurnResult): void {
    this.current = result.status;
    this.channel.push({ type: 'turn_end', result });
    this.channel.close();
    this.settle(result);
  }
}

// ----------------------------------------------------------------------------
// AgentLoop
// ----------------------------------------------------------------------------

export class AgentLoop {
  private readonly router: TurnRouter;
  private readonly adapters: AdapterSource;
  private readonly tools?: ToolExecutor;
  private readonly metrics: MetricsRecorder;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly maxSteps: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly turns = new Map<string, Turn>();
  private readonly validator = new ToolArgumentValidator();

  constructor(options: AgentLoopOptions) {
    this.router = options.router;
    this.adapters = options.adapters;
    this.tools = options.tools;
    this.metrics = options.metrics ?? noopMetrics;
    this.logger = options.logger ?? silentLogger();
    this.retry =
      options.retry ??
      new RetryPolicy({ maxAttempts: 4, backoff: new BackoffSchedule({ baseMs: 250, maxMs: 8000, jitter: 0.2 }) });
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start a turn. Output streams through `handle.events`; the outcome is
   * also available as `handle.result`, which never rejects.
   */
  beginTurn(state: ConversationState, options: TurnOptions = {}): TurnHandle {
    const turn = new Turn(uuidv7());
    this.turns.set(turn.id, turn);

    const external = options.signal;
    const onExternalAbort = () => turn.abort();
    if (external?.aborted) {
      turn.abort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    this.runTurn(turn, state, options)
      .catch((error: unknown) => {
        // runTurn settles every outcome itself; this only guards against bugs
        this.logger.error({ err: error, turnId: turn.id }, 'turn crashed');
        if (!turn.terminal) {
          turn.finish({
            turnId: turn.id,
            status: 'failed',
            error: parseProviderError(error, {}),
            messages: [],
            stats: emptyStats(),
          });
        }
      })
      .finally(() => {
        external?.removeEventListener('abort', onExternalAbort);
        this.turns.delete(turn.id);
      });

    return turn;
  }

  /**
   * Cancel a turn. Safe to call repeatedly or after the turn has ended.
   */
  abort(handle: TurnHandle | string): void {
    const id = typeof handle === 'string' ? handle : handle.id;
    this.turns.get(id)?.abort();
  }

  private async runTurn(turn: Turn, state: ConversationState, options: TurnOptions): Promise<void> {
    const target = options.target ?? {};
    const log = this.logger.child({ turnId: turn.id });
    const started = this.now();
    const appended: ConversationMessage[] = [];
    const stats = emptyStats();
    // profile -> fallback decision, remembered for the rest of the turn's chains
    const shapeMemory = new Map<string, RoutingDecision>();

    this.metrics.emit(turn.id, { type: 'turn_started', target: describeTarget(target) });
    log.debug({ target: describeTarget(target) }, 'turn started');

    let result: TurnResult;
    try {
      for (let step = 1; ; step++) {
        if (step > this.maxSteps) {
          throw new ProviderContractError({
            kind: 'step_limit',
            message: `turn exceeded ${this.maxSteps} model calls without finishing`,
          });
        }
        stats.steps = step;

        const outcome = await this.runStep(turn, state, appended, target, step, stats, shapeMemory, log);
        appended.push(outcome.assistant);

        if (outcome.calls.length === 0) {
          // Steering queued meanwhile comes first, then follow-ups
          let queued = await this.pull(turn, options.getSteeringMessages);
          if (queued.length === 0) queued = await this.pull(turn, options.getFollowUpMessages);
          if (queued.length === 0) {
            stats.durationMs = this.now() - started;
            result = { turnId: turn.id, status: 'completed', finishReason: outcome.finish, messages: appended, stats };
            break;
          }
          this.inject(turn, queued, appended, step, log);
          continue;
        }

        turn.enter('tool_dispatch');
        const steering = await this.dispatchTools(turn, state, outcome.calls, appended, step, stats, log, options);
        this.inject(turn, steering, appended, step, log);
      }
    } catch (error) {
      stats.durationMs = this.now() - started;
      const failure = parseProviderError(error, {});
      if (turn.signal.aborted || failure.kind === 'aborted') {
        result = { turnId: turn.id, status: 'aborted', cancelledToolCalls: turn.cancelled, messages: appended, stats };
      } else {
        result = { turnId: turn.id, status: 'failed', error: failure, messages: appended, stats };
      }
    }

    this.metrics.emit(turn.id, {
      type: 'turn_finished',
      status: result.status,
      steps: stats.steps,
      attempts: stats.attempts,
      retries: stats.retries,
      fallbacks: stats.fallbacks,
      durationMs: stats.durationMs,
      usage: { ...stats.usage },
      ...(result.status === 'failed' && { errorKind: result.error.kind }),
    });

    if (result.status === 'failed') {
      log.warn({ err: result.error, kind: result.error.kind, stats }, 'turn failed');
    } else {
      log.info({ status: result.status, stats }, 'turn finished');
    }
    turn.finish(result);
  }

  /**
   * One model call, including every retry and the fallback hop.
   */
  private async runStep(
    turn: Turn,
    state: ConversationState,
    appended: readonly ConversationMessage[],
    target: RouteTarget,
    step: number,
    stats: TurnStats,
    shapeMemory: Map<string, RoutingDecision>,
    log: Logger
  ): Promise<StepOutcome> {
    let attemptsUsed = 0;
    let fallbackUsed = false;
    let hopPending = false;
    let next: RoutingDecision | undefined;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(turn.signal);
      turn.enter('sending');

      let decision = next;
      if (!decision) {
        decision = this.router.resolve(target);
        const remembered = shapeMemory.get(decision.profile);
        if (remembered) decision = this.router.refresh(remembered);
      }
      next = undefined;

      // The fallback hop does not use a slot of the retry budget
      if (!hopPending) attemptsUsed += 1;
      hopPending = false;
      stats.attempts += 1;

      const request = freezeRequest({
        provider: decision.provider,
        api: decision.api,
        model: decision.model,
        systemPrompt: state.systemPrompt,
        messages: [...state.messages, ...appended],
        tools: state.tools ?? [],
        reasoning: state.reasoning ?? decision.reasoning,
        maxTokens: state.maxTokens ?? decision.maxTokens,
        temperature: decision.temperature,
      });

      this.metrics.emit(turn.id, {
        type: 'attempt_started',
        step,
        attempt,
        profile: decision.profile,
        api: decision.api,
        model: decision.model,
      });
      log.debug({ step, attempt, profile: decision.profile, api: decision.api, model: decision.model }, 'attempt started');

      const tracker = new ToolCallTracker({ provider: decision.provider, api: decision.api });
      const attemptStart = this.now();
      const outcome = await this.consume(turn, this.adapters.get(decision.api), request, decision, tracker, step, attempt);
      const latencyMs = this.now() - attemptStart;

      if (outcome.error === undefined && outcome.finish !== undefined) {
        const calls = tracker.completed();
        const usage = outcome.usage ?? { inputTokens: 0, outputTokens: 0 };
        stats.usage.inputTokens += usage.inputTokens;
        stats.usage.outputTokens += usage.outputTokens;

        this.metrics.emit(turn.id, {
          type: 'attempt_succeeded',
          step,
          attempt,
          profile: decision.profile,
          api: decision.api,
          latencyMs,
          usage,
        });

        return {
          assistant: {
            role: 'assistant',
            content: outcome.text,
            ...(outcome.reasoning ? { reasoning: outcome.reasoning } : {}),
            ...(outcome.reasoningSignature ? { reasoningSignature: outcome.reasoningSignature } : {}),
            toolCalls: calls.map((call) => ({ id: call.id, name: call.name, arguments: call.arguments })),
          },
          calls,
          // Some providers say "stop" even when they emitted tool calls
          finish: calls.length > 0 ? 'tool_calls' : outcome.finish,
        };
      }

      const error =
        outcome.error ??
        new ProviderContractError({
          kind: 'malformed_stream',
          message: 'stream ended without a finish reason',
          provider: decision.provider,
          api: decision.api,
        });

      this.metrics.emit(turn.id, {
        type: 'attempt_failed',
        step,
        attempt,
        profile: decision.profile,
        api: decision.api,
        kind: error.kind,
        message: error.message,
        latencyMs,
      });

      if (turn.signal.aborted) {
        turn.cancelled = [...tracker.openIds(), ...tracker.completed().map((call) => call.id)];
        throw turn.signal.reason;
      }

      // Only a shape mismatch can use the hop; resolve it lazily so a
      // missing fallback credential surfaces as a config error
      const fallback =
        error.kind === 'shape_mismatch' && !fallbackUsed ? this.router.fallbackFor(decision) : undefined;
      const action = this.retry.decide(error, {
        attemptsUsed,
        fallbackUsed,
        fallbackAvailable: fallback !== undefined,
      });

      switch (action.action) {
        case 'fallback':
          if (!fallback) throw error;
          fallbackUsed = true;
          hopPending = true;
          stats.fallbacks += 1;
          shapeMemory.set(decision.profile, fallback);
          next = fallback;
          this.metrics.emit(turn.id, {
            type: 'shape_fallback',
            step,
            profile: decision.profile,
            from: decision.api,
            to: fallback.api,
          });
          log.info({ step, profile: decision.profile, from: decision.api, to: fallback.api }, 'api shape fallback');
          break;

        case 'retry':
          stats.retries += 1;
          this.metrics.emit(turn.id, {
            type: 'retry_scheduled',
            step,
            attempt,
            delayMs: action.delayMs,
            kind: error.kind,
          });
          log.warn({ step, attempt, kind: error.kind, delayMs: action.delayMs, err: error }, 'attempt failed, retrying');
          await this.sleep(action.delayMs, turn.signal);
          break;

        case 'abort':
          throw turn.signal.aborted ? turn.signal.reason : error;

        case 'fail':
          throw error;
      }
    }
  }

  /**
   * Consume one adapter stream. Canonical events are forwarded live, except
   * the terminal error of a failed attempt, which only the policy sees.
   */
  private async consume(
    turn: Turn,
    adapter: StreamAdapter,
    request: CompletionRequest,
    decision: RoutingDecision,
    tracker: ToolCallTracker,
    step: number,
    attempt: number
  ): Promise<AttemptOutcome> {
    const outcome: AttemptOutcome = { text: '', reasoning: '', reasoningSignature: '' };
    const iterator = adapter.send(request, decision.target, turn.signal)[Symbol.asyncIterator]();
    let finished = false;

    try {
      for (;;) {
        const next = await abortable(iterator.next(), turn.signal);
        if (next.done) {
          finished = true;
          return outcome;
        }
        const event = next.value;
        turn.enter('streaming');

        switch (event.type) {
          case 'error':
            outcome.error = event.error;
            finished = true;
            return outcome;
          case 'finish':
            tracker.assertAllClosed();
            outcome.finish = event.reason;
            break;
          case 'text_delta':
            outcome.text += event.text;
            break;
          case 'reasoning_delta':
            outcome.reasoning += event.text;
            if (event.signature) outcome.reasoningSignature += event.signature;
            break;
          case 'usage':
            outcome.usage = { inputTokens: event.inputTokens, outputTokens: event.outputTokens };
            break;
          default:
            tracker.apply(event);
            break;
        }

        turn.channel.push({ type: 'event', step, attempt, event });
        if (event.type === 'finish') {
          finished = true;
          return outcome;
        }
      }
    } catch (error) {
      outcome.error = parseProviderError(error, { provider: decision.provider, api: decision.api });
      return outcome;
    } finally {
      if (!finished) {
        // Do not wait: a stalled read settles once the adapter sees the abort
        iterator.return?.().catch((error: unknown) => {
          this.logger.debug({ err: error, api: decision.api }, 'adapter stream cleanup failed');
        });
      } else {
        await iterator.return?.();
      }
    }
  }

  /**
   * Run completed tool calls strictly one after another; each result is
   * appended before the next call starts. Steering messages are polled after
   * every call; once some arrive the remaining calls are skipped and the
   * messages are returned for the next model call.
   */
  private async dispatchTools(
    turn: Turn,
    state: ConversationState,
    calls: CompletedToolCall[],
    appended: ConversationMessage[],
    step: number,
    stats: TurnStats,
    log: Logger,
    options: TurnOptions
  ): Promise<UserMessage[]> {
    const declared = new Map((state.tools ?? []).map((tool) => [tool.name, tool]));

    for (const [index, call] of calls.entries()) {
      if (turn.signal.aborted) {
        turn.cancelled = calls.slice(index).map((pending) => pending.id);
        throw turn.signal.reason;
      }

      const started = this.now();
      const tool = declared.get(call.name);
      let result: ToolResult;
      if (call.parseError) {
        result = { ok: false, error: { message: `Invalid arguments for tool "${call.name}": ${call.parseError}` } };
      } else if (!tool || !this.tools) {
        result = { ok: false, error: { message: `Tool "${call.name}" is not available` } };
      } else {
        result = await this.execute(turn, calls, index, tool, this.tools);
      }
      stats.toolExecutions += 1;

      const message: ToolResultMessage = {
        role: 'tool',
        toolCallId: call.id,
        toolName: call.name,
        content: result.ok ? stringifyToolValue(result.value) : result.error.message,
        isError: !result.ok,
      };
      appended.push(message);
      turn.channel.push({
        type: 'tool_result',
        step,
        toolCallId: call.id,
        toolName: call.name,
        isError: message.isError,
        content: message.content,
      });

      const durationMs = this.now() - started;
      this.metrics.emit(turn.id, {
        type: 'tool_executed',
        step,
        toolName: call.name,
        toolCallId: call.id,
        ok: result.ok,
        durationMs,
      });
      log.debug({ step, tool: call.name, toolCallId: call.id, ok: result.ok, durationMs }, 'tool executed');

      if (!result.ok && result.error.fatal) {
        turn.cancelled = calls.slice(index + 1).map((pending) => pending.id);
        throw new ProviderContractError({
          kind: 'tool_execution',
          message: `Tool "${call.name}" failed fatally: ${result.error.message}`,
          details: { toolCallId: call.id, toolName: call.name },
        });
      }

      const steering = await this.pull(turn, options.getSteeringMessages);
      if (steering.length > 0) {
        this.skipCalls(turn, calls.slice(index + 1), appended, step);
        return steering;
      }
    }
    return [];
  }

  /**
   * Check the arguments against the tool's schema, then run it. Arguments
   * that fail the check never reach the executor.
   */
  private async execute(
    turn: Turn,
    calls: CompletedToolCall[],
    index: number,
    tool: ToolDefinition,
    executor: ToolExecutor
  ): Promise<ToolResult> {
    const call = calls[index];
    const check = this.validator.check(tool, call.arguments);
    if (!check.ok) return { ok: false, error: { message: check.message } };

    try {
      return await abortable(
        executor.execute(call.name, call.arguments, { toolCallId: call.id, signal: turn.signal }),
        turn.signal
      );
    } catch (error) {
      if (turn.signal.aborted) {
        turn.cancelled = calls.slice(index).map((pending) => pending.id);
        throw turn.signal.reason;
      }
      return { ok: false, error: { message: error instanceof Error ? error.message : String(error) } };
    }
  }

  /**
   * Answer calls the model asked for but that were overtaken by a steering
   * message, so every tool call still gets a result.
   */
  private skipCalls(turn: Turn, calls: CompletedToolCall[], appended: ConversationMessage[], step: number): void {
    for (const call of calls) {
      const message: ToolResultMessage = {
        role: 'tool',
        toolCallId: call.id,
        toolName: call.name,
        content: SKIPPED_FOR_STEERING,
        isError: true,
      };
      appended.push(message);
      turn.channel.push({
        type: 'tool_result',
        step,
        toolCallId: call.id,
        toolName: call.name,
        isError: true,
        content: message.content,
      });
    }
  }

  private async pull(turn: Turn, queue: MessageQueue | undefined): Promise<UserMessage[]> {
    if (!queue) return [];
    const messages = await abortable(Promise.resolve(queue()), turn.signal);
    return [...messages];
  }

  private inject(turn: Turn, messages: UserMessage[], appended: ConversationMessage[], step: number, log: Logger): void {
    if (messages.length === 0) return;
    for (const message of messages) {
      appended.push(message);
      turn.channel.push({ type: 'user_message', step, message });
    }
    log.debug({ step, count: messages.length }, 'queued user messages injected');
  }
}

// ----------------------------------------------------------------------------
// Helpers
// ----------------------------------------------------------------------------

function emptyStats(): TurnStats {
  return {
    steps: 0,
    attempts: 0,
    retries: 0,
    fallbacks: 0,
    toolExecutions: 0,
    usage: { inputTokens: 0, outputTokens: 0 },
    durationMs: 0,
  };
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw signal.reason;
}

function describeTarget(target: RouteTarget): string {
  if (!target.provider && !target.model) return '(default)';
  return target.model ? `${target.provider ?? '(default)'}/${target.model}` : (target.provider ?? '(default)');
}

function stringifyToolValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
