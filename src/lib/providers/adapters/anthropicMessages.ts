/**
 * Anthropic Messages streaming (`POST /messages`).
 *
 * Content arrives as indexed blocks; a `tool_use` block streams its input as
 * `input_json_delta` fragments and ends with `content_block_stop`.
 */

import type {
  AdapterTarget,
  CanonicalEvent,
  CompletionRequest,
  FinishReason,
  ReasoningEffort,
  StreamAdapter,
} from '../providerContract.js';
import { errorFromPayload, type ErrorContext } from '../errors.js';
import { guardEventStream } from '../guard.js';
import { AttemptDeadline, joinUrl, postEventStream, type FetchLike, type HttpAdapterOptions } from '../http.js';
import { count, malformed, parseJsonPayload, record, text } from '../payload.js';
import { readSseEvents } from '../sse.js';

export const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

const THINKING_BUDGETS: Record<ReasoningEffort, number> = {
  minimal: 1024,
  low: 2048,
  medium: 8192,
  high: 16384,
};

const STOP_REASONS: Record<string, FinishReason> = {
  end_turn: 'stop',
  stop_sequence: 'stop',
  pause_turn: 'stop',
  tool_use: 'tool_calls',
  max_tokens: 'length',
  refusal: 'content_filter',
};

export function buildMessagesBody(request: CompletionRequest): Record<string, unknown> {
  const messages: Record<string, unknown>[] = [];
  // Consecutive tool results share one user turn
  let pendingResults: Record<string, unknown>[] = [];

  const flushResults = () => {
    if (pendingResults.length > 0) {
      messages.push({ role: 'user', content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of request.messages) {
    if (message.role === 'tool') {
      pendingResults.push({
        type: 'tool_result',
        tool_use_id: message.toolCallId,
        content: message.content,
        ...(message.isError && { is_error: true }),
      });
      continue;
    }

    flushResults();
    if (message.role === 'user') {
      messages.push({ role: 'user', content: message.content });
      continue;
    }

    const content: Record<string, unknown>[] = [];
    // Unsigned reasoning from another provider cannot be replayed as thinking
    if (message.reasoning && message.reasoningSignature) {
      content.push({ type: 'thinking', thinking: message.reasoning, signature: message.reasoningSignature });
    }
    if (message.content) content.push({ type: 'text', text: message.content });
    for (const call of message.toolCalls) {
      content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
    }
    if (content.length > 0) messages.push({ role: 'assistant', content });
  }
  flushResults();

  const budget = request.reasoning ? THINKING_BUDGETS[request.reasoning] : undefined;
  const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    model: request.model,
    stream: true,
    max_tokens: budget !== undefined ? Math.max(maxTokens, budget + 1024) : maxTokens,
    messages,
    ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
    ...(request.tools.length > 0 && {
      tools: request.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters,
      })),
    }),
    // Extended thinking rejects a custom temperature
    ...(budget !== undefined
      ? { thinking: { type: 'enabled', budget_tokens: budget } }
      : request.temperature !== undefined
        ? { temperature: request.temperature }
        : {}),
  };
}

export class AnthropicMessagesAdapter implements StreamAdapter {
  readonly api = 'anthropic-messages' as const;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpAdapterOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  send(
    request: CompletionRequest,
    target: AdapterTarget,
    signal: AbortSignal
  ): AsyncIterable<CanonicalEvent> {
    const ctx: ErrorContext = { provider: request.provider, api: this.api };
    return guardEventStream(this.stream(request, target, signal, ctx), ctx);
  }

  private async *stream(
    request: CompletionRequest,
    target: AdapterTarget,
    signal: AbortSignal,
    ctx: ErrorContext
  ): AsyncGenerator<CanonicalEvent> {
    const deadline = new AttemptDeadline(signal, target, ctx);
    try {
      const headers: Record<string, string> = { 'anthropic-version': ANTHROPIC_VERSION };
      if (target.apiKey) headers['x-api-key'] = target.apiKey;

      const body = await postEventStream(
        joinUrl(target.baseUrl, 'messages'),
        headers,
        buildMessagesBody(request),
        { fetchImpl: this.fetchImpl, deadline, ctx }
      );

      // block index -> tool call id, for open tool_use blocks
      const toolBlocks = new Map<number, string>();
      let inputTokens = 0;
      let outputTokens = 0;
      let finish: FinishReason | undefined;

      for await (const event of readSseEvents(body, {
        signal: deadline.signal,
        onChunk: () => deadline.touch(),
      })) {
        const payload = parseJsonPayload(event.data, ctx);

        switch (text(payload.type) ?? event.event) {
          case 'message_start': {
            const usage = record(record(payload.message)?.usage);
            inputTokens = count(usage?.input_tokens) ?? inputTokens;
            outputTokens = count(usage?.output_tokens) ?? outputTokens;
            break;
          }

          case 'content_block_start': {
            const index = count(payload.index) ?? 0;
            const block = record(payload.content_block);
            if (block?.type === 'tool_use') {
              const id = text(block.id);
              const name = text(block.name);
              if (!id || !name) throw malformed('tool_use block without id or name', event.data, ctx);
              toolBlocks.set(index, id);
              yield { type: 'tool_call_open', id, name };
            } else if (block?.type === 'text') {
              const initial = text(block.text);
              if (initial) yield { type: 'text_delta', text: initial };
            }
            break;
          }

          case 'content_block_delta': {
            const index = count(payload.index) ?? 0;
            const delta = record(payload.delta);
            switch (delta?.type) {
              case 'text_delta': {
                const value = text(delta.text);
                if (value) yield { type: 'text_delta', text: value };
                break;
              }
              case 'thinking_delta': {
                const value = text(delta.thinking);
                if (value) yield { type: 'reasoning_delta', text: value };
                break;
              }
              case 'input_json_delta': {
                const id = toolBlocks.get(index);
                if (!id) throw malformed(`input delta for block ${index} without an open tool call`, event.data, ctx);
                const fragment = text(delta.partial_json);
                if (fragment) yield { type: 'tool_call_delta', id, fragment };
                break;
              }
              case 'signature_delta': {
                const signature = text(delta.signature);
                if (signature) yield { type: 'reasoning_delta', text: '', signature };
                break;
              }
              default:
                break;
            }
            break;
          }

          case 'content_block_stop': {
            const index = count(payload.index) ?? 0;
            const id = toolBlocks.get(index);
            if (id) {
              toolBlocks.delete(index);
              yield { type: 'tool_call_close', id };
            }
            break;
          }

          case 'message_delta': {
            const reason = text(record(payload.delta)?.stop_reason);
            if (reason) finish = STOP_REASONS[reason] ?? 'stop';
            outputTokens = count(record(payload.usage)?.output_tokens) ?? outputTokens;
            break;
          }

          case 'message_stop':
            // Unclosed tool_use blocks are left for the loop to report
            yield { type: 'usage', inputTokens, outputTokens };
            yield { type: 'finish', reason: finish ?? 'stop' };
            return;

          case 'error':
            throw errorFromPayload(payload, ctx);

          default:
            // ping
            break;
        }
      }
    } finally {
      deadline.dispose();
    }
  }
}
