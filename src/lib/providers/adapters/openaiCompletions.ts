/**
 * OpenAI Chat Completions streaming (`POST /chat/completions`, `stream: true`).
 *
 * Also the shape spoken by most OpenAI-compatible gateways. Tool-call
 * fragments are keyed by `index`; only the first fragment of a call carries
 * its id and name.
 */

import type {
  AdapterTarget,
  CanonicalEvent,
  CompletionRequest,
  FinishReason,
  StreamAdapter,
} from '../providerContract.js';
import { errorFromPayload, type ErrorContext } from '../errors.js';
import { guardEventStream } from '../guard.js';
import { AttemptDeadline, joinUrl, postEventStream, type FetchLike, type HttpAdapterOptions } from '../http.js';
import { count, list, malformed, parseJsonPayload, record, syntheticCallId, text } from '../payload.js';
import { readSseEvents } from '../sse.js';

interface PendingCall {
  id: string;
  name?: string;
  opened: boolean;
  closed: boolean;
  /** Fragments that arrived before the name did */
  buffered: string;
}

const FINISH_REASONS: Record<string, FinishReason> = {
  stop: 'stop',
  tool_calls: 'tool_calls',
  function_call: 'tool_calls',
  length: 'length',
  content_filter: 'content_filter',
};

export function buildCompletionsBody(request: CompletionRequest): Record<string, unknown> {
  const messages: Record<string, unknown>[] = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }

  for (const message of request.messages) {
    switch (message.role) {
      case 'user':
        messages.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        messages.push({
          role: 'assistant',
          content: message.content || null,
          ...(message.toolCalls.length > 0 && {
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function',
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          }),
        });
        break;
      case 'tool':
        messages.push({ role: 'tool', tool_call_id: message.toolCallId, content: message.content });
        break;
    }
  }

  return {
    model: request.model,
    stream: true,
    stream_options: { include_usage: true },
    messages,
    ...(request.tools.length > 0 && {
      tools: request.tools.map((tool) => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
      })),
    }),
    ...(request.maxTokens !== undefined && { max_completion_tokens: request.maxTokens }),
    ...(request.temperature !== undefined && { temperature: request.temperature }),
    ...(request.reasoning !== undefined && { reasoning_effort: request.reasoning }),
  };
}

export class OpenAICompletionsAdapter implements StreamAdapter {
  readonly api = 'openai-completions' as const;
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
      const headers: Record<string, string> = {};
      if (target.apiKey) headers.authorization = `Bearer ${target.apiKey}`;

      const body = await postEventStream(
        joinUrl(target.baseUrl, 'chat/completions'),
        headers,
        buildCompletionsBody(request),
        { fetchImpl: this.fetchImpl, deadline, ctx }
      );

      const calls = new Map<number, PendingCall>();
      let finish: FinishReason | undefined;
      let sawDone = false;

      const closeAll = function* (): Generator<CanonicalEvent> {
        const ordered = [...calls.entries()].sort(([a], [b]) => a - b);
        for (const [, call] of ordered) {
          if (call.closed) continue;
          if (!call.opened) {
            throw malformed(`tool call ${call.id} never received a name`, '', ctx);
          }
          call.closed = true;
          yield { type: 'tool_call_close', id: call.id };
        }
      };

      for await (const event of readSseEvents(body, {
        signal: deadline.signal,
        onChunk: () => deadline.touch(),
      })) {
        if (event.data.trim() === '[DONE]') {
          sawDone = true;
          break;
        }

        const chunk = parseJsonPayload(event.data, ctx);
        if (chunk.error !== undefined) {
          throw errorFromPayload(chunk, ctx);
        }

        const usage = record(chunk.usage);
        if (usage) {
          yield {
            type: 'usage',
            inputTokens: count(usage.prompt_tokens) ?? 0,
            outputTokens: count(usage.completion_tokens) ?? 0,
          };
        }

        const choice = record(list(chunk.choices)[0]);
        if (!choice) continue;
        const delta = record(choice.delta);

        if (delta) {
          const reasoning = text(delta.reasoning_content) ?? text(delta.reasoning);
          if (reasoning) yield { type: 'reasoning_delta', text: reasoning };

          const content = text(delta.content);
          if (content) yield { type: 'text_delta', text: content };

          for (const raw of list(delta.tool_calls)) {
            const fragment = record(raw);
            if (!fragment) continue;
            const index = count(fragment.index) ?? 0;
            const fn = record(fragment.function);

            let call = calls.get(index);
            if (!call) {
              call = {
                id: text(fragment.id) || syntheticCallId(),
                opened: false,
                closed: false,
                buffered: '',
              };
              calls.set(index, call);
            }
            if (call.closed) {
              throw malformed(`fragment for closed tool call ${call.id}`, event.data, ctx);
            }

            const name = text(fn?.name);
            if (!call.opened && name) {
              call.name = name;
              call.opened = true;
              yield { type: 'tool_call_open', id: call.id, name };
              if (call.buffered) {
                yield { type: 'tool_call_delta', id: call.id, fragment: call.buffered };
                call.buffered = '';
              }
            }

            const args = text(fn?.arguments);
            if (args) {
              if (call.opened) {
                yield { type: 'tool_call_delta', id: call.id, fragment: args };
              } else {
                call.buffered += args;
              }
            }
          }
        }

        const reason = text(choice.finish_reason);
        if (reason) {
          finish = FINISH_REASONS[reason] ?? 'stop';
          yield* closeAll();
        }
      }

      if (finish === undefined && !sawDone) {
        // Body ended without a finish reason or [DONE]; the guard reports it
        return;
      }

      yield* closeAll();
      yield {
        type: 'finish',
        reason: finish ?? (calls.size > 0 ? 'tool_calls' : 'stop'),
      };
    } finally {
      deadline.dispose();
    }
  }
}
