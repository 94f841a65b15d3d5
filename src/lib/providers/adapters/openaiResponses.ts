/**
 * OpenAI Responses API streaming (`POST /responses`).
 *
 * Typed SSE events. Function-call argument deltas reference the output item
 * id, so the adapter maps item ids to the `call_id` the conversation uses.
 * Endpoints that do not serve this shape answer 404, which the router turns
 * into a hop to `openai-completions`.
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
import { count, malformed, parseJsonPayload, record, text, type Payload } from '../payload.js';
import { readSseEvents } from '../sse.js';

interface ItemCall {
  callId: string;
  streamed: boolean;
  closed: boolean;
}

export function buildResponsesBody(request: CompletionRequest): Record<string, unknown> {
  const input: Record<string, unknown>[] = [];

  for (const message of request.messages) {
    switch (message.role) {
      case 'user':
        input.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.content) {
          input.push({ role: 'assistant', content: message.content });
        }
        for (const call of message.toolCalls) {
          input.push({
            type: 'function_call',
            call_id: call.id,
            name: call.name,
            arguments: JSON.stringify(call.arguments),
          });
        }
        break;
      case 'tool':
        input.push({ type: 'function_call_output', call_id: message.toolCallId, output: message.content });
        break;
    }
  }

  return {
    model: request.model,
    stream: true,
    store: false,
    input,
    ...(request.systemPrompt ? { instructions: request.systemPrompt } : {}),
    ...(request.tools.length > 0 && {
      tools: request.tools.map((tool) => ({
        type: 'function',
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      })),
    }),
    ...(request.maxTokens !== undefined && { max_output_tokens: request.maxTokens }),
    ...(request.temperature !== undefined && { temperature: request.temperature }),
    ...(request.reasoning !== undefined && { reasoning: { effort: request.reasoning } }),
  };
}

export class OpenAIResponsesAdapter implements StreamAdapter {
  readonly api = 'openai-responses' as const;
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
        joinUrl(target.baseUrl, 'responses'),
        headers,
        buildResponsesBody(request),
        { fetchImpl: this.fetchImpl, deadline, ctx }
      );

      const items = new Map<string, ItemCall>();
      let sawCalls = false;

      const closeItem = function* (item: ItemCall, args: string | undefined): Generator<CanonicalEvent> {
        if (item.closed) return;
        // Some servers only send the full arguments on completion
        if (!item.streamed && args) {
          yield { type: 'tool_call_delta', id: item.callId, fragment: args };
        }
        item.closed = true;
        yield { type: 'tool_call_close', id: item.callId };
      };

      const finishWith = function* (response: Payload | undefined, reason: FinishReason): Generator<CanonicalEvent> {
        for (const item of items.values()) yield* closeItem(item, undefined);
        const usage = record(response?.usage);
        if (usage) {
          yield {
            type: 'usage',
            inputTokens: count(usage.input_tokens) ?? 0,
            outputTokens: count(usage.output_tokens) ?? 0,
          };
        }
        yield { type: 'finish', reason };
      };

      for await (const event of readSseEvents(body, {
        signal: deadline.signal,
        onChunk: () => deadline.touch(),
      })) {
        const payload = parseJsonPayload(event.data, ctx);
        const type = text(payload.type) ?? event.event;

        switch (type) {
          case 'response.output_text.delta': {
            const delta = text(payload.delta);
            if (delta) yield { type: 'text_delta', text: delta };
            break;
          }

          case 'response.reasoning_summary_text.delta':
          case 'response.reasoning_text.delta': {
            const delta = text(payload.delta);
            if (delta) yield { type: 'reasoning_delta', text: delta };
            break;
          }

          case 'response.output_item.added': {
            const item = record(payload.item);
            if (!item || item.type !== 'function_call') break;
            const itemId = text(item.id) ?? text(item.call_id);
            const callId = text(item.call_id) ?? itemId;
            const name = text(item.name);
            if (!itemId || !callId || !name) {
              throw malformed('function_call item without id or name', event.data, ctx);
            }
            items.set(itemId, { callId, streamed: false, closed: false });
            sawCalls = true;
            yield { type: 'tool_call_open', id: callId, name };
            break;
          }

          case 'response.function_call_arguments.delta': {
            const item = items.get(text(payload.item_id) ?? '');
            if (!item || item.closed) {
              throw malformed('argument delta for an unknown or closed call', event.data, ctx);
            }
            const delta = text(payload.delta);
            if (delta) {
              item.streamed = true;
              yield { type: 'tool_call_delta', id: item.callId, fragment: delta };
            }
            break;
          }

          case 'response.output_item.done': {
            const done = record(payload.item);
            if (!done || done.type !== 'function_call') break;
            const item = items.get(text(done.id) ?? text(done.call_id) ?? '');
            if (item) yield* closeItem(item, text(done.arguments));
            break;
          }

          case 'response.completed':
            yield* finishWith(record(payload.response), sawCalls ? 'tool_calls' : 'stop');
            return;

          case 'response.incomplete': {
            const response = record(payload.response);
            const reason = text(record(response?.incomplete_details)?.reason);
            yield* finishWith(response, reason === 'content_filter' ? 'content_filter' : 'length');
            return;
          }

          case 'response.failed': {
            const response = record(payload.response);
            throw errorFromPayload({ error: response?.error }, ctx);
          }

          case 'error':
            throw errorFromPayload(payload, ctx);

          default:
            // created, in_progress, content_part.*, *.done bookkeeping
            break;
        }
      }
    } finally {
      deadline.dispose();
    }
  }
}
