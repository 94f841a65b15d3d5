/**
 * Google Generative Language streaming
 * (`POST /models/{model}:streamGenerateContent?alt=sse`).
 *
 * Function calls arrive whole, so each one is emitted as open, a single
 * argument fragment, and close.
 */

import type {
  AdapterTarget,
  CanonicalEvent,
  CompletionRequest,
  FinishReason,
  ReasoningEffort,
  StreamAdapter,
} from '../providerContract.js';
import { ProviderContractError, errorFromPayload, type ErrorContext } from '../errors.js';
import { guardEventStream } from '../guard.js';
import { AttemptDeadline, joinUrl, postEventStream, type FetchLike, type HttpAdapterOptions } from '../http.js';
import { count, list, parseJsonPayload, record, syntheticCallId, text } from '../payload.js';
import { readSseEvents } from '../sse.js';

const THINKING_BUDGETS: Record<ReasoningEffort, number> = {
  minimal: 512,
  low: 2048,
  medium: 8192,
  high: 24576,
};

const BLOCKED = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
  'IMAGE_SAFETY',
  'LANGUAGE',
]);

export function buildGenerateContentBody(request: CompletionRequest): Record<string, unknown> {
  const contents: Record<string, unknown>[] = [];
  let pendingResponses: Record<string, unknown>[] = [];

  const flushResponses = () => {
    if (pendingResponses.length > 0) {
      contents.push({ role: 'user', parts: pendingResponses });
      pendingResponses = [];
    }
  };

  for (const message of request.messages) {
    if (message.role === 'tool') {
      pendingResponses.push({
        functionResponse: {
          name: message.toolName,
          response: message.isError ? { error: message.content } : { content: message.content },
        },
      });
      continue;
    }

    flushResponses();
    if (message.role === 'user') {
      contents.push({ role: 'user', parts: [{ text: message.content }] });
      continue;
    }

    const parts: Record<string, unknown>[] = [];
    if (message.content) parts.push({ text: message.content });
    for (const call of message.toolCalls) {
      parts.push({ functionCall: { name: call.name, args: call.arguments } });
    }
    if (parts.length > 0) contents.push({ role: 'model', parts });
  }
  flushResponses();

  const generationConfig: Record<string, unknown> = {};
  if (request.maxTokens !== undefined) generationConfig.maxOutputTokens = request.maxTokens;
  if (request.temperature !== undefined) generationConfig.temperature = request.temperature;
  if (request.reasoning) {
    generationConfig.thinkingConfig = {
      includeThoughts: true,
      thinkingBudget: THINKING_BUDGETS[request.reasoning],
    };
  }

  return {
    contents,
    ...(request.systemPrompt ? { systemInstruction: { parts: [{ text: request.systemPrompt }] } } : {}),
    ...(request.tools.length > 0 && {
      tools: [
        {
          functionDeclarations: request.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          })),
        },
      ],
    }),
    ...(Object.keys(generationConfig).length > 0 && { generationConfig }),
  };
}

export class GoogleGenerativeAiAdapter implements StreamAdapter {
  readonly api = 'google-generative-ai' as const;
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
      if (target.apiKey) headers['x-goog-api-key'] = target.apiKey;

      const model = request.model.startsWith('models/') ? request.model.slice('models/'.length) : request.model;
      const body = await postEventStream(
        joinUrl(target.baseUrl, `models/${encodeURIComponent(model)}:streamGenerateContent?alt=sse`),
        headers,
        buildGenerateContentBody(request),
        { fetchImpl: this.fetchImpl, deadline, ctx }
      );

      let callCount = 0;
      let finishCode: string | undefined;
      let usage: { inputTokens: number; outputTokens: number } | undefined;

      for await (const event of readSseEvents(body, {
        signal: deadline.signal,
        onChunk: () => deadline.touch(),
      })) {
        const chunk = parseJsonPayload(event.data, ctx);
        if (chunk.error !== undefined) {
          throw errorFromPayload(chunk, ctx);
        }

        const metadata = record(chunk.usageMetadata);
        if (metadata) {
          usage = {
            inputTokens: count(metadata.promptTokenCount) ?? 0,
            outputTokens: (count(metadata.candidatesTokenCount) ?? 0) + (count(metadata.thoughtsTokenCount) ?? 0),
          };
        }

        const candidate = record(list(chunk.candidates)[0]);
        if (!candidate) continue;

        for (const raw of list(record(candidate.content)?.parts)) {
          const part = record(raw);
          if (!part) continue;

          const value = text(part.text);
          if (value) {
            yield part.thought === true
              ? { type: 'reasoning_delta', text: value }
              : { type: 'text_delta', text: value };
          }

          const call = record(part.functionCall);
          if (call) {
            callCount += 1;
            const id = text(call.id) || syntheticCallId();
            const name = text(call.name) ?? '';
            yield { type: 'tool_call_open', id, name };
            yield { type: 'tool_call_delta', id, fragment: JSON.stringify(call.args ?? {}) };
            yield { type: 'tool_call_close', id };
          }
        }

        finishCode = text(candidate.finishReason) ?? finishCode;
      }

      if (finishCode === undefined) {
        // No finish reason before end of body; the guard reports it
        return;
      }

      if (finishCode === 'MALFORMED_FUNCTION_CALL') {
        throw new ProviderContractError({
          kind: 'malformed_stream',
          message: 'model produced a malformed function call',
          provider: ctx.provider,
          api: ctx.api,
        });
      }

      if (usage) yield { type: 'usage', ...usage };
      yield { type: 'finish', reason: mapFinish(finishCode, callCount > 0) };
    } finally {
      deadline.dispose();
    }
  }
}

function mapFinish(code: string, sawCalls: boolean): FinishReason {
  if (code === 'MAX_TOKENS') return 'length';
  if (BLOCKED.has(code)) return 'content_filter';
  return sawCalls ? 'tool_calls' : 'stop';
}
