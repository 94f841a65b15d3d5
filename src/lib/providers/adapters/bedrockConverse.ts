/**
 * Amazon Bedrock ConverseStream.
 *
 * Goes through the AWS SDK rather than raw HTTP: request signing and the
 * binary event-stream framing are the SDK's job. The SDK call is injectable
 * so tests can feed scripted stream events.
 */

import {
  BedrockRuntimeClient,
  ConverseStreamCommand,
  type ContentBlock,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type Message,
} from '@aws-sdk/client-bedrock-runtime';
import type {
  AdapterTarget,
  CanonicalEvent,
  CompletionRequest,
  FinishReason,
  ReasoningEffort,
  StreamAdapter,
} from '../providerContract.js';
import { abortable } from '../../core/abortable.js';
import { ProviderContractError, parseProviderError, type ErrorContext } from '../errors.js';
import { guardEventStream } from '../guard.js';
import { AttemptDeadline } from '../http.js';

export interface ConverseSession {
  stream: AsyncIterable<ConverseStreamOutput>;
  close?: () => void;
}

export type ConverseStreamFn = (
  input: ConverseStreamCommandInput,
  target: AdapterTarget,
  signal: AbortSignal
) => Promise<ConverseSession>;

export interface BedrockAdapterOptions {
  converse?: ConverseStreamFn;
}

const DEFAULT_REGION = 'us-east-1';

const THINKING_BUDGETS: Record<ReasoningEffort, number> = {
  minimal: 1024,
  low: 2048,
  medium: 8192,
  high: 16384,
};

const STOP_REASONS: Record<string, FinishReason> = {
  end_turn: 'stop',
  stop_sequence: 'stop',
  tool_use: 'tool_calls',
  max_tokens: 'length',
  guardrail_intervened: 'content_filter',
  content_filtered: 'content_filter',
};

/**
 * Static credentials from `accessKeyId:secretAccessKey[:sessionToken]`.
 * Without a key the SDK's default provider chain applies.
 */
export function parseStaticCredentials(
  apiKey: string | undefined
): { accessKeyId: string; secretAccessKey: string; sessionToken?: string } | undefined {
  if (!apiKey) return undefined;
  const [accessKeyId, secretAccessKey, ...rest] = apiKey.split(':');
  if (!accessKeyId || !secretAccessKey) {
    throw new ProviderContractError({
      kind: 'config',
      message: 'Bedrock credential must look like accessKeyId:secretAccessKey[:sessionToken]',
      api: 'bedrock-converse-stream',
    });
  }
  const sessionToken = rest.join(':');
  return sessionToken ? { accessKeyId, secretAccessKey, sessionToken } : { accessKeyId, secretAccessKey };
}

export const sdkConverse: ConverseStreamFn = async (input, target, signal) => {
  const credentials = parseStaticCredentials(target.apiKey);
  const client = new BedrockRuntimeClient({
    region: target.region || process.env.AWS_REGION || DEFAULT_REGION,
    ...(credentials && { credentials }),
    ...(target.baseUrl ? { endpoint: target.baseUrl } : {}),
  });

  try {
    const response = await client.send(new ConverseStreamCommand(input), { abortSignal: signal });
    if (!response.stream) {
      throw new ProviderContractError({
        kind: 'malformed_stream',
        message: 'Bedrock response has no stream',
        api: 'bedrock-converse-stream',
      });
    }
    return { stream: response.stream, close: () => client.destroy() };
  } catch (error) {
    client.destroy();
    throw error;
  }
};

export function buildConverseInput(request: CompletionRequest): ConverseStreamCommandInput {
  const messages: Message[] = [];
  let pendingResults: ContentBlock[] = [];

  const flushResults = () => {
    if (pendingResults.length > 0) {
      messages.push({ role: 'user', content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of request.messages) {
    if (message.role === 'tool') {
      pendingResults.push({
        toolResult: {
          toolUseId: message.toolCallId,
          content: [{ text: message.content }],
          status: message.isError ? 'error' : 'success',
        },
      });
      continue;
    }

    flushResults();
    if (message.role === 'user') {
      messages.push({ role: 'user', content: [{ text: message.content }] });
      continue;
    }

    const content: ContentBlock[] = [];
    if (message.content) content.push({ text: message.content });
    for (const call of message.toolCalls) {
      content.push({ toolUse: { toolUseId: call.id, name: call.name, input: call.arguments } });
    }
    if (content.length > 0) messages.push({ role: 'assistant', content });
  }
  flushResults();

  const input: ConverseStreamCommandInput = {
    modelId: request.model,
    messages,
  };
  if (request.systemPrompt) {
    input.system = [{ text: request.systemPrompt }];
  }
  if (request.maxTokens !== undefined || request.temperature !== undefined) {
    input.inferenceConfig = { maxTokens: request.maxTokens, temperature: request.temperature };
  }
  if (request.tools.length > 0) {
    input.toolConfig = {
      tools: request.tools.map((tool) => ({
        toolSpec: {
          name: tool.name,
          description: tool.description,
          inputSchema: { json: tool.parameters },
        },
      })),
    };
  }
  // Only Anthropic models on Bedrock take a thinking budget
  if (request.reasoning && request.model.includes('anthropic')) {
    input.additionalModelRequestFields = {
      thinking: { type: 'enabled', budget_tokens: THINKING_BUDGETS[request.reasoning] },
    };
  }
  return input;
}

export class BedrockConverseAdapter implements StreamAdapter {
  readonly api = 'bedrock-converse-stream' as const;
  private readonly converse: ConverseStreamFn;

  constructor(options: BedrockAdapterOptions = {}) {
    this.converse = options.converse ?? sdkConverse;
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
    let session: ConverseSession | undefined;
    let iterator: AsyncIterator<ConverseStreamOutput> | undefined;

    try {
      session = await abortable(
        this.converse(buildConverseInput(request), target, deadline.signal),
        deadline.signal
      );
      deadline.markConnected();
      iterator = session.stream[Symbol.asyncIterator]();

      const toolBlocks = new Map<number, string>();
      let stopReason: string | undefined;
      let usage: { inputTokens: number; outputTokens: number } | undefined;

      for (;;) {
        const next = await abortable(iterator.next(), deadline.signal);
        if (next.done) break;
        deadline.touch();
        const event = next.value;

        const failure =
          event.internalServerException ??
          event.modelStreamErrorException ??
          event.validationException ??
          event.throttlingException ??
          event.serviceUnavailableException;
        if (failure) {
          throw parseProviderError(failure, ctx);
        }

        if (event.contentBlockStart) {
          const toolUse = event.contentBlockStart.start?.toolUse;
          if (toolUse?.toolUseId && toolUse.name) {
            toolBlocks.set(event.contentBlockStart.contentBlockIndex ?? 0, toolUse.toolUseId);
            yield { type: 'tool_call_open', id: toolUse.toolUseId, name: toolUse.name };
          }
        }

        if (event.contentBlockDelta) {
          const delta = event.contentBlockDelta.delta;
          const index = event.contentBlockDelta.contentBlockIndex ?? 0;
          if (delta?.text) {
            yield { type: 'text_delta', text: delta.text };
          } else if (delta?.toolUse) {
            const id = toolBlocks.get(index);
            if (!id) {
              throw new ProviderContractError({
                kind: 'malformed_stream',
                message: `tool input for block ${index} without an open tool call`,
                provider: ctx.provider,
                api: ctx.api,
              });
            }
            if (delta.toolUse.input) {
              yield { type: 'tool_call_delta', id, fragment: delta.toolUse.input };
            }
          } else if (delta?.reasoningContent?.text) {
            yield { type: 'reasoning_delta', text: delta.reasoningContent.text };
          }
        }

        if (event.contentBlockStop) {
          const index = event.contentBlockStop.contentBlockIndex ?? 0;
          const id = toolBlocks.get(index);
          if (id) {
            toolBlocks.delete(index);
            yield { type: 'tool_call_close', id };
          }
        }

        if (event.messageStop) {
          stopReason = event.messageStop.stopReason ?? 'end_turn';
        }

        // metadata follows messageStop
        if (event.metadata?.usage) {
          usage = {
            inputTokens: event.metadata.usage.inputTokens ?? 0,
            outputTokens: event.metadata.usage.outputTokens ?? 0,
          };
        }
      }

      if (stopReason === undefined) return;
      if (usage) yield { type: 'usage', ...usage };
      yield { type: 'finish', reason: STOP_REASONS[stopReason] ?? 'stop' };
    } finally {
      if (iterator?.return && !deadline.signal.aborted) {
        // the stream outcome is already decided here
        await iterator.return().catch(() => undefined);
      }
      session?.close?.();
      deadline.dispose();
    }
  }
}
