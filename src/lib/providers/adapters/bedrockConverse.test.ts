import { describe, it, expect } from 'vitest';
import type { ConverseStreamCommandInput, ConverseStreamOutput } from '@aws-sdk/client-bedrock-runtime';
import {
  BedrockConverseAdapter,
  buildConverseInput,
  parseStaticCredentials,
  type ConverseStreamFn,
} from './bedrockConverse.js';
import { freezeRequest, type AdapterTarget, type CompletionRequest } from '../providerContract.js';
import { collect } from '../../testing/streams.js';

const target: AdapterTarget = { baseUrl: '', region: 'eu-west-1', timeoutMs: 1000, idleTimeoutMs: 1000 };

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return freezeRequest({
    provider: 'bedrock',
    api: 'bedrock-converse-stream',
    model: 'anthropic.claude-test-v1:0',
    messages: [{ role: 'user', content: 'hi' }],
    tools: [],
    ...overrides,
  });
}

function scripted(outputs: ConverseStreamOutput[]): { converse: ConverseStreamFn; inputs: ConverseStreamCommandInput[]; closed: () => boolean } {
  const inputs: ConverseStreamCommandInput[] = [];
  let closed = false;
  const converse: ConverseStreamFn = async (input) => {
    inputs.push(input);
    async function* stream(): AsyncGenerator<ConverseStreamOutput> {
      yield* outputs;
    }
    return {
      stream: stream(),
      close: () => {
        closed = true;
      },
    };
  };
  return { converse, inputs, closed: () => closed };
}

describe('parseStaticCredentials', () => {
  it('splits access key, secret and optional session token', () => {
    expect(parseStaticCredentials('AKIDTEST:test-secret')).toEqual({
      accessKeyId: 'AKIDTEST',
      secretAccessKey: 'test-secret',
    });
    expect(parseStaticCredentials('AKIDTEST:test-secret:tok:en')).toEqual({
      accessKeyId: 'AKIDTEST',
      secretAccessKey: 'test-secret',
      sessionToken: 'tok:en',
    });
    expect(parseStaticCredentials(undefined)).toBeUndefined();
  });

  it('rejects a key without a secret', () => {
    expect(() => parseStaticCredentials('just-a-key')).toThrow(
      'Bedrock credential must look like accessKeyId:secretAccessKey[:sessionToken]'
    );
  });
});

describe('buildConverseInput', () => {
  it('builds tool specs, tool results and a thinking budget for anthropic models', () => {
    const input = buildConverseInput(
      request({
        systemPrompt: 'be brief',
        reasoning: 'low',
        tools: [{ name: 'ls', description: 'List files', parameters: { type: 'object' } }],
        messages: [
          { role: 'user', content: 'list' },
          { role: 'assistant', content: '', toolCalls: [{ id: 'tu_1', name: 'ls', arguments: {} }] },
          { role: 'tool', toolCallId: 'tu_1', toolName: 'ls', content: 'denied', isError: true },
        ],
      })
    );

    expect(input).toEqual({
      modelId: 'anthropic.claude-test-v1:0',
      system: [{ text: 'be brief' }],
      messages: [
        { role: 'user', content: [{ text: 'list' }] },
        { role: 'assistant', content: [{ toolUse: { toolUseId: 'tu_1', name: 'ls', input: {} } }] },
        {
          role: 'user',
          content: [{ toolResult: { toolUseId: 'tu_1', content: [{ text: 'denied' }], status: 'error' } }],
        },
      ],
      toolConfig: {
        tools: [{ toolSpec: { name: 'ls', description: 'List files', inputSchema: { json: { type: 'object' } } } }],
      },
      additionalModelRequestFields: { thinking: { type: 'enabled', budget_tokens: 2048 } },
    });
  });

  it('leaves the thinking budget out for other model families', () => {
    const input = buildConverseInput(request({ model: 'amazon.nova-test-v1:0', reasoning: 'high' }));
    expect(input.additionalModelRequestFields).toBeUndefined();
  });
});

describe('BedrockConverseAdapter', () => {
  it('maps converse stream events and reports usage from metadata', async () => {
    const script = scripted([
      { messageStart: { role: 'assistant' } },
      { contentBlockDelta: { contentBlockIndex: 0, delta: { text: 'Listing.' } } },
      { contentBlockStop: { contentBlockIndex: 0 } },
      { contentBlockStart: { contentBlockIndex: 1, start: { toolUse: { toolUseId: 'tu_7', name: 'ls' } } } },
      { contentBlockDelta: { contentBlockIndex: 1, delta: { toolUse: { input: '{"dir":' } } } },
      { contentBlockDelta: { contentBlockIndex: 1, delta: { toolUse: { input: '"."}' } } } },
      { contentBlockStop: { contentBlockIndex: 1 } },
      { messageStop: { stopReason: 'tool_use' } },
      { metadata: { usage: { inputTokens: 9, outputTokens: 4, totalTokens: 13 }, metrics: { latencyMs: 5 } } },
    ]);
    const adapter = new BedrockConverseAdapter({ converse: script.converse });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events).toEqual([
      { type: 'text_delta', text: 'Listing.' },
      { type: 'tool_call_open', id: 'tu_7', name: 'ls' },
      { type: 'tool_call_delta', id: 'tu_7', fragment: '{"dir":' },
      { type: 'tool_call_delta', id: 'tu_7', fragment: '"."}' },
      { type: 'tool_call_close', id: 'tu_7' },
      { type: 'usage', inputTokens: 9, outputTokens: 4 },
      { type: 'finish', reason: 'tool_calls' },
    ]);
    expect(script.inputs[0].modelId).toBe('anthropic.claude-test-v1:0');
    expect(script.closed()).toBe(true);
  });

  it('classifies SDK exceptions thrown by the call', async () => {
    const converse: ConverseStreamFn = async () => {
      throw Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
    };
    const adapter = new BedrockConverseAdapter({ converse });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'error',
      error: { kind: 'rate_limited', api: 'bedrock-converse-stream', message: 'Rate exceeded' },
    });
  });

  it('reports a stream that ends before messageStop as malformed', async () => {
    const script = scripted([{ contentBlockDelta: { contentBlockIndex: 0, delta: { text: 'cut' } } }]);
    const adapter = new BedrockConverseAdapter({ converse: script.converse });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events.map((event) => event.type)).toEqual(['text_delta', 'error']);
    expect(events[1]).toMatchObject({ error: { kind: 'malformed_stream' } });
  });
});
