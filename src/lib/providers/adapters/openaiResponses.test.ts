import { describe, it, expect } from 'vitest';
import { OpenAIResponsesAdapter, buildResponsesBody } from './openaiResponses.js';
import { freezeRequest, type AdapterTarget, type CompletionRequest } from '../providerContract.js';
import { argumentsById, collect, jsonResponse, queuedFetch, sseByteLength, sseResponse } from '../../testing/streams.js';

const target: AdapterTarget = {
  baseUrl: 'https://api.example.test/v1',
  apiKey: 'test-key',
  timeoutMs: 1000,
  idleTimeoutMs: 1000,
};

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return freezeRequest({
    provider: 'openai',
    api: 'openai-responses',
    model: 'gpt-test',
    messages: [{ role: 'user', content: 'hi' }],
    tools: [],
    ...overrides,
  });
}

const typed = (type: string, fields: Record<string, unknown> = {}) => ({ event: type, data: { type, ...fields } });

// Splits fall inside multi-byte characters once chunked by bytes
const WIDE_ARGUMENTS = '{"path":"café/日本.txt","note":"naïve ✓"}';
const WIDE_FRAGMENTS = ['{"path":"caf', 'é/日', '本.txt","note":"na', 'ïve ✓"}'];

describe('buildResponsesBody', () => {
  it('sends instructions, function call items and reasoning effort', () => {
    const body = buildResponsesBody(
      request({
        systemPrompt: 'be brief',
        reasoning: 'low',
        messages: [
          { role: 'user', content: 'list files' },
          { role: 'assistant', content: '', toolCalls: [{ id: 'call_1', name: 'ls', arguments: {} }] },
          { role: 'tool', toolCallId: 'call_1', toolName: 'ls', content: 'a.txt', isError: false },
        ],
      })
    );

    expect(body).toEqual({
      model: 'gpt-test',
      stream: true,
      store: false,
      instructions: 'be brief',
      reasoning: { effort: 'low' },
      input: [
        { role: 'user', content: 'list files' },
        { type: 'function_call', call_id: 'call_1', name: 'ls', arguments: '{}' },
        { type: 'function_call_output', call_id: 'call_1', output: 'a.txt' },
      ],
    });
  });
});

describe('OpenAIResponsesAdapter', () => {
  it('maps output item ids onto call ids', async () => {
    const { fetchImpl, calls } = queuedFetch([
      sseResponse([
        typed('response.created', { response: { id: 'resp_1' } }),
        typed('response.output_item.added', {
          item: { type: 'function_call', id: 'fc_1', call_id: 'call_1', name: 'read_file', arguments: '' },
        }),
        typed('response.function_call_arguments.delta', { item_id: 'fc_1', delta: '{"path":' }),
        typed('response.function_call_arguments.delta', { item_id: 'fc_1', delta: '"a.txt"}' }),
        typed('response.output_item.done', {
          item: { type: 'function_call', id: 'fc_1', call_id: 'call_1', name: 'read_file', arguments: '{"path":"a.txt"}' },
        }),
        typed('response.completed', { response: { usage: { input_tokens: 20, output_tokens: 7 } } }),
      ]),
    ]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(calls[0].url).toBe('https://api.example.test/v1/responses');
    expect(events).toEqual([
      { type: 'tool_call_open', id: 'call_1', name: 'read_file' },
      { type: 'tool_call_delta', id: 'call_1', fragment: '{"path":' },
      { type: 'tool_call_delta', id: 'call_1', fragment: '"a.txt"}' },
      { type: 'tool_call_close', id: 'call_1' },
      { type: 'usage', inputTokens: 20, outputTokens: 7 },
      { type: 'finish', reason: 'tool_calls' },
    ]);
  });

  it('uses the completed arguments when no deltas were streamed', async () => {
    const { fetchImpl } = queuedFetch([
      sseResponse([
        typed('response.output_item.added', { item: { type: 'function_call', id: 'fc_9', call_id: 'call_9', name: 'ls' } }),
        typed('response.output_item.done', {
          item: { type: 'function_call', id: 'fc_9', call_id: 'call_9', name: 'ls', arguments: '{"dir":"."}' },
        }),
        typed('response.completed', { response: {} }),
      ]),
    ]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events).toEqual([
      { type: 'tool_call_open', id: 'call_9', name: 'ls' },
      { type: 'tool_call_delta', id: 'call_9', fragment: '{"dir":"."}' },
      { type: 'tool_call_close', id: 'call_9' },
      { type: 'finish', reason: 'tool_calls' },
    ]);
  });

  it('streams text and reasoning summaries', async () => {
    const { fetchImpl } = queuedFetch([
      sseResponse([
        typed('response.reasoning_summary_text.delta', { delta: 'thinking' }),
        typed('response.output_text.delta', { delta: 'Hi there' }),
        typed('response.completed', { response: {} }),
      ]),
    ]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events).toEqual([
      { type: 'reasoning_delta', text: 'thinking' },
      { type: 'text_delta', text: 'Hi there' },
      { type: 'finish', reason: 'stop' },
    ]);
  });

  it('maps an incomplete response to a length finish', async () => {
    const { fetchImpl } = queuedFetch([
      sseResponse([
        typed('response.output_text.delta', { delta: 'trunc' }),
        typed('response.incomplete', { response: { incomplete_details: { reason: 'max_output_tokens' } } }),
      ]),
    ]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events[events.length - 1]).toEqual({ type: 'finish', reason: 'length' });
  });

  it('classifies a failed response by its error code', async () => {
    const { fetchImpl } = queuedFetch([
      sseResponse([
        typed('response.failed', { response: { error: { code: 'rate_limit_exceeded', message: 'slow down' } } }),
      ]),
    ]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'error', error: { kind: 'rate_limited', message: 'slow down' } });
  });

  it('reports an endpoint without this shape as a shape mismatch', async () => {
    const { fetchImpl } = queuedFetch([jsonResponse(404, { detail: 'Not Found' })]);
    const adapter = new OpenAIResponsesAdapter({ fetchImpl });

    const events = await collect(adapter.send(request(), target, new AbortController().signal));

    expect(events[0]).toMatchObject({ type: 'error', error: { kind: 'shape_mismatch', api: 'openai-responses' } });
  });

  it('reassembles wide-character arguments at every chunk size', async () => {
    const item = { type: 'function_call', id: 'fc_wide', call_id: 'call_wide', name: 'write_file' };
    const frames = [
      typed('response.output_item.added', { item: { ...item, arguments: '' } }),
      ...WIDE_FRAGMENTS.map((delta) => typed('response.function_call_arguments.delta', { item_id: 'fc_wide', delta })),
      typed('response.output_item.done', { item: { ...item, arguments: WIDE_ARGUMENTS } }),
      typed('response.completed', { response: { usage: { input_tokens: 20, output_tokens: 7 } } }),
    ];

    for (let size = 1; size <= sseByteLength(frames); size++) {
      const { fetchImpl } = queuedFetch([sseResponse(frames, size)]);
      const adapter = new OpenAIResponsesAdapter({ fetchImpl });

      const events = await collect(adapter.send(request(), target, new AbortController().signal));

      expect(argumentsById(events), `chunk size ${size}`).toEqual({ call_wide: WIDE_ARGUMENTS });
      expect(events[events.length - 1]).toEqual({ type: 'finish', reason: 'tool_calls' });
    }
  });
});
