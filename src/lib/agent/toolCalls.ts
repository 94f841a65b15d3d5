import {
  JsonValueSchema,
  type CanonicalEvent,
  type JsonObject,
} from '../providers/providerContract.js';
import { ProviderContractError, type ErrorContext } from '../providers/errors.js';

interface ToolCallBuffer {
  id: string;
  name: string;
  /** Append-only until close */
  fragments: string[];
  closed: boolean;
}

export interface CompletedToolCall {
  id: string;
  name: string;
  /** `{}` when the payload could not be parsed */
  arguments: JsonObject;
  rawArguments: string;
  /** Set when the concatenated payload is not a JSON object */
  parseError?: string;
}

/**
 * Tracks the tool calls of one attempt and enforces
 * open -> delta* -> close per id. Any violation is a malformed stream.
 */
export class ToolCallTracker {
  private readonly calls = new Map<string, ToolCallBuffer>();
  private readonly completedCalls: CompletedToolCall[] = [];

  constructor(private readonly ctx: ErrorContext = {}) {}

  /**
   * Apply a tool-call event; other event types are ignored.
   */
  apply(event: CanonicalEvent): void {
    switch (event.type) {
      case 'tool_call_open':
        this.open(event.id, event.name);
        break;
      case 'tool_call_delta':
        this.append(event.id, event.fragment);
        break;
      case 'tool_call_close':
        this.close(event.id);
        break;
      default:
        break;
    }
  }

  open(id: string, name: string): void {
    if (this.calls.has(id)) {
      throw this.violation(`tool call ${id} opened twice`, id);
    }
    this.calls.set(id, { id, name, fragments: [], closed: false });
  }

  append(id: string, fragment: string): void {
    const call = this.calls.get(id);
    if (!call) throw this.violation(`argument fragment for unknown tool call ${id}`, id);
    if (call.closed) throw this.violation(`argument fragment after close of tool call ${id}`, id);
    call.fragments.push(fragment);
  }

  close(id: string): void {
    const call = this.calls.get(id);
    if (!call) throw this.violation(`close for unknown tool call ${id}`, id);
    if (call.closed) throw this.violation(`tool call ${id} closed twice`, id);
    call.closed = true;
    this.completedCalls.push(finalize(call));
  }

  openIds(): string[] {
    return [...this.calls.values()].filter((call) => !call.closed).map((call) => call.id);
  }

  /** Closed calls in the order they were opened */
  completed(): CompletedToolCall[] {
    const order = [...this.calls.keys()];
    return [...this.completedCalls].sort((a, b) => order.indexOf(a.id) - order.indexOf(b.id));
  }

  assertAllClosed(): void {
    const open = this.openIds();
    if (open.length > 0) {
      throw new ProviderContractError({
        kind: 'malformed_stream',
        message: `stream finished with unclosed tool call(s): ${open.join(', ')}`,
        provider: this.ctx.provider,
        api: this.ctx.api,
        details: { openToolCalls: open },
      });
    }
  }

  private violation(message: string, id: string): ProviderContractError {
    return new ProviderContractError({
      kind: 'malformed_stream',
      message,
      provider: this.ctx.provider,
      api: this.ctx.api,
      details: { toolCallId: id },
    });
  }
}

function finalize(call: ToolCallBuffer): CompletedToolCall {
  const raw = call.fragments.join('');
  if (raw.trim() === '') {
    return { id: call.id, name: call.name, arguments: {}, rawArguments: raw };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { id: call.id, name: call.name, arguments: {}, rawArguments: raw, parseError: `invalid JSON: ${reason}` };
  }

  const checked = JsonValueSchema.safeParse(parsed);
  const value = checked.success ? checked.data : undefined;
  if (value === undefined || value === null || typeof value !== 'object' || Array.isArray(value)) {
    return {
      id: call.id,
      name: call.name,
      arguments: {},
      rawArguments: raw,
      parseError: 'arguments must be a JSON object',
    };
  }
  return { id: call.id, name: call.name, arguments: value, rawArguments: raw };
}
