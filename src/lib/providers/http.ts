/**
 * HTTP plumbing shared by the fetch-based adapters: per-attempt deadline and
 * a streaming POST that classifies non-2xx responses.
 */

import { abortable } from '../core/abortable.js';
import { ProviderContractError, errorFromResponse, type ErrorContext } from './errors.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpAdapterOptions {
  fetchImpl?: FetchLike;
}

export interface DeadlineOptions {
  /** Connect + response headers */
  timeoutMs: number;
  /** Longest allowed gap between body reads once connected */
  idleTimeoutMs: number;
}

/**
 * Abort scope for one network attempt.
 *
 * Aborts with an `aborted` error when the caller's signal fires, and with a
 * transient `network` error when either the connect timeout or the idle
 * timeout elapses. Timeouts are per attempt, never per turn.
 */
export class AttemptDeadline {
  private readonly controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private connected = false;
  private readonly onParentAbort: () => void;

  constructor(
    private readonly parent: AbortSignal,
    private readonly options: DeadlineOptions,
    private readonly ctx: ErrorContext
  ) {
    this.onParentAbort = () => {
      this.abort(
        new ProviderContractError({
          kind: 'aborted',
          message: 'request aborted by caller',
          provider: ctx.provider,
          api: ctx.api,
        })
      );
    };

    if (parent.aborted) {
      this.onParentAbort();
    } else {
      parent.addEventListener('abort', this.onParentAbort, { once: true });
      this.arm(options.timeoutMs, 'waiting for response');
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Switch from the connect timeout to the idle timeout */
  markConnected(): void {
    this.connected = true;
    this.touch();
  }

  /** Reset the idle timer after data arrived */
  touch(): void {
    if (!this.connected || this.controller.signal.aborted) return;
    this.arm(this.options.idleTimeoutMs, 'waiting for stream data');
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.parent.removeEventListener('abort', this.onParentAbort);
  }

  private arm(ms: number, phase: string): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.abort(
        new ProviderContractError({
          kind: 'network',
          message: `timed out after ${ms}ms ${phase}`,
          provider: this.ctx.provider,
          api: this.ctx.api,
        })
      );
    }, ms);
  }

  private abort(reason: ProviderContractError): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }
}

export interface PostStreamOptions {
  fetchImpl: FetchLike;
  deadline: AttemptDeadline;
  ctx: ErrorContext;
}

/**
 * POST a JSON body and return the response stream once headers arrive.
 * Non-2xx responses are read in full and thrown as classified errors.
 */
export async function postEventStream(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  options: PostStreamOptions
): Promise<ReadableStream<Uint8Array>> {
  const { fetchImpl, deadline, ctx } = options;

  const response = await abortable(
    fetchImpl(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'text/event-stream',
        ...headers,
      },
      body: JSON.stringify(body),
      signal: deadline.signal,
    }),
    deadline.signal
  );

  if (!response.ok) {
    const text = await abortable(response.text(), deadline.signal).catch(() => '');
    throw errorFromResponse(response.status, text, response.headers, ctx);
  }

  if (!response.body) {
    throw new ProviderContractError({
      kind: 'malformed_stream',
      message: 'response has no body',
      status: response.status,
      provider: ctx.provider,
      api: ctx.api,
    });
  }

  deadline.markConnected();
  return response.body;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
