/**
 * Incremental server-sent-events parsing.
 *
 * Network chunks can split anywhere: inside a line, between `\r` and `\n`,
 * or in the middle of a multi-byte character. The parser only dispatches an
 * event once its terminating blank line has arrived.
 */

import { abortable } from '../core/abortable.js';

export interface SseEvent {
  /** Value of the last `event:` field, if any */
  event?: string;
  /** `data:` lines joined with `\n` */
  data: string;
  id?: string;
}

export class SseParser {
  private buffer = '';
  private eventName: string | undefined;
  private eventId: string | undefined;
  private dataLines: string[] = [];

  /**
   * Feed decoded text; returns every event completed by it.
   */
  push(text: string): SseEvent[] {
    this.buffer += text;
    const events: SseEvent[] = [];

    for (;;) {
      const match = /\r\n|\r|\n/.exec(this.buffer);
      if (!match) break;
      // A lone trailing \r may be the first half of \r\n
      if (match[0] === '\r' && match.index === this.buffer.length - 1) break;

      const line = this.buffer.slice(0, match.index);
      this.buffer = this.buffer.slice(match.index + match[0].length);
      const event = this.processLine(line);
      if (event) events.push(event);
    }

    return events;
  }

  /**
   * End of input: treat any unterminated line and pending fields as complete.
   */
  flush(): SseEvent[] {
    const events: SseEvent[] = [];
    if (this.buffer.length > 0) {
      const line = this.buffer.replace(/\r$/, '');
      this.buffer = '';
      const event = this.processLine(line);
      if (event) events.push(event);
    }
    const pending = this.dispatch();
    if (pending) events.push(pending);
    return events;
  }

  private processLine(line: string): SseEvent | undefined {
    if (line === '') {
      return this.dispatch();
    }
    if (line.startsWith(':')) {
      return undefined;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'event':
        this.eventName = value;
        break;
      case 'data':
        this.dataLines.push(value);
        break;
      case 'id':
        this.eventId = value;
        break;
      default:
        // retry and unknown fields are ignored
        break;
    }
    return undefined;
  }

  private dispatch(): SseEvent | undefined {
    if (this.dataLines.length === 0) {
      this.eventName = undefined;
      return undefined;
    }
    const event: SseEvent = { data: this.dataLines.join('\n') };
    if (this.eventName !== undefined) event.event = this.eventName;
    if (this.eventId !== undefined) event.id = this.eventId;
    this.dataLines = [];
    this.eventName = undefined;
    return event;
  }
}

export interface ReadOptions {
  signal: AbortSignal;
  /** Called after every chunk so the caller can reset an idle timer */
  onChunk?: () => void;
}

/**
 * Yield SSE events from a response body as bytes arrive.
 * Each read is raced against `signal`, so a stalled socket cannot hold the
 * consumer once the attempt is aborted.
 */
export async function* readSseEvents(
  body: ReadableStream<Uint8Array>,
  options: ReadOptions
): AsyncGenerator<SseEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseParser();

  try {
    for (;;) {
      const { done, value } = await abortable(reader.read(), options.signal);
      if (done) break;
      options.onChunk?.();
      yield* parser.push(decoder.decode(value, { stream: true }));
    }
    const tail = decoder.decode();
    if (tail) yield* parser.push(tail);
    yield* parser.flush();
  } finally {
    // cancel rejects when the body already errored; that error was thrown above
    await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}
