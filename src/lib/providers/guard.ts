import { isTerminalEvent, type CanonicalEvent } from './providerContract.js';
import { ProviderContractError, parseProviderError, type ErrorContext } from './errors.js';

/**
 * Enforce the adapter output contract around a raw event source:
 *
 * - anything thrown becomes a terminal `error` event
 * - nothing is emitted after the first terminal event
 * - a source that ends without a terminal event is a malformed stream
 */
export async function* guardEventStream(
  source: AsyncIterable<CanonicalEvent>,
  ctx: ErrorContext
): AsyncGenerator<CanonicalEvent> {
  try {
    for await (const event of source) {
      yield event;
      if (isTerminalEvent(event)) return;
    }
  } catch (error) {
    yield { type: 'error', error: parseProviderError(error, ctx) };
    return;
  }

  yield {
    type: 'error',
    error: new ProviderContractError({
      kind: 'malformed_stream',
      message: 'stream ended without a finish reason',
      provider: ctx.provider,
      api: ctx.api,
    }),
  };
}
