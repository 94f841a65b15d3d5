import type { ApiShape, StreamAdapter } from '../providerContract.js';
import { ProviderContractError } from '../errors.js';
import type { FetchLike } from '../http.js';
import { AnthropicMessagesAdapter } from './anthropicMessages.js';
import { BedrockConverseAdapter, type ConverseStreamFn } from './bedrockConverse.js';
import { GoogleGenerativeAiAdapter } from './googleGenerativeAi.js';
import { OpenAICompletionsAdapter } from './openaiCompletions.js';
import { OpenAIResponsesAdapter } from './openaiResponses.js';

/**
 * One adapter per API shape, looked up by the agent loop for each attempt.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<ApiShape, StreamAdapter>();

  register(adapter: StreamAdapter): this {
    this.adapters.set(adapter.api, adapter);
    return this;
  }

  has(api: ApiShape): boolean {
    return this.adapters.has(api);
  }

  get(api: ApiShape): StreamAdapter {
    const adapter = this.adapters.get(api);
    if (!adapter) {
      throw new ProviderContractError({
        kind: 'config',
        message: `No stream adapter registered for API shape "${api}"`,
        api,
      });
    }
    return adapter;
  }

  list(): ApiShape[] {
    return [...this.adapters.keys()];
  }
}

export interface DefaultAdapterOptions {
  fetchImpl?: FetchLike;
  converse?: ConverseStreamFn;
}

export function createDefaultAdapterRegistry(options: DefaultAdapterOptions = {}): AdapterRegistry {
  const http = { fetchImpl: options.fetchImpl };
  return new AdapterRegistry()
    .register(new OpenAICompletionsAdapter(http))
    .register(new OpenAIResponsesAdapter(http))
    .register(new AnthropicMessagesAdapter(http))
    .register(new GoogleGenerativeAiAdapter(http))
    .register(new BedrockConverseAdapter({ converse: options.converse }));
}
