/**
 * Provider Router
 *
 * Turns a logical target (alias, explicit provider, `provider/model`, or the
 * `*` wildcard) into a RoutingDecision for one attempt. Decisions are frozen
 * and rebuilt on every attempt, so credentials are re-resolved each time.
 */

import type { AdapterTarget, ApiShape, ReasoningEffort } from '../providers/providerContract.js';
import { configError } from '../providers/errors.js';
import { parseStaticCredentials } from '../providers/adapters/bedrockConverse.js';
import { lookupEnv, resolveConfigValue, type CredentialSources, type EnvMap } from './credentials.js';
import type { ProviderProfile, RoutingConfig } from './profileSchema.js';

export const WILDCARD = '*';

export interface RouteTarget {
  provider?: string;
  model?: string;
}

export interface RoutingDecision {
  readonly profile: string;
  /** Provider family, reported on requests and errors */
  readonly provider: string;
  readonly api: ApiShape;
  readonly model: string;
  readonly target: Readonly<AdapterTarget>;
  readonly reasoning?: ReasoningEffort;
  readonly maxTokens?: number;
  readonly temperature?: number;
  /** True when this decision is the fallback hop of a shape mismatch */
  readonly viaFallback: boolean;
}

export interface RouterOptions {
  /** Local env overlay consulted before `env` */
  overlay?: EnvMap;
  env?: EnvMap;
  /** Uniform [0, 1); injectable for tests */
  random?: () => number;
  timeoutMs?: number;
  idleTimeoutMs?: number;
}

/** Shape each family speaks when a profile does not name one */
const FAMILY_DEFAULT_API: Record<string, ApiShape> = {
  openai: 'openai-responses',
  anthropic: 'anthropic-messages',
  google: 'google-generative-ai',
  gemini: 'google-generative-ai',
  bedrock: 'bedrock-converse-stream',
  'amazon-bedrock': 'bedrock-converse-stream',
};

const DEFAULT_BASE_URLS: Partial<Record<ApiShape, string>> = {
  'openai-completions': 'https://api.openai.com/v1',
  'openai-responses': 'https://api.openai.com/v1',
  'anthropic-messages': 'https://api.anthropic.com/v1',
  'google-generative-ai': 'https://generativelanguage.googleapis.com/v1beta',
};

const DEFAULT_KEY_ENV: Partial<Record<ApiShape, readonly string[]>> = {
  'openai-completions': ['OPENAI_API_KEY'],
  'openai-responses': ['OPENAI_API_KEY'],
  'anthropic-messages': ['ANTHROPIC_API_KEY'],
  'google-generative-ai': ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

/** Designated fallback shape per primary shape */
export const DEFAULT_FALLBACKS: Partial<Record<ApiShape, ApiShape>> = {
  'openai-responses': 'openai-completions',
};

const MAX_ALIAS_DEPTH = 8;

/**
 * `provider/model` splits at the first slash; model ids may contain more.
 */
export function parseTarget(spec: string): RouteTarget {
  const trimmed = spec.trim();
  if (!trimmed) return {};
  const slash = trimmed.indexOf('/');
  if (slash === -1) return { provider: trimmed };
  const provider = trimmed.slice(0, slash);
  const model = trimmed.slice(slash + 1);
  return { provider: provider || undefined, model: model || undefined };
}

export function familyOf(profile: ProviderProfile): string {
  return profile.provider ?? profile.name;
}

export class ProviderRouter {
  private readonly chat: readonly ProviderProfile[];
  private readonly byName: ReadonlyMap<string, ProviderProfile>;
  private readonly sources: CredentialSources;
  private readonly random: () => number;
  private readonly timeoutMs: number;
  private readonly idleTimeoutMs: number;

  constructor(private readonly config: RoutingConfig, options: RouterOptions = {}) {
    // Sorted by name so wildcard selection does not depend on file order
    this.chat = Object.freeze(
      config.providers
        .filter((profile) => profile.kind === 'chat')
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    );
    this.byName = new Map(config.providers.map((profile) => [profile.name, profile]));
    this.sources = { overlay: options.overlay ?? {}, env: options.env ?? process.env };
    this.random = options.random ?? Math.random;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30_000;
  }

  /** Chat profiles eligible for routing, sorted by name */
  chatProfiles(): readonly ProviderProfile[] {
    return this.chat;
  }

  /**
   * Pick the profile and model for a target without touching credentials.
   */
  select(target: RouteTarget = {}): { profile: ProviderProfile; model: string } {
    let provider = target.provider ?? this.config.defaultProvider;
    let model = target.model;
    const requested = provider;

    // Aliases may point at other aliases; an explicit model always wins
    for (let depth = 0; Object.hasOwn(this.config.aliases, provider); depth++) {
      if (depth >= MAX_ALIAS_DEPTH) {
        throw configError(`Alias chain starting at "${requested}" is too deep or cyclic`);
      }
      const aliased = parseTarget(this.config.aliases[provider]);
      provider = aliased.provider ?? WILDCARD;
      model = model ?? aliased.model;
    }

    const profile = provider === WILDCARD ? this.pickWeighted() : this.findProfile(provider);
    const resolvedModel = model ?? profile.model;
    if (!resolvedModel) {
      throw configError(`Provider "${profile.name}" has no model and none was requested`, {
        profile: profile.name,
      });
    }
    return { profile, model: resolvedModel };
  }

  resolve(target: RouteTarget = {}): RoutingDecision {
    const { profile, model } = this.select(target);
    return this.decide(profile, this.primaryApi(profile), model, false);
  }

  /**
   * The one-shot shape fallback for a decision, or undefined when the
   * profile has none or the decision already is the fallback.
   */
  fallbackFor(decision: RoutingDecision): RoutingDecision | undefined {
    if (decision.viaFallback) return undefined;
    const profile = this.byName.get(decision.profile);
    if (!profile) return undefined;
    const api = profile.fallbackApi ?? DEFAULT_FALLBACKS[decision.api];
    if (!api || api === decision.api) return undefined;
    return this.decide(profile, api, decision.model, true);
  }

  /**
   * Same profile and shape with credentials resolved again. Used for
   * retries after a fallback hop.
   */
  refresh(decision: RoutingDecision): RoutingDecision {
    const profile = this.byName.get(decision.profile);
    if (!profile) {
      throw configError(`Provider "${decision.profile}" is no longer configured`);
    }
    return this.decide(profile, decision.api, decision.model, decision.viaFallback);
  }

  /**
   * Cumulative-weight draw over chat profiles. Weight 0 never wins.
   */
  pickWeighted(): ProviderProfile {
    const pool = this.chat.filter((profile) => profile.weight > 0);
    const total = pool.reduce((sum, profile) => sum + profile.weight, 0);
    if (total === 0) {
      throw configError('No chat provider has a weight above 0 for wildcard routing');
    }

    let cursor = Math.floor(this.random() * total);
    for (const profile of pool) {
      if (cursor < profile.weight) return profile;
      cursor -= profile.weight;
    }
    // random() returned 1 or more
    return pool[pool.length - 1];
  }

  private findProfile(name: string): ProviderProfile {
    const exact = this.byName.get(name);
    if (exact) {
      if (exact.kind !== 'chat') {
        throw configError(`Provider "${name}" is an ${exact.kind} profile and cannot serve chat requests`, {
          profile: name,
        });
      }
      return exact;
    }

    const family = this.chat.filter((profile) => familyOf(profile) === name);
    if (family.length === 1) return family[0];
    if (family.length > 1) {
      throw configError(
        `Provider "${name}" matches several profiles (${family.map((p) => p.name).join(', ')}); name one`,
        { provider: name }
      );
    }
    throw configError(`Unknown provider "${name}"`, { provider: name });
  }

  /** Shape a profile is first tried with */
  primaryApi(profile: ProviderProfile): ApiShape {
    const api = profile.api ?? FAMILY_DEFAULT_API[familyOf(profile)];
    if (!api) {
      throw configError(`Provider "${profile.name}" needs an api shape`, { profile: profile.name });
    }
    return api;
  }

  private decide(profile: ProviderProfile, api: ApiShape, model: string, viaFallback: boolean): RoutingDecision {
    const field = (key: string) => `providers.${profile.name}.${key}`;

    const baseUrl = resolveConfigValue(profile.baseUrl, this.sources, field('baseUrl')) ?? DEFAULT_BASE_URLS[api];
    if (baseUrl === undefined && api !== 'bedrock-converse-stream') {
      throw configError(`Provider "${profile.name}" needs a baseUrl for ${api}`, { profile: profile.name });
    }

    let apiKey = resolveConfigValue(profile.apiKey, this.sources, field('apiKey'));
    if (apiKey === undefined) {
      for (const name of DEFAULT_KEY_ENV[api] ?? []) {
        apiKey = lookupEnv(name, this.sources);
        if (apiKey) break;
      }
    }
    // Hosted endpoints need a key; custom endpoints may be open
    if (apiKey === undefined && profile.baseUrl === undefined && DEFAULT_KEY_ENV[api]) {
      throw configError(
        `No credential for provider "${profile.name}": set apiKey or ${(DEFAULT_KEY_ENV[api] ?? []).join(' / ')}`,
        { profile: profile.name }
      );
    }
    if (api === 'bedrock-converse-stream') {
      parseStaticCredentials(apiKey);
    }

    const target: AdapterTarget = {
      baseUrl: baseUrl ?? '',
      timeoutMs: this.timeoutMs,
      idleTimeoutMs: this.idleTimeoutMs,
      ...(apiKey !== undefined && { apiKey }),
      ...(profile.region !== undefined && { region: profile.region }),
    };

    return Object.freeze({
      profile: profile.name,
      provider: familyOf(profile),
      api,
      model,
      target: Object.freeze(target),
      reasoning: profile.reasoning,
      maxTokens: profile.maxTokens,
      temperature: profile.temperature,
      viaFallback,
    });
  }
}
