// Routing module exports
export {
  ProviderProfileSchema,
  RoutingConfigSchema,
  ProfileKindSchema,
  type ProfileKind,
  type ProviderProfile,
  type ProviderProfileInput,
  type RoutingConfig,
  type RoutingConfigInput,
} from './profileSchema.js';

export { loadProfiles, parseProfiles, parseProfilesYaml, buildEnvOverlay, type LoadedProfiles } from './profileStore.js';

export {
  INDIRECTION_MARKER,
  lookupEnv,
  referenceName,
  resolveConfigValue,
  maskSecret,
  type CredentialSources,
  type EnvMap,
} from './credentials.js';

export {
  ProviderRouter,
  WILDCARD,
  DEFAULT_FALLBACKS,
  parseTarget,
  familyOf,
  type RouteTarget,
  type RouterOptions,
  type RoutingDecision,
} from './router.js';
