import { configError } from '../providers/errors.js';

/** A configured value starting with this is a reference to an env entry */
export const INDIRECTION_MARKER = '$';

export type EnvMap = Readonly<Record<string, string | undefined>>;

export interface CredentialSources {
  /** Local overlay (env file + inline `env:` map), consulted first */
  overlay: EnvMap;
  /** Usually `process.env` */
  env: EnvMap;
}

/**
 * Look a name up in the overlay, then the process environment.
 * Empty values count as unset.
 */
export function lookupEnv(name: string, sources: CredentialSources): string | undefined {
  const local = sources.overlay[name];
  if (local) return local;
  const global = sources.env[name];
  return global || undefined;
}

/**
 * Parse `$NAME` or `${NAME}`; returns undefined for literal values.
 */
export function referenceName(value: string): string | undefined {
  if (!value.startsWith(INDIRECTION_MARKER)) return undefined;
  const rest = value.slice(INDIRECTION_MARKER.length);
  const braced = /^\{([^}]+)\}$/.exec(rest);
  return (braced ? braced[1] : rest).trim() || undefined;
}

/**
 * Resolve a configured value. Literals pass through; references must
 * resolve or a config error is raised before any network call.
 */
export function resolveConfigValue(
  value: string | undefined,
  sources: CredentialSources,
  field: string
): string | undefined {
  if (value === undefined) return undefined;
  if (!value.startsWith(INDIRECTION_MARKER)) return value;

  const name = referenceName(value);
  if (!name) {
    throw configError(`${field} has an empty environment reference`, { field });
  }
  const resolved = lookupEnv(name, sources);
  if (resolved === undefined) {
    throw configError(`${field} references ${name}, which is not set in the env overlay or the process environment`, {
      field,
      variable: name,
    });
  }
  return resolved;
}

export function maskSecret(value: string | undefined): string {
  if (!value) return '(none)';
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}…${value.slice(-4)}`;
}
