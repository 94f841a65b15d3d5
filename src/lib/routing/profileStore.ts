import { existsSync, readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { configError } from '../providers/errors.js';
import { RoutingConfigSchema, type RoutingConfig } from './profileSchema.js';

export interface LoadedProfiles {
  config: RoutingConfig;
  /** env file entries overlaid by the inline `env:` map */
  overlay: Readonly<Record<string, string>>;
  source: string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate a parsed profile document. The result is deeply frozen; routers
 * share it read-only.
 */
export function parseProfiles(document: unknown, source = '<inline>'): RoutingConfig {
  const parsed = RoutingConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw configError(`Invalid provider profiles in ${source}: ${issues}`, { source });
  }
  return deepFreeze(parsed.data);
}

export function parseProfilesYaml(text: string, source = '<inline>'): RoutingConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw configError(`Could not parse ${source}: ${message}`, { source });
  }
  return parseProfiles(document, source);
}

export function buildEnvOverlay(
  config: RoutingConfig,
  envFileText?: string
): Readonly<Record<string, string>> {
  const fromFile = envFileText ? dotenv.parse(envFileText) : {};
  return Object.freeze({ ...fromFile, ...config.env });
}

/**
 * Read the YAML profile file and the optional env overlay file.
 * A missing overlay file is not an error; a missing profile file is.
 */
export function loadProfiles(path: string, options: { envFilePath?: string } = {}): LoadedProfiles {
  if (!existsSync(path)) {
    throw configError(`Provider profile file not found: ${path}`, { path });
  }
  const config = parseProfilesYaml(readFileSync(path, 'utf-8'), path);

  const envFile = options.envFilePath;
  const envText = envFile && existsSync(envFile) ? readFileSync(envFile, 'utf-8') : undefined;

  return { config, overlay: buildEnvOverlay(config, envText), source: path };
}
