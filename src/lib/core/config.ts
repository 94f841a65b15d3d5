import { z } from "zod";

/**
 * Runtime settings read from the process environment.
 *
 * Provider profiles live in the YAML file named by `profilesPath`; everything
 * here is loop-wide tuning that applies to every profile.
 */
export interface RuntimeConfig {
  profilesPath: string;
  envFilePath: string;
  logLevel: string;
  nodeEnv: string;

  // Retry policy for transient failures (network, rate limiting)
  retryAttempts: number;
  retryDelayMs: number;
  retryMaxDelayMs: number;
  retryJitter: number;

  // Per-attempt timeouts
  requestTimeoutMs: number;
  idleTimeoutMs: number;

  maxSteps: number;
  metricsBufferSize: number;
}

const RuntimeConfigSchema = z.object({
  profilesPath: z.string().min(1),
  envFilePath: z.string().min(1),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  nodeEnv: z.string(),
  retryAttempts: z.number().int().min(1).max(20),
  retryDelayMs: z.number().int().min(0),
  retryMaxDelayMs: z.number().int().min(0),
  retryJitter: z.number().min(0).max(1),
  requestTimeoutMs: z.number().int().positive(),
  idleTimeoutMs: z.number().int().positive(),
  maxSteps: z.number().int().positive(),
  metricsBufferSize: z.number().int().positive(),
});

export class ConfigLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

/**
 * Build the runtime settings from an environment map.
 * Throws ConfigLoadError when a value is present but out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const raw = {
    profilesPath: env.RELAYLOOP_CONFIG || "./relayloop.yaml",
    envFilePath: env.RELAYLOOP_ENV_FILE || "./.env.local",
    logLevel: env.LOG_LEVEL || "info",
    nodeEnv: env.NODE_ENV || "development",

    retryAttempts: parseInt(env.RELAYLOOP_RETRY_ATTEMPTS || "4", 10),
    retryDelayMs: parseInt(env.RELAYLOOP_RETRY_DELAY_MS || "250", 10),
    retryMaxDelayMs: parseInt(env.RELAYLOOP_RETRY_MAX_DELAY_MS || "8000", 10),
    retryJitter: parseFloat(env.RELAYLOOP_RETRY_JITTER || "0.2"), // 20% jitter

    // Connect + first byte, then the longest allowed gap between reads
    requestTimeoutMs: parseInt(env.RELAYLOOP_REQUEST_TIMEOUT_MS || "60000", 10),
    idleTimeoutMs: parseInt(env.RELAYLOOP_IDLE_TIMEOUT_MS || "30000", 10),

    maxSteps: parseInt(env.RELAYLOOP_MAX_STEPS || "24", 10),
    metricsBufferSize: parseInt(env.RELAYLOOP_METRICS_BUFFER || "1024", 10),
  };

  const parsed = RuntimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigLoadError(`Invalid runtime configuration: ${issues}`);
  }
  if (parsed.data.retryMaxDelayMs < parsed.data.retryDelayMs) {
    throw new ConfigLoadError(
      "Invalid runtime configuration: retryMaxDelayMs must be >= retryDelayMs"
    );
  }

  return Object.freeze(parsed.data);
}
