import { describe, expect, it } from "vitest";
import { ConfigLoadError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      profilesPath: "./relayloop.yaml",
      envFilePath: "./.env.local",
      logLevel: "info",
      nodeEnv: "development",
      retryAttempts: 4,
      retryDelayMs: 250,
      retryMaxDelayMs: 8000,
      retryJitter: 0.2,
      requestTimeoutMs: 60000,
      idleTimeoutMs: 30000,
      maxSteps: 24,
      metricsBufferSize: 1024,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      RELAYLOOP_CONFIG: "/etc/relayloop/profiles.yaml",
      LOG_LEVEL: "debug",
      RELAYLOOP_RETRY_ATTEMPTS: "2",
      RELAYLOOP_RETRY_JITTER: "0",
      RELAYLOOP_MAX_STEPS: "5",
    });

    expect(config.profilesPath).toBe("/etc/relayloop/profiles.yaml");
    expect(config.logLevel).toBe("debug");
    expect(config.retryAttempts).toBe(2);
    expect(config.retryJitter).toBe(0);
    expect(config.maxSteps).toBe(5);
  });

  it("rejects values out of range", () => {
    expect(() => loadConfig({ RELAYLOOP_RETRY_ATTEMPTS: "0" })).toThrow(ConfigLoadError);
    expect(() => loadConfig({ RELAYLOOP_RETRY_JITTER: "1.5" })).toThrow(/retryJitter/);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/logLevel/);
    expect(() => loadConfig({ RELAYLOOP_MAX_STEPS: "many" })).toThrow(/maxSteps/);
  });

  it("requires the backoff ceiling to be at least the base delay", () => {
    expect(() => loadConfig({ RELAYLOOP_RETRY_DELAY_MS: "500", RELAYLOOP_RETRY_MAX_DELAY_MS: "100" })).toThrow(
      "Invalid runtime configuration: retryMaxDelayMs must be >= retryDelayMs"
    );
  });
});
