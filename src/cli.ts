#!/usr/bin/env node
/**
 * relayloop CLI
 *
 * Operator commands over a provider profile file: list profiles, preview a
 * routing decision, validate credentials and run a single chat turn.
 */
import { Command } from "commander";
import dotenv from "dotenv";
import { loadConfig, type RuntimeConfig } from "./lib/core/config.js";
import { createLogger, type Logger } from "./lib/core/logger.js";
import { ProviderContractError } from "./lib/providers/errors.js";
import { createDefaultAdapterRegistry } from "./lib/providers/adapters/registry.js";
import { loadProfiles } from "./lib/routing/profileStore.js";
import { ProviderRouter, familyOf, parseTarget } from "./lib/routing/router.js";
import { maskSecret } from "./lib/routing/credentials.js";
import { AgentLoop } from "./lib/agent/agentLoop.js";
import { createRetryPolicy } from "./lib/agent/retryPolicy.js";
import { MetricsEmitter, logMetricsSink } from "./lib/metrics/metricsEmitter.js";

dotenv.config();

interface Runtime {
  config: RuntimeConfig;
  logger: Logger;
  router: ProviderRouter;
  source: string;
}

function openRuntime(profilesPath?: string): Runtime {
  const config = loadConfig();
  const logger = createLogger(config);
  const path = profilesPath || config.profilesPath;
  const loaded = loadProfiles(path, { envFilePath: config.envFilePath });
  const router = new ProviderRouter(loaded.config, {
    overlay: loaded.overlay,
    timeoutMs: config.requestTimeoutMs,
    idleTimeoutMs: config.idleTimeoutMs,
  });
  return { config, logger, router, source: loaded.source };
}

function fail(error: unknown): never {
  if (error instanceof ProviderContractError) {
    console.error(`${error.kind}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

const program = new Command();

program
  .name("relayloop")
  .description("Provider-agnostic LLM streaming client and agent loop")
  .version("0.1.0")
  .option("-c, --config <path>", "Provider profile file (default: RELAYLOOP_CONFIG or ./relayloop.yaml)");

program
  .command("profiles")
  .description("List chat profiles with their shapes and wildcard weights")
  .action(() => {
    try {
      const { router, source } = openRuntime(program.opts().config);
      const profiles = router.chatProfiles();
      console.log(`Profiles from ${source}:`);
      if (!profiles.length) {
        console.log("  (no chat profiles)");
        return;
      }
      for (const profile of profiles) {
        const fallback = profile.fallbackApi ? ` -> ${profile.fallbackApi}` : "";
        console.log(
          `  ${profile.name}  family=${familyOf(profile)}  api=${router.primaryApi(profile)}${fallback}  ` +
            `weight=${profile.weight}  model=${profile.model ?? "-"}`
        );
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command("route [target]")
  .description("Show the routing decision for a target (provider, provider/model, alias or *)")
  .action((target?: string) => {
    try {
      const { router } = openRuntime(program.opts().config);
      const decision = router.resolve(target ? parseTarget(target) : {});
      console.log(`profile:  ${decision.profile}`);
      console.log(`provider: ${decision.provider}`);
      console.log(`api:      ${decision.api}`);
      console.log(`model:    ${decision.model}`);
      console.log(`endpoint: ${decision.target.baseUrl || "(sdk default)"}`);
      console.log(`key:      ${maskSecret(decision.target.apiKey)}`);
      const fallback = router.fallbackFor(decision);
      if (fallback) console.log(`fallback: ${fallback.api}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("check")
  .description("Validate the profile file and resolve every chat profile's credentials")
  .action(() => {
    try {
      const { router, source } = openRuntime(program.opts().config);
      let failures = 0;
      for (const profile of router.chatProfiles()) {
        try {
          const decision = router.resolve({ provider: profile.name });
          console.log(`ok    ${profile.name} (${decision.api}, ${decision.model})`);
        } catch (error) {
          failures++;
          console.log(`fail  ${profile.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      if (failures) {
        console.error(`${failures} profile(s) in ${source} cannot be used`);
        process.exit(1);
      }
      console.log(`${source} OK.`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("chat <prompt>")
  .description("Run one tool-less turn and print the streamed reply")
  .option("-t, --target <target>", "Provider, provider/model, alias or *")
  .option("-s, --system <prompt>", "System prompt")
  .action(async (prompt: string, opts: { target?: string; system?: string }) => {
    let runtime: Runtime;
    try {
      runtime = openRuntime(program.opts().config);
    } catch (error) {
      fail(error);
    }
    const { config, logger, router } = runtime;

    const metrics = new MetricsEmitter({ capacity: config.metricsBufferSize, logger });
    metrics.subscribe(logMetricsSink(logger));

    const loop = new AgentLoop({
      router,
      adapters: createDefaultAdapterRegistry(),
      metrics,
      logger,
      retry: createRetryPolicy(config),
      maxSteps: config.maxSteps,
    });

    const handle = loop.beginTurn(
      {
        ...(opts.system ? { systemPrompt: opts.system } : {}),
        messages: [{ role: "user", content: prompt }],
      },
      { target: opts.target ? parseTarget(opts.target) : undefined }
    );
    const onSigint = () => loop.abort(handle);
    process.once("SIGINT", onSigint);

    let lastStep = 0;
    let lastAttempt = 0;
    for await (const item of handle.events) {
      if (item.type !== "event") continue;
      if (item.step === lastStep && item.attempt !== lastAttempt) {
        // A retried attempt starts the step's text over
        process.stdout.write("\n[retrying]\n");
      }
      lastStep = item.step;
      lastAttempt = item.attempt;
      if (item.event.type === "text_delta") process.stdout.write(item.event.text);
    }
    process.off("SIGINT", onSigint);
    process.stdout.write("\n");

    const result = await handle.result;
    await metrics.flush();
    switch (result.status) {
      case "completed":
        if (result.finishReason !== "stop") console.error(`(finished: ${result.finishReason})`);
        break;
      case "aborted":
        console.error("Aborted.");
        process.exitCode = 130;
        break;
      case "failed":
        console.error(`${result.error.kind}: ${result.error.message}`);
        process.exitCode = 1;
        break;
    }
    logger.debug({ stats: result.stats }, "turn finished");
  });

program.parseAsync().catch(fail);
