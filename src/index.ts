#!/usr/bin/env tsx
// src/index.ts — Entry point
// Credentials → config → runtime → (orchestrator ∥ terminal channel) → shutdown.

import { loadConfig, loadEnvFile, requireCredentials, MissingCredentialError, ConfigError } from "@/config.ts";
import { bootstrapRuntime } from "@/runtime/runtime.ts";
import { runOrchestrator } from "@/cycle/orchestrator.ts";
import terminalChannel from "@/channels/terminal/index.ts";
import { log } from "@/logs/logger.ts";

const logger = log("forum-agent");

loadEnvFile();

/** Startup problems the user can fix are printed, then the process exits 1. */
function orExit<T>(step: () => T): T {
    try {
        return step();
    } catch (err) {
        if (err instanceof MissingCredentialError || err instanceof ConfigError) {
            console.error(`Error: ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}

const credentials = orExit(() => requireCredentials());
const config = orExit(() => loadConfig());

const runtime = await bootstrapRuntime(config, credentials);
logger.info(`Model ${config.llm.model}, cycle every ${config.cycle.intervalSeconds}s, data in ${config.dataDir}`);

const orchestrator = runOrchestrator(runtime).catch((err: unknown) => {
    logger.error("Cycle orchestrator crashed", err);
});

let shuttingDown = false;
async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    runtime.stop();
    await orchestrator;
    await runtime.shutdown();
    logger.info("Bye!");
    process.exit(0);
}

process.on("SIGINT", () => {
    shutdown().catch((err: unknown) => {
        logger.error("Shutdown failed", err);
        process.exit(1);
    });
});

await terminalChannel.start(runtime);
await shutdown();
