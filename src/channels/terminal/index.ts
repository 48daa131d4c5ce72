// src/channels/terminal/index.ts — Terminal chat channel
// Each submitted line is handled on its own task, so the prompt stays usable
// while an exchange (or a cycle) is in flight.

import * as readline from "node:readline";
import type { Channel } from "@/channels/types.ts";
import type { AgentRuntime } from "@/runtime/runtime.ts";
import { formatBanner, handleInput, promptFor } from "@/channels/chat.ts";
import { log } from "@/logs/logger.ts";

const logger = log("terminal");

export default {
    name: "terminal",
    start,
} satisfies Channel;

function start(runtime: AgentRuntime): Promise<void> {
    for (const line of formatBanner(runtime)) runtime.output(line);

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        terminal: true,
        prompt: promptFor(runtime),
    });

    const unsubscribe = runtime.onThinkingChange(() => {
        rl.setPrompt(promptFor(runtime));
        rl.prompt(true);
    });

    return new Promise(resolve => {
        rl.on("line", line => {
            handleInput(runtime, line)
                .then(result => {
                    if (result === "quit") rl.close();
                    else rl.prompt();
                })
                .catch((err: unknown) => {
                    logger.error("Input handling failed", err);
                    rl.prompt();
                });
        });

        // Raw-mode Ctrl+C arrives here, not as a process signal
        rl.on("SIGINT", () => rl.close());

        rl.on("close", () => {
            unsubscribe();
            runtime.stop();
            resolve();
        });

        rl.prompt();
    });
}
