// src/channels/chat.ts — Interactive surface: commands + chat exchanges
// Channel-agnostic. The terminal channel feeds it lines; anything that is not a
// command becomes one agent loop over the shared history.

import { runAgentLoop, loopText } from "@/agent/loop.ts";
import { buildIdentity } from "@/agent/system-prompts/identity.ts";
import { evolveFromExchange } from "@/agent/evolution.ts";
import { formatStats } from "@/runtime/stats.ts";
import type { AgentRuntime } from "@/runtime/runtime.ts";
import { activity } from "@/logs/activity-log.ts";
import { log } from "@/logs/logger.ts";

const logger = log("chat");

export type Command = "quit" | "pause" | "resume" | "stats" | "memory";

const COMMANDS: Record<string, Command> = {
    quit: "quit",
    exit: "quit",
    q: "quit",
    stop: "pause",
    "stop posting": "pause",
    pause: "pause",
    resume: "resume",
    stats: "stats",
    memory: "memory",
};

export function parseCommand(input: string): Command | undefined {
    return COMMANDS[input.trim().toLowerCase()];
}

export type InputResult = "continue" | "quit";

/** Handle one submitted line. Resolves to "quit" when the user asked to leave. */
export async function handleInput(runtime: AgentRuntime, input: string): Promise<InputResult> {
    const text = input.trim();
    if (!text) return "continue";

    switch (parseCommand(text)) {
        case "quit":
            return "quit";
        case "pause":
            runtime.paused = true;
            runtime.output("Agent: Got it, I'll stop the auto cycle. Type 'resume' to restart.");
            return "continue";
        case "resume":
            runtime.paused = false;
            runtime.output("Agent: Resumed! I'll start posting again next cycle.");
            return "continue";
        case "stats":
            runtime.output(formatStats(runtime.stats, runtime.config.llm.model));
            return "continue";
        case "memory": {
            const summary = await runtime.memoryLock.run(() => runtime.memory.toContextString());
            runtime.output(`Memory Summary\n${summary}`);
            return "continue";
        }
        case undefined:
            await runtime.track(chatExchange(runtime, text));
            return "continue";
    }
}

/** One user message → agent loop → reply, then memory/history saves and a detached personality check. */
export async function chatExchange(runtime: AgentRuntime, text: string): Promise<string | undefined> {
    runtime.output(`You: ${text}`);
    activity.msgIn("CHAT", text);

    const messages = await runtime.history.append({ role: "user", content: text });
    const system = await runtime.memoryLock.run(() =>
        buildIdentity(runtime.personality.get(), runtime.config.forum.baseUrl, runtime.memory));

    runtime.thinking = true;
    const t0 = Date.now();
    let reply: string;
    try {
        const result = await runAgentLoop({
            messages,
            system,
            tools: runtime.tools,
            executor: runtime.executor,
            llm: runtime.llm,
            maxRounds: runtime.config.llm.maxRounds,
            label: "CHAT",
            onFirstOutput: () => { runtime.thinking = false; },
            onToolCall: call => runtime.output(`  [CHAT] [TOOL] ${call.name}(${JSON.stringify(call.input)})`),
        });
        runtime.recordLoopStats(result.stats);
        reply = loopText(result.outcome);
        activity.msgOut("CHAT", reply, result.stats.modelCalls, Date.now() - t0);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error("Chat exchange failed", err);
        runtime.output(`Agent: [error] ${message}`);
        return undefined;
    } finally {
        runtime.thinking = false;
    }

    runtime.output(`Agent: ${reply}`);
    await runtime.history.append({ role: "assistant", content: reply });
    await Promise.all([runtime.saveMemory(), runtime.history.save()]);

    runtime.supervisor.spawn("evolve-from-exchange", async signal => {
        await evolveFromExchange(
            { llm: runtime.llm, personality: runtime.personality, notify: runtime.output },
            text, reply, signal,
        );
    });
    return reply;
}

/** Input prompt, with a thinking marker while the model has not answered yet. */
export function promptFor(runtime: AgentRuntime): string {
    return runtime.thinking ? "  thinking... You: " : "You: ";
}

export function formatBanner(runtime: AgentRuntime): string[] {
    const rule = "═".repeat(50);
    const { memory } = runtime;
    const lines = [
        rule,
        `  forum-agent: ${runtime.agentName}`,
        "  Your AI agent for bot-book",
        `  Forum: ${runtime.config.forum.baseUrl}`,
        "",
        "  Type messages below and press Enter.",
        "  Commands: stop / resume / stats / memory / quit",
        rule,
    ];
    if (runtime.history.size > 0) {
        lines.push(`  Restored ${runtime.history.size} messages from last session`);
    }
    if (memory.postsRead.size > 0 || memory.postsCreated.length > 0) {
        lines.push(
            `  Memory loaded: ${memory.postsRead.size} posts read, ` +
            `${memory.postsCreated.length} created, ` +
            `${memory.botsInteracted.size} bots known`,
        );
    }
    lines.push("");
    return lines;
}
