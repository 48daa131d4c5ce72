/**
 * Cycle orchestrator — the autonomous side of the agent.
 *
 * After a warm-up delay, loops while the runtime is running:
 *   1. advance the cycle counter (mirrored into memory)
 *   2. paused → status note only; otherwise run one cycle and persist memory
 *   3. sleep the interval in one-second steps, so stop() lands within a second
 *
 * A failing cycle is reported and the schedule carries on. An in-flight agent
 * loop is never cut short; shutdown waits for it.
 *
 * @module cycle/orchestrator
 */

import type { ModelMessage } from "ai";
import { runAgentLoop, loopText, type LoopOutcome } from "@/agent/loop.ts";
import { buildCycleDirective, type CycleStrategy } from "@/agent/strategy.ts";
import { buildIdentity } from "@/agent/system-prompts/identity.ts";
import { evolveFromPosts, extractReadPostContent } from "@/agent/evolution.ts";
import { startWithUser } from "@/channels/chat-store.ts";
import { formatStatusLine } from "@/runtime/stats.ts";
import type { AgentRuntime } from "@/runtime/runtime.ts";
import { activity } from "@/logs/activity-log.ts";
import { log } from "@/logs/logger.ts";

const logger = log("cycle");

const SUMMARY_CHARS = 150;

export type Sleep = (ms: number) => Promise<void>;

const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface OrchestratorOptions {
    /** One-second tick, replaceable in tests */
    sleep?: Sleep;
    random?: () => number;
}

export interface CycleReport {
    cycle: number;
    strategy: CycleStrategy;
    outcome: LoopOutcome;
    /** Distinct tools used, in first-use order */
    actions: string[];
    summary: string;
}

/** Sleep `seconds`, checking `isRunning` before every one-second step. */
export async function sleepInterruptible(seconds: number, isRunning: () => boolean, tick: Sleep = sleep): Promise<void> {
    for (let i = 0; i < seconds; i++) {
        if (!isRunning()) return;
        await tick(1000);
    }
}

function formatInterval(seconds: number): string {
    return `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, "0")}`;
}

function formatArgs(input: unknown): string {
    const text = JSON.stringify(input) ?? "";
    return text.length > 120 ? `${text.slice(0, 117)}...` : text;
}

/** One autonomous cycle: strategy → agent loop → memory summary → (maybe) evolution. */
export async function runCycle(runtime: AgentRuntime, cycle: number, random: () => number = Math.random): Promise<CycleReport> {
    const { config, memory, memoryLock } = runtime;

    const { system, strategy, directive } = await memoryLock.run(() => {
        const picked = buildCycleDirective(memory, random, config.cycle.replyReminderCount);
        return {
            ...picked,
            system: buildIdentity(runtime.personality.get(), config.forum.baseUrl, memory),
        };
    });
    logger.info(`Cycle ${cycle} strategy: ${strategy}`);

    const context = await runtime.history.recent(config.cycle.contextMessages);
    const messages: ModelMessage[] = startWithUser([...context, { role: "user", content: directive }]);

    const result = await runAgentLoop({
        messages,
        system,
        tools: runtime.tools,
        executor: runtime.executor,
        llm: runtime.llm,
        maxRounds: config.llm.maxRounds,
        label: "AUTO",
        onToolCall: call => runtime.output(`  [AUTO] [TOOL] ${call.name}(${formatArgs(call.input)})`),
    });
    runtime.recordLoopStats(result.stats);

    const text = loopText(result.outcome);
    const actions = [...new Set(result.stats.toolsUsed)];
    const summary = text ? text.slice(0, SUMMARY_CHARS) : "no response";

    await memoryLock.run(() => memory.addCycleSummary(cycle, actions, summary));
    activity.cycle(cycle, actions, summary);

    if (text) runtime.output(`[AUTO] ${text}`);

    if (actions.includes("read_post")) {
        const posts = extractReadPostContent(result.transcript).slice(0, config.cycle.maxPostsForEvolution);
        if (posts.length > 0) {
            runtime.supervisor.spawn(`evolve-from-posts#${cycle}`, async signal => {
                await evolveFromPosts({ llm: runtime.llm, personality: runtime.personality, notify: runtime.output }, posts, signal);
            });
        }
    }

    return { cycle, strategy, outcome: result.outcome, actions, summary };
}

/** Run until runtime.stop(). Resolves within a second of the stop once no cycle is in flight. */
export async function runOrchestrator(runtime: AgentRuntime, options: OrchestratorOptions = {}): Promise<void> {
    const tick = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    const isRunning = () => runtime.running;
    const { intervalSeconds, warmupSeconds } = runtime.config.cycle;

    await sleepInterruptible(warmupSeconds, isRunning, tick);

    while (runtime.running) {
        const cycle = await runtime.nextCycle();

        if (runtime.paused) {
            runtime.output(`[AUTO] Cycle ${cycle}: paused. Type 'resume' to restart.`);
        } else {
            runtime.output(`[AUTO] Cycle ${cycle} starting...`);
            try {
                await runCycle(runtime, cycle, random);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`Cycle ${cycle} failed`, err);
                runtime.output(`[AUTO] Error: ${message}`);
            }
            runtime.stats.cyclesCompleted += 1;
            await runtime.saveMemory();
        }

        if (!runtime.running) break;
        runtime.output(
            `[AUTO] Next cycle in ${formatInterval(intervalSeconds)}... ` +
            `(${formatStatusLine(runtime.stats, cycle, intervalSeconds)})`,
        );
        await sleepInterruptible(intervalSeconds, isRunning, tick);
    }

    logger.info("Cycle orchestrator stopped");
}
