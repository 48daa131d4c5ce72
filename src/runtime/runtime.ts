/**
 * AgentRuntime — every piece of mutable state the process shares between the
 * interactive channel, the cycle orchestrator and background evolution tasks.
 *
 * Built once at startup (bootstrapRuntime) and passed by reference. Each shared
 * structure carries its own lock:
 *   memory       memoryLock (Mutex)
 *   personality  PersonalityStore (internal lock)
 *   history      ChatHistory (internal lock)
 *
 * @module runtime/runtime
 */

import type { ToolSet } from "ai";
import type { AppConfig, Credentials } from "@/config.ts";
import type { LoopStats } from "@/agent/loop.ts";
import { createLlmClient, type LlmClient } from "@/llm/client.ts";
import { getModel } from "@/providers/index.ts";
import { MemoryStore } from "@/memory/store.ts";
import { loadMemory, saveMemory } from "@/memory/persistence.ts";
import { loadPersonality, PersonalityStore } from "@/agent/personality.ts";
import { ChatHistory, loadHistory } from "@/channels/chat-store.ts";
import { ForumClient, type FetchLike } from "@/tools/forum-client.ts";
import { ForumToolExecutor, type ToolExecutor } from "@/tools/executor.ts";
import { forumToolCatalog } from "@/tools/forum-tools.ts";
import { Mutex } from "@/runtime/lock.ts";
import { TaskSupervisor } from "@/runtime/supervisor.ts";
import { createSessionStats, priceFor, updateStats, type SessionStats } from "@/runtime/stats.ts";
import { statePaths, type StatePaths } from "@/paths.ts";
import { log } from "@/logs/logger.ts";

const logger = log("runtime");

export type OutputSink = (line: string) => void;

export interface AgentRuntimeDeps {
    config: AppConfig;
    memory: MemoryStore;
    personality: PersonalityStore;
    history: ChatHistory;
    llm: LlmClient;
    /** Built against this runtime's memory and lock, hence a factory */
    executor: (runtime: AgentRuntime) => ToolExecutor;
    tools?: ToolSet;
    output?: OutputSink;
    paths?: StatePaths;
    now?: () => number;
}

export class AgentRuntime {
    readonly config: AppConfig;
    readonly paths: StatePaths;
    readonly memory: MemoryStore;
    readonly memoryLock = new Mutex();
    readonly personality: PersonalityStore;
    readonly history: ChatHistory;
    readonly llm: LlmClient;
    readonly executor: ToolExecutor;
    readonly tools: ToolSet;
    readonly supervisor = new TaskSupervisor();
    readonly stats: SessionStats;
    readonly output: OutputSink;

    running = true;
    paused = false;
    /** Starts from the persisted count so cycle numbers keep increasing across restarts */
    cycleCount: number;

    private busy = false;
    private readonly thinkingListeners = new Set<(thinking: boolean) => void>();
    /** Chat exchanges still running; shutdown waits for them */
    private readonly exchanges = new Set<Promise<unknown>>();

    constructor(deps: AgentRuntimeDeps) {
        this.config = deps.config;
        this.paths = deps.paths ?? statePaths(deps.config.dataDir);
        this.memory = deps.memory;
        this.personality = deps.personality;
        this.history = deps.history;
        this.llm = deps.llm;
        this.tools = deps.tools ?? forumToolCatalog;
        this.output = deps.output ?? (line => console.log(line));
        this.stats = createSessionStats(deps.now?.() ?? Date.now());
        this.cycleCount = deps.memory.cycleCount;
        this.executor = deps.executor(this);
    }

    get agentName(): string {
        return this.personality.get().name;
    }

    /** True while a chat exchange waits for the model's first output */
    get thinking(): boolean {
        return this.busy;
    }

    set thinking(value: boolean) {
        if (value === this.busy) return;
        this.busy = value;
        for (const listener of this.thinkingListeners) listener(value);
    }

    /** Subscribe to thinking on/off. Returns the unsubscribe function. */
    onThinkingChange(listener: (thinking: boolean) => void): () => void {
        this.thinkingListeners.add(listener);
        return () => {
            this.thinkingListeners.delete(listener);
        };
    }

    /** Register an in-flight chat exchange so shutdown can wait for it. */
    track<T>(exchange: Promise<T>): Promise<T> {
        this.exchanges.add(exchange);
        const forget = () => {
            this.exchanges.delete(exchange);
        };
        exchange.then(forget, forget);
        return exchange;
    }

    get pendingExchanges(): number {
        return this.exchanges.size;
    }

    /** Advance the cycle counter and mirror it into memory. */
    nextCycle(): Promise<number> {
        return this.memoryLock.run(() => {
            this.cycleCount += 1;
            this.memory.cycleCount = this.cycleCount;
            return this.cycleCount;
        });
    }

    recordLoopStats(loop: LoopStats): void {
        updateStats(this.stats, loop, priceFor(this.config.llm.pricing, this.config.llm.model));
    }

    /** Best-effort: a failed write is logged, never thrown. */
    saveMemory(): Promise<void> {
        return this.memoryLock.run(async () => {
            try {
                await saveMemory(this.memory, this.paths.memory);
            } catch (err) {
                logger.warn(`Could not save memory: ${err instanceof Error ? err.message : String(err)}`);
            }
        });
    }

    stop(): void {
        this.running = false;
    }

    /**
     * Stop scheduling, let in-flight chat exchanges finish their loop, give
     * background tasks `drainMs` to finish, then persist history, personality
     * and memory.
     */
    async shutdown(drainMs = 5000): Promise<void> {
        this.stop();
        while (this.exchanges.size > 0) {
            await Promise.allSettled([...this.exchanges]);
        }
        await this.supervisor.close(drainMs);
        await Promise.all([this.history.save(), this.personality.save(), this.saveMemory()]);
    }
}

export interface BootstrapOptions {
    output?: OutputSink;
    fetch?: FetchLike;
}

/** Load persisted state and wire the production LLM and forum clients. */
export async function bootstrapRuntime(
    config: AppConfig,
    credentials: Credentials,
    options: BootstrapOptions = {},
): Promise<AgentRuntime> {
    const paths = statePaths(config.dataDir);

    const limits = {
        maxCycleSummaries: config.memory.maxCycleSummaries,
        maxBotNotes: config.memory.maxBotNotes,
    };
    const [memory, personality, history] = await Promise.all([
        loadMemory(paths.memory, limits),
        loadPersonality(paths.personality, config.agent.defaultName),
        loadHistory(paths.history),
    ]);

    const llm = createLlmClient(getModel(config.llm.model, credentials.llmApiKey), {
        maxOutputTokens: config.llm.maxOutputTokens,
        retry: config.retry,
    });

    const forum = new ForumClient({
        baseUrl: config.forum.baseUrl,
        apiKey: credentials.forumApiKey,
        timeoutMs: config.forum.httpTimeoutMs,
        fetch: options.fetch,
    });

    return new AgentRuntime({
        config,
        paths,
        memory,
        personality: new PersonalityStore(personality, paths.personality),
        history: new ChatHistory(history, {
            path: paths.history,
            maxPersisted: config.history.maxPersisted,
            tokenBudget: config.history.tokenBudget,
        }),
        llm,
        executor: runtime => new ForumToolExecutor({
            client: forum,
            memory: runtime.memory,
            memoryLock: runtime.memoryLock,
            selfName: () => runtime.agentName,
        }),
        output: options.output,
    });
}
