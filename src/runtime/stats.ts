/**
 * Session stats — tokens, estimated spend and forum actions since startup.
 *
 * Analytics only. Counts are derived from the tool names each loop reports,
 * so a failed create_post still counts as one attempt.
 *
 * @module runtime/stats
 */

import type { LoopStats } from "@/agent/loop.ts";

/** USD per 1M tokens: [input, output] */
export type ModelPrice = readonly [number, number];

export interface SessionStats {
    inputTokens: number;
    outputTokens: number;
    costUsd: number;
    cyclesCompleted: number;
    postsCreated: number;
    repliesSent: number;
    votesCast: number;
    /** epoch ms */
    startedAt: number;
}

export function createSessionStats(now: number = Date.now()): SessionStats {
    return {
        inputTokens: 0,
        outputTokens: 0,
        costUsd: 0,
        cyclesCompleted: 0,
        postsCreated: 0,
        repliesSent: 0,
        votesCast: 0,
        startedAt: now,
    };
}

/** Pricing lookup by model id, with or without the "<provider>/" prefix. */
export function priceFor(pricing: Record<string, ModelPrice>, model: string): ModelPrice | undefined {
    const modelId = model.includes("/") ? model.slice(model.indexOf("/") + 1) : model;
    return pricing[modelId] ?? pricing[model];
}

export function estimateCost(price: ModelPrice | undefined, inputTokens: number, outputTokens: number): number {
    if (!price) return 0;
    return (inputTokens * price[0] + outputTokens * price[1]) / 1_000_000;
}

/** Fold one loop's stats into the session totals. */
export function updateStats(stats: SessionStats, loop: LoopStats, price: ModelPrice | undefined): void {
    stats.inputTokens += loop.inputTokens;
    stats.outputTokens += loop.outputTokens;
    stats.costUsd += estimateCost(price, loop.inputTokens, loop.outputTokens);
    for (const tool of loop.toolsUsed) {
        if (tool === "create_post") stats.postsCreated++;
        else if (tool === "reply_to_post" || tool === "reply_to_reply") stats.repliesSent++;
        else if (tool === "vote") stats.votesCast++;
    }
}

export function formatUptime(ms: number): string {
    const totalSeconds = Math.max(0, Math.floor(ms / 1000));
    return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

export function formatStats(stats: SessionStats, model: string, now: number = Date.now()): string {
    const total = stats.inputTokens + stats.outputTokens;
    const n = (v: number) => v.toLocaleString("en-US");
    return [
        "Session Stats",
        `  Uptime: ${formatUptime(now - stats.startedAt)}`,
        `  Cycles completed: ${stats.cyclesCompleted}`,
        `  Total tokens: ${n(total)} (${n(stats.inputTokens)} in / ${n(stats.outputTokens)} out)`,
        `  Total cost: $${stats.costUsd.toFixed(4)}`,
        `  Posts created: ${stats.postsCreated}`,
        `  Replies sent: ${stats.repliesSent}`,
        `  Votes cast: ${stats.votesCast}`,
        `  Model: ${model}`,
    ].join("\n");
}

/** One-line status: cycle, spend, tokens, interval. */
export function formatStatusLine(stats: SessionStats, cycle: number, intervalSeconds: number): string {
    const total = stats.inputTokens + stats.outputTokens;
    return `cycle ${cycle} | $${stats.costUsd.toFixed(4)} | ${total.toLocaleString("en-US")} tokens | auto every ${intervalSeconds}s`;
}
