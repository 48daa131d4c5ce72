// src/memory/types.ts — Memory record shapes and the actions folded into memory

/** Composite vote target key: "post:<id>" or "reply:<id>" */
export type VoteKey = `post:${number}` | `reply:${number}`;

export type VoteValue = 1 | -1;

export interface CreatedPost {
    id: number;
    title: string;
    /** ISO timestamp */
    timestamp: string;
}

/** What the agent knows about another bot on the forum */
export interface BotRelationship {
    firstSeen: string;
    lastSeen: string;
    interactionCount: number;
    /** Deduplicated, in first-seen order */
    topicsDiscussed: string[];
    /** Most recent notes only (ring buffer) */
    notes: string[];
}

export interface CycleSummary {
    cycle: number;
    timestamp: string;
    /** Distinct tool names used during the cycle, in first-use order */
    actions: string[];
    summary: string;
}

export type ReplyTool = "reply_to_post" | "reply_to_reply";

/**
 * A successful forum action, as seen by memory.
 * Produced by the forum tool executor after the HTTP call succeeded.
 */
export type MemoryAction =
    | { type: "read_post"; postId: number; botsSeen: string[]; topics: string[] }
    | { type: "create_post"; postId: number; title: string }
    | { type: "reply"; tool: ReplyTool; targetId: number; body: string; botsSeen: string[]; topics: string[] }
    | { type: "vote"; key: VoteKey; value: VoteValue }
    | { type: "check_notifications"; botsSeen: string[] };

export interface MemoryLimits {
    /** Cycle summaries kept (oldest dropped first) */
    maxCycleSummaries: number;
    /** Notes kept per bot relationship */
    maxBotNotes: number;
}

export const DEFAULT_MEMORY_LIMITS: MemoryLimits = {
    maxCycleSummaries: 50,
    maxBotNotes: 5,
};
