/**
 * Activity memory — what the agent has read, written, voted on, and who it has met.
 *
 * One instance per agent identity, owned by the runtime. Mutations happen only
 * through recordAction() and addCycleSummary(); bounded fields trim their oldest
 * entries. Persistence lives in ./persistence.ts.
 *
 * @module memory/store
 */

import {
    DEFAULT_MEMORY_LIMITS,
    type BotRelationship,
    type CreatedPost,
    type CycleSummary,
    type MemoryAction,
    type MemoryLimits,
    type VoteKey,
    type VoteValue,
} from "@/memory/types.ts";

/** Returned by the cycles-since queries when the action never happened */
export const NEVER = 999;

const REPLY_EXCERPT_CHARS = 100;
const NOTE_EXCERPT_CHARS = 60;

function clip(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export class MemoryStore {
    readonly postsRead = new Map<number, string>();
    readonly postsReplied = new Map<number, string>();
    readonly postsCreated: CreatedPost[] = [];
    readonly votesCast = new Map<VoteKey, VoteValue>();
    readonly botsInteracted = new Map<string, BotRelationship>();
    cycleSummaries: CycleSummary[] = [];
    cycleCount = 0;

    constructor(
        readonly limits: MemoryLimits = DEFAULT_MEMORY_LIMITS,
        private readonly now: () => Date = () => new Date(),
    ) { }

    // ── Mutations ──────────────────────────────────────

    recordAction(action: MemoryAction): void {
        const ts = this.now().toISOString();

        switch (action.type) {
            case "read_post":
                this.postsRead.set(action.postId, ts);
                for (const bot of action.botsSeen) this.touchBot(bot, action.topics);
                break;

            case "create_post":
                this.postsCreated.push({ id: action.postId, title: action.title, timestamp: ts });
                break;

            case "reply":
                this.postsReplied.set(action.targetId, action.body.slice(0, REPLY_EXCERPT_CHARS));
                for (const bot of action.botsSeen) {
                    this.touchBot(bot, action.topics, `Replied: ${action.body.slice(0, NOTE_EXCERPT_CHARS)}`);
                }
                break;

            case "vote":
                this.votesCast.set(action.key, action.value);
                break;

            case "check_notifications":
                for (const bot of action.botsSeen) this.touchBot(bot, []);
                break;
        }
    }

    addCycleSummary(cycle: number, actions: string[], summary: string): void {
        this.cycleSummaries.push({
            cycle,
            timestamp: this.now().toISOString(),
            actions: [...actions],
            summary,
        });
        this.cycleSummaries = this.cycleSummaries.slice(-this.limits.maxCycleSummaries);
    }

    private touchBot(name: string, topics: string[], note?: string): void {
        if (!name) return;
        const ts = this.now().toISOString();
        let bot = this.botsInteracted.get(name);
        if (!bot) {
            bot = { firstSeen: ts, lastSeen: ts, interactionCount: 0, topicsDiscussed: [], notes: [] };
            this.botsInteracted.set(name, bot);
        }
        bot.lastSeen = ts;
        bot.interactionCount += 1;
        for (const topic of topics) {
            if (topic && !bot.topicsDiscussed.includes(topic)) bot.topicsDiscussed.push(topic);
        }
        if (note) {
            bot.notes.push(note);
            bot.notes = bot.notes.slice(-this.limits.maxBotNotes);
        }
    }

    // ── Queries ────────────────────────────────────────

    alreadyReplied(id: number): boolean {
        return this.postsReplied.has(id);
    }

    hasPendingConversations(): boolean {
        return this.postsReplied.size > 0;
    }

    /** Most recent `count` replied-to ids, oldest first. */
    recentRepliedIds(count: number): number[] {
        return [...this.postsReplied.keys()].slice(-count);
    }

    /**
     * Cycles elapsed since the most recent cycle whose summary lists create_post.
     * Without such a summary: NEVER if nothing was ever created, otherwise the full
     * cycle count (the post predates every summary still kept).
     */
    cyclesSinceLastPost(): number {
        const last = this.lastCycleWith(["create_post"]);
        if (last !== undefined) return this.cycleCount - last;
        return this.postsCreated.length === 0 ? NEVER : this.cycleCount;
    }

    cyclesSinceLastReply(): number {
        if (this.postsReplied.size === 0) return NEVER;
        const last = this.lastCycleWith(["reply_to_post", "reply_to_reply"]);
        return last !== undefined ? this.cycleCount - last : NEVER;
    }

    private lastCycleWith(tools: string[]): number | undefined {
        for (let i = this.cycleSummaries.length - 1; i >= 0; i--) {
            const summary = this.cycleSummaries[i];
            if (summary.actions.some(a => tools.includes(a))) return summary.cycle;
        }
        return undefined;
    }

    // ── Rendering ──────────────────────────────────────

    relationshipsSummary(maxChars = 500): string {
        if (this.botsInteracted.size === 0) return "";
        const ranked = [...this.botsInteracted.entries()]
            .sort((a, b) => b[1].interactionCount - a[1].interactionCount);
        const lines = ["Bots you know:"];
        for (const [name, info] of ranked) {
            const topics = info.topicsDiscussed.length > 0 ? info.topicsDiscussed.slice(0, 3).join(", ") : "general";
            lines.push(`  ${name} (${info.interactionCount} interactions, topics: ${topics})`);
        }
        return clip(lines.join("\n"), maxChars);
    }

    /** Compact memory digest injected into the system prompt and shown by the `memory` command. */
    toContextString(maxChars = 2000): string {
        const parts: string[] = [];

        if (this.cycleSummaries.length > 0) {
            parts.push("Recent activity:");
            for (const cs of this.cycleSummaries.slice(-3)) {
                parts.push(`  Cycle ${cs.cycle}: ${cs.summary}`);
            }
        }

        if (this.postsCreated.length > 0) {
            const titles = this.postsCreated.slice(-5).map(p => `#${p.id} "${p.title}"`);
            parts.push(`Your recent posts: ${titles.join(", ")}`);
        }

        if (this.postsReplied.size > 0) {
            parts.push(`Posts you already replied to (DO NOT reply again): [${this.recentRepliedIds(10).join(", ")}]`);
        }

        const relationships = this.relationshipsSummary(400);
        if (relationships) parts.push(relationships);

        parts.push(
            `Session stats: ${this.postsRead.size} posts read, ` +
            `${this.postsReplied.size} replies sent, ` +
            `${this.postsCreated.length} posts created, ` +
            `${this.votesCast.size} votes cast`,
        );

        return clip(parts.join("\n"), maxChars);
    }
}
