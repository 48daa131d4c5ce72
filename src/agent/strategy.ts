// src/agent/strategy.ts — Pick what the agent does in an autonomous cycle
// Weighted random draw over five strategies, weights conditioned on memory.
// The replied-ids reminder appended to every directive is advisory prompt text;
// nothing downstream enforces it.

import type { MemoryStore } from "@/memory/store.ts";

export type CycleStrategy = "follow_up" | "create_post" | "engage_reply" | "lurk" | "search_discover";

export const CYCLE_STRATEGIES: readonly CycleStrategy[] = [
    "follow_up", "create_post", "engage_reply", "lurk", "search_discover",
];

/** A post is "due" once more than this many cycles passed without one */
export const POST_DUE_AFTER_CYCLES = 4;

export const DEFAULT_REMINDER_COUNT = 20;

const DIRECTIVES: Record<CycleStrategy, string> = {
    follow_up: [
        "You are running an autonomous cycle. STRATEGY: Follow up on conversations.",
        "1. Check your notifications for any unread replies. This is your TOP PRIORITY",
        "2. For each notification where another bot replied to you, read that post and reply back thoughtfully",
        "3. If no notifications, browse 'new' posts and engage with 1-2",
        "4. Vote on posts you have opinions about",
        "",
        "Focus on continuing existing conversations. Be responsive and engaged.",
    ].join("\n"),
    create_post: [
        "You are running an autonomous cycle. STRATEGY: Create a new post.",
        "1. Check your notifications for any unread replies first",
        "2. Browse 'hot' and 'new' posts for inspiration",
        "3. Create an original post about something that interests you: share a thought, ask a question, or start a debate",
        "4. Vote on a few posts while browsing",
        "",
        "Be creative! Post something fresh and interesting that invites discussion.",
        "IMPORTANT: You MUST actually call the create_post tool to publish your post. Don't just compose it, submit it.",
    ].join("\n"),
    engage_reply: [
        "You are running an autonomous cycle. STRATEGY: Engage and reply.",
        "1. Check your notifications for any unread replies",
        "2. Browse recent posts (try 'hot' or 'new')",
        "3. Read 1-2 interesting posts in full",
        "4. Reply to posts where you have something genuine to say",
        "5. Vote on posts you have opinions about",
        "",
        "Be selective. Only reply when you have something worth saying.",
        "IMPORTANT: You MUST actually call reply_to_post or reply_to_reply to submit your reply. Don't just compose it, submit it.",
    ].join("\n"),
    lurk: [
        "You are running an autonomous cycle. STRATEGY: Lurk mode.",
        "1. Check your notifications for any unread replies (reply if someone directly addressed you)",
        "2. Browse 'hot' and 'new' posts",
        "3. Read 2-3 interesting posts",
        "4. Vote on posts and replies: upvote good content, downvote bad",
        "5. Do NOT create new posts or replies this cycle (unless replying to a direct notification)",
        "",
        "Just observe and vote. Take it easy this round.",
    ].join("\n"),
    search_discover: [
        "You are running an autonomous cycle. STRATEGY: Search and discover.",
        "1. Check your notifications for any unread replies",
        "2. Search for posts about topics that interest you",
        "3. Read 1-2 posts from the search results",
        "4. If you find something interesting, reply or vote",
        "",
        "Explore and discover new conversations on topics you care about.",
    ].join("\n"),
};

export type StrategyWeights = Record<CycleStrategy, number>;

export function strategyWeights(memory: MemoryStore): StrategyWeights {
    return {
        follow_up: memory.hasPendingConversations() ? 3 : 1,
        create_post: memory.cyclesSinceLastPost() > POST_DUE_AFTER_CYCLES ? 2 : 1,
        engage_reply: 2,
        lurk: 1,
        search_discover: 1,
    };
}

/** One weighted draw. `random` must return a value in [0, 1). */
export function weightedChoice(weights: StrategyWeights, random: () => number = Math.random): CycleStrategy {
    const total = CYCLE_STRATEGIES.reduce((sum, s) => sum + weights[s], 0);
    let point = random() * total;
    for (const strategy of CYCLE_STRATEGIES) {
        point -= weights[strategy];
        if (point < 0) return strategy;
    }
    return CYCLE_STRATEGIES[CYCLE_STRATEGIES.length - 1];
}

export function directiveFor(strategy: CycleStrategy): string {
    return DIRECTIVES[strategy];
}

export interface CycleDirective {
    strategy: CycleStrategy;
    directive: string;
}

export function pickCycleStrategy(memory: MemoryStore, random: () => number = Math.random): CycleDirective {
    const strategy = weightedChoice(strategyWeights(memory), random);
    return { strategy, directive: directiveFor(strategy) };
}

/** Directive plus the advisory "already replied" reminder, when there is anything to remind. */
export function buildCycleDirective(
    memory: MemoryStore,
    random: () => number = Math.random,
    reminderCount: number = DEFAULT_REMINDER_COUNT,
): CycleDirective {
    const picked = pickCycleStrategy(memory, random);
    const replied = memory.recentRepliedIds(reminderCount);
    if (replied.length === 0) return picked;
    return {
        ...picked,
        directive: `${picked.directive}\n\nREMINDER: You already replied to these post IDs: [${replied.join(", ")}]. Do NOT reply to them again.`,
    };
}
