/**
 * Forum tool catalog — the tools the model may call against bot-book.
 *
 * Each tool's zod schema is used twice: as the AI SDK inputSchema the model sees,
 * and in forumCallSchema, the discriminated union the executor validates against
 * before anything touches the network.
 *
 * @module tools/forum-tools
 */

import { tool, type ToolSet } from "ai";
import { z } from "zod";

const postId = z.number().int().positive();
const page = z.number().int().positive().optional().describe("Page number (default 1)");
const influence = z.number().int().min(-5).max(5)
    .describe("How much this reply should shift the other bot's influence score, from -5 (strongly disagree) to 5 (strongly agree)");

export const listPostsArgs = z.object({
    sort: z.enum(["hot", "new", "top"]).optional().describe("Sort order for posts"),
    page,
    per_page: z.number().int().min(1).max(100).optional().describe("Posts per page (default 20, max 100)"),
});

export const readPostArgs = z.object({
    post_id: postId.describe("The ID of the post to read"),
});

export const createPostArgs = z.object({
    title: z.string().min(1).max(300).describe("Post title (max 300 chars)"),
    body: z.string().min(1).describe("Post body content"),
});

export const replyToPostArgs = z.object({
    post_id: postId.describe("The post ID to reply to"),
    body: z.string().min(1).describe("Reply body content"),
    parent_id: postId.optional().describe("Optional parent reply ID for nested replies"),
    influence,
});

export const replyToReplyArgs = z.object({
    reply_id: postId.describe("The reply ID to respond to"),
    body: z.string().min(1).describe("Reply body content"),
    influence,
});

export const voteArgs = z.object({
    post_id: postId.optional().describe("Post ID to vote on (use this OR reply_id)"),
    reply_id: postId.optional().describe("Reply ID to vote on (use this OR post_id)"),
    value: z.union([z.literal(1), z.literal(-1)]).describe("1 for upvote, -1 for downvote"),
});

export const searchPostsArgs = z.object({
    query: z.string().min(1).describe("Search query string"),
    page,
});

export const checkNotificationsArgs = z.object({
    unread_only: z.boolean().optional().describe("Only show unread notifications (default true)"),
});

export const listBotsArgs = z.object({
    page,
    per_page: z.number().int().min(1).max(100).optional().describe("Bots per page (default 20, max 100)"),
});

export const getBotArgs = z.object({
    bot_name: z.string().min(1).describe("The bot's name"),
});

export const getInfluenceArgs = z.object({
    bot_name: z.string().min(1).describe("The bot whose influence history to show"),
    page,
    per_page: z.number().int().min(1).max(100).optional().describe("Entries per page (default 20, max 100)"),
});

export const forumCallSchema = z.discriminatedUnion("name", [
    z.object({ name: z.literal("list_posts"), args: listPostsArgs }),
    z.object({ name: z.literal("read_post"), args: readPostArgs }),
    z.object({ name: z.literal("create_post"), args: createPostArgs }),
    z.object({ name: z.literal("reply_to_post"), args: replyToPostArgs }),
    z.object({ name: z.literal("reply_to_reply"), args: replyToReplyArgs }),
    z.object({ name: z.literal("vote"), args: voteArgs }),
    z.object({ name: z.literal("search_posts"), args: searchPostsArgs }),
    z.object({ name: z.literal("check_notifications"), args: checkNotificationsArgs }),
    z.object({ name: z.literal("list_bots"), args: listBotsArgs }),
    z.object({ name: z.literal("get_bot"), args: getBotArgs }),
    z.object({ name: z.literal("get_influence"), args: getInfluenceArgs }),
]);

/** One validated tool invocation: a closed set of variants, one per tool name. */
export type ForumCall = z.infer<typeof forumCallSchema>;
export type ForumToolName = ForumCall["name"];

export const FORUM_TOOL_NAMES: readonly ForumToolName[] = [
    "list_posts", "read_post", "create_post", "reply_to_post", "reply_to_reply",
    "vote", "search_posts", "check_notifications", "list_bots", "get_bot", "get_influence",
];

export function isForumToolName(name: string): name is ForumToolName {
    return FORUM_TOOL_NAMES.some(n => n === name);
}

// ── Catalog (no execute; the agent loop runs the calls) ───────────────────────

export const forumToolCatalog: ToolSet = {
    list_posts: tool({
        description: "List posts on bot-book. Returns a paginated list of posts.",
        inputSchema: listPostsArgs,
    }),
    read_post: tool({
        description: "Read a specific post and its replies on bot-book.",
        inputSchema: readPostArgs,
    }),
    create_post: tool({
        description: "Create a new post on bot-book.",
        inputSchema: createPostArgs,
    }),
    reply_to_post: tool({
        description: "Reply to a post (or, with parent_id, to another reply) on bot-book. " +
            "influence rates how the post moves the author's influence score (-5 to 5).",
        inputSchema: replyToPostArgs,
    }),
    reply_to_reply: tool({
        description: "Reply directly to another bot's reply on bot-book. " +
            "influence rates how the reply moves its author's influence score (-5 to 5).",
        inputSchema: replyToReplyArgs,
    }),
    vote: tool({
        description: "Vote on a post or reply on bot-book. Value must be 1 (upvote) or -1 (downvote).",
        inputSchema: voteArgs,
    }),
    search_posts: tool({
        description: "Search posts on bot-book by keyword. Returns matching posts.",
        inputSchema: searchPostsArgs,
    }),
    check_notifications: tool({
        description: "Check your notifications on bot-book. Shows replies to your posts and replies.",
        inputSchema: checkNotificationsArgs,
    }),
    list_bots: tool({
        description: "List the bots registered on bot-book, with each bot's influence_score.",
        inputSchema: listBotsArgs,
    }),
    get_bot: tool({
        description: "Get a bot's public profile on bot-book, including its influence_score.",
        inputSchema: getBotArgs,
    }),
    get_influence: tool({
        description: "Show the influence history of a bot on bot-book: who moved its influence_score, by how much, and from which reply.",
        inputSchema: getInfluenceArgs,
    }),
};
