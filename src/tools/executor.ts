/**
 * Tool Executor boundary.
 *
 * execute() is total: unknown tools, invalid arguments, HTTP errors and transport
 * failures all come back as a ToolOutcome failure, never as a thrown error, so
 * the agent loop can hand them to the model as ordinary tool output.
 *
 * The forum executor also folds every successful action into memory.
 *
 * @module tools/executor
 */

import type { MemoryStore } from "@/memory/store.ts";
import type { MemoryAction } from "@/memory/types.ts";
import type { Mutex } from "@/runtime/lock.ts";
import { forumCallSchema, isForumToolName, type ForumCall } from "@/tools/forum-tools.ts";
import { ForumHttpError, type ForumClient } from "@/tools/forum-client.ts";
import {
    authorOf, collectBotNames, parseJson, postId, postNode, postTitle, replyAuthors,
} from "@/tools/payload.ts";
import { log } from "@/logs/logger.ts";

const logger = log("tools/forum");

export type ToolFailureKind = "unknown_tool" | "invalid_args" | "http" | "network";

export interface ToolFailure {
    kind: ToolFailureKind;
    message: string;
}

export type ToolOutcome =
    | { ok: true; text: string }
    | { ok: false; failure: ToolFailure };

export interface ToolExecutor {
    execute(name: string, args: unknown): Promise<ToolOutcome>;
}

/** The text the model sees for an outcome. */
export function outcomeText(outcome: ToolOutcome): string {
    return outcome.ok ? outcome.text : outcome.failure.message;
}

function failure(kind: ToolFailureKind, message: string): ToolOutcome {
    return { ok: false, failure: { kind, message } };
}

/** Validate a raw invocation into one of the closed ForumCall variants. */
export function parseForumCall(name: string, args: unknown): { ok: true; call: ForumCall } | { ok: false; failure: ToolFailure } {
    if (!isForumToolName(name)) {
        return { ok: false, failure: { kind: "unknown_tool", message: `Unknown tool: ${name}` } };
    }
    const parsed = forumCallSchema.safeParse({ name, args: args ?? {} });
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(i => `${i.path.slice(1).join(".") || "args"}: ${i.message}`)
            .join("; ");
        return { ok: false, failure: { kind: "invalid_args", message: `Error: invalid arguments for ${name}: ${issues}` } };
    }
    return { ok: true, call: parsed.data };
}

interface PostContext {
    title?: string;
    author?: string;
}

interface ReplyContext {
    postId: number;
    author: string;
}

/** Posts whose read_post context is kept; older ones are evicted with their replies */
export const MAX_CACHED_POSTS = 200;

export interface ForumToolExecutorOptions {
    client: ForumClient;
    memory: MemoryStore;
    memoryLock: Mutex;
    /** The agent's own forum name, never recorded as a peer */
    selfName: () => string;
}

export class ForumToolExecutor implements ToolExecutor {
    /** What read_post taught us about posts and replies, for attributing later replies */
    private readonly posts = new Map<number, PostContext>();
    private readonly replies = new Map<number, ReplyContext>();

    constructor(private readonly options: ForumToolExecutorOptions) { }

    async execute(name: string, args: unknown): Promise<ToolOutcome> {
        const parsed = parseForumCall(name, args);
        if (!parsed.ok) return { ok: false, failure: parsed.failure };
        const { call } = parsed;

        if (call.name === "vote" && call.args.post_id === undefined && call.args.reply_id === undefined) {
            return failure("invalid_args", "Error: must provide either post_id or reply_id");
        }

        let text: string;
        try {
            text = await this.perform(call);
        } catch (err) {
            if (err instanceof ForumHttpError) return failure("http", err.message);
            const message = err instanceof Error ? err.message : String(err);
            logger.warn(`${call.name} failed: ${message}`);
            return failure("network", `Error: ${message}`);
        }

        const action = this.toMemoryAction(call, text);
        if (action) {
            await this.options.memoryLock.run(() => this.options.memory.recordAction(action));
        }
        return { ok: true, text };
    }

    private perform(call: ForumCall): Promise<string> {
        const { client } = this.options;
        switch (call.name) {
            case "list_posts":
                return client.request("GET", "/posts", { query: { ...call.args } });
            case "read_post":
                return client.request("GET", `/posts/${call.args.post_id}`);
            case "create_post":
                return client.request("POST", "/posts", { body: { title: call.args.title, body: call.args.body } });
            case "reply_to_post": {
                const { post_id, body, parent_id, influence } = call.args;
                return client.request("POST", `/posts/${post_id}/replies`, {
                    body: parent_id !== undefined ? { body, parent_id, influence } : { body, influence },
                });
            }
            case "reply_to_reply": {
                const { reply_id, body, influence } = call.args;
                return client.request("POST", `/replies/${reply_id}/replies`, { body: { body, influence } });
            }
            case "vote": {
                const { post_id, reply_id, value } = call.args;
                const path = post_id !== undefined ? `/posts/${post_id}/vote` : `/replies/${reply_id}/vote`;
                return client.request("POST", path, { body: { value } });
            }
            case "search_posts":
                return client.request("GET", "/search", { query: { q: call.args.query, page: call.args.page } });
            case "check_notifications":
                return client.request("GET", "/notifications", {
                    query: { unread_only: (call.args.unread_only ?? true) ? "true" : undefined },
                });
            case "list_bots":
                return client.request("GET", "/bots", { query: { ...call.args } });
            case "get_bot":
                return client.request("GET", `/bots/${encodeURIComponent(call.args.bot_name)}`);
            case "get_influence": {
                const { bot_name, page, per_page } = call.args;
                return client.request("GET", `/bots/${encodeURIComponent(bot_name)}/influence`, { query: { page, per_page } });
            }
        }
    }

    /** Translate a successful call + response into what memory should remember. */
    private toMemoryAction(call: ForumCall, responseText: string): MemoryAction | undefined {
        const self = this.options.selfName();
        const payload = parseJson(responseText);

        switch (call.name) {
            case "read_post": {
                const title = postTitle(payload);
                const author = authorOf(postNode(payload));
                this.rememberPost(call.args.post_id, { title, author: author !== self ? author : undefined });
                for (const [replyId, replyAuthor] of replyAuthors(payload)) {
                    this.replies.set(replyId, { postId: call.args.post_id, author: replyAuthor });
                }
                return {
                    type: "read_post",
                    postId: call.args.post_id,
                    botsSeen: collectBotNames(payload, self),
                    topics: title ? [title] : [],
                };
            }
            case "create_post": {
                const id = postId(payload);
                return id !== undefined ? { type: "create_post", postId: id, title: call.args.title } : undefined;
            }
            case "reply_to_post": {
                const post = this.posts.get(call.args.post_id);
                return {
                    type: "reply",
                    tool: "reply_to_post",
                    targetId: call.args.post_id,
                    body: call.args.body,
                    botsSeen: post?.author ? [post.author] : [],
                    topics: post?.title ? [post.title] : [],
                };
            }
            case "reply_to_reply": {
                const reply = this.replies.get(call.args.reply_id);
                const post = reply ? this.posts.get(reply.postId) : undefined;
                return {
                    type: "reply",
                    tool: "reply_to_reply",
                    targetId: call.args.reply_id,
                    body: call.args.body,
                    botsSeen: reply && reply.author !== self ? [reply.author] : [],
                    topics: post?.title ? [post.title] : [],
                };
            }
            case "vote": {
                const { post_id, reply_id, value } = call.args;
                if (post_id !== undefined) return { type: "vote", key: `post:${post_id}`, value };
                if (reply_id !== undefined) return { type: "vote", key: `reply:${reply_id}`, value };
                return undefined;
            }
            case "check_notifications":
                return { type: "check_notifications", botsSeen: collectBotNames(payload, self) };
            default:
                return undefined;
        }
    }

    /** Most recently read last; the oldest post and its replies go once the cache is full. */
    private rememberPost(id: number, context: PostContext): void {
        this.posts.delete(id);
        this.posts.set(id, context);
        if (this.posts.size <= MAX_CACHED_POSTS) return;

        const oldest = this.posts.keys().next();
        if (oldest.done) return;
        this.posts.delete(oldest.value);
        for (const [replyId, reply] of this.replies) {
            if (reply.postId === oldest.value) this.replies.delete(replyId);
        }
    }

    /** Posts and replies currently cached, for inspection. */
    get cacheSize(): { posts: number; replies: number } {
        return { posts: this.posts.size, replies: this.replies.size };
    }
}
