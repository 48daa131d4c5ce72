import { describe, expect, it } from "vitest";
import { MemoryStore } from "@/memory/store.ts";
import { Mutex } from "@/runtime/lock.ts";
import { ForumClient } from "@/tools/forum-client.ts";
import { ForumToolExecutor, MAX_CACHED_POSTS, outcomeText, parseForumCall } from "@/tools/executor.ts";
import { fakeFetch, type FakeRequest } from "@/testing/fakes.ts";

const POST_7 = {
    post: { id: 7, title: "On Rust", author: { name: "Bob" }, body: "Ownership is great" },
    replies: [
        { id: 70, author: "Cara", body: "Agreed", children: [{ id: 71, bot_name: "Tester", body: "me too" }] },
    ],
};

function setup(route: (req: FakeRequest) => { status?: number; body: unknown } = () => ({ body: {} })) {
    const fetch = fakeFetch(route);
    const memory = new MemoryStore();
    const client = new ForumClient({ baseUrl: "http://forum.test", apiKey: "test-secret", timeoutMs: 1000, fetch });
    const executor = new ForumToolExecutor({ client, memory, memoryLock: new Mutex(), selfName: () => "Tester" });
    return { fetch, memory, executor };
}

describe("ForumToolExecutor", () => {
    it("lists posts with query parameters and the API key", async () => {
        const { fetch, executor } = setup(() => ({ body: { posts: [] } }));

        const outcome = await executor.execute("list_posts", { sort: "hot", page: 2 });

        expect(outcome).toEqual({ ok: true, text: '{"posts":[]}' });
        expect(fetch.requests).toHaveLength(1);
        expect(fetch.requests[0].url).toBe("http://forum.test/api/v1/posts?sort=hot&page=2");
        expect(fetch.requests[0].method).toBe("GET");
        expect(fetch.requests[0].headers["x-api-key"]).toBe("test-secret");
    });

    it("records a read post, its title and the bots in it, never itself", async () => {
        const { memory, executor } = setup(() => ({ body: POST_7 }));

        await executor.execute("read_post", { post_id: 7 });

        expect(memory.postsRead.has(7)).toBe(true);
        expect([...memory.botsInteracted.keys()]).toEqual(["Bob", "Cara"]);
        expect(memory.botsInteracted.get("Bob")?.topicsDiscussed).toEqual(["On Rust"]);
    });

    it("attributes a reply to the author of the reply it answers", async () => {
        const { fetch, memory, executor } = setup(req => ({ body: req.method === "GET" ? POST_7 : { id: 72 } }));

        await executor.execute("read_post", { post_id: 7 });
        const outcome = await executor.execute("reply_to_reply", { reply_id: 70, body: "Good point", influence: 2 });

        expect(outcome.ok).toBe(true);
        expect(fetch.requests[1]).toMatchObject({
            url: "http://forum.test/api/v1/replies/70/replies",
            method: "POST",
            body: { body: "Good point", influence: 2 },
        });
        expect(memory.alreadyReplied(70)).toBe(true);
        expect(memory.alreadyReplied(7)).toBe(false);
        expect([...memory.postsReplied.keys()]).toEqual([70]);
        expect(memory.botsInteracted.get("Cara")).toMatchObject({
            interactionCount: 2,
            topicsDiscussed: ["On Rust"],
            notes: ["Replied: Good point"],
        });
    });

    it("attributes a top-level reply to the post's author", async () => {
        const { memory, executor } = setup(req => ({ body: req.method === "GET" ? POST_7 : { id: 73 } }));

        await executor.execute("read_post", { post_id: 7 });
        await executor.execute("reply_to_post", { post_id: 7, body: "Nice", influence: 1 });

        expect(memory.botsInteracted.get("Bob")?.notes).toEqual(["Replied: Nice"]);
        expect(memory.alreadyReplied(7)).toBe(true);
    });

    it.each([3, -4, 0])("sends influence %i with a reply to a post", async influence => {
        const { fetch, executor } = setup(() => ({ body: { ok: true } }));

        await executor.execute("reply_to_post", { post_id: 1, body: "Great post!", influence });

        expect(fetch.requests[0]).toMatchObject({
            url: "http://forum.test/api/v1/posts/1/replies",
            body: { body: "Great post!", influence },
        });
    });

    it("keeps parent_id alongside influence on nested replies", async () => {
        const { fetch, executor } = setup(() => ({ body: { ok: true } }));

        await executor.execute("reply_to_post", { post_id: 1, body: "Nested reply", influence: 2, parent_id: 42 });

        expect(fetch.requests[0].body).toEqual({ body: "Nested reply", parent_id: 42, influence: 2 });
    });

    it("replies to a reply it has never seen, with negative influence", async () => {
        const { fetch, memory, executor } = setup(() => ({ body: { ok: true } }));

        const outcome = await executor.execute("reply_to_reply", { reply_id: 10, body: "Hard disagree", influence: -5 });

        expect(outcome.ok).toBe(true);
        expect(fetch.requests[0].body).toEqual({ body: "Hard disagree", influence: -5 });
        expect(memory.alreadyReplied(10)).toBe(true);
        expect(memory.botsInteracted.size).toBe(0);
    });

    it.each([
        ["reply_to_post", { post_id: 1, body: "x" }, "influence: Required"],
        ["reply_to_reply", { reply_id: 1, body: "x", influence: 6 }, "influence: Number must be less than or equal to 5"],
        ["reply_to_post", { post_id: 1, body: "x", influence: -6 }, "influence: Number must be greater than or equal to -5"],
        ["reply_to_reply", { reply_id: 1, body: "x", influence: 1.5 }, "influence: Expected integer, received float"],
    ])("rejects %s without a valid influence", async (name, args, issue) => {
        const { fetch, executor } = setup();

        const outcome = await executor.execute(name, args);

        expect(outcome).toEqual({
            ok: false,
            failure: { kind: "invalid_args", message: `Error: invalid arguments for ${name}: ${issue}` },
        });
        expect(fetch.requests).toHaveLength(0);
    });

    it("reads a bot's influence history, paginated only when asked", async () => {
        const { fetch, memory, executor } = setup(() => ({ body: { items: [] } }));

        const outcome = await executor.execute("get_influence", { bot_name: "TestBot" });
        await executor.execute("get_influence", { bot_name: "TestBot", page: 2, per_page: 25 });

        expect(outcome).toEqual({ ok: true, text: '{"items":[]}' });
        expect(fetch.requests.map(r => [r.method, r.url])).toEqual([
            ["GET", "http://forum.test/api/v1/bots/TestBot/influence"],
            ["GET", "http://forum.test/api/v1/bots/TestBot/influence?page=2&per_page=25"],
        ]);
        expect(memory.botsInteracted.size).toBe(0);
    });

    it("keeps a bounded cache of read posts and their replies", async () => {
        const { executor } = setup(req => {
            const id = Number(req.url.split("/").at(-1));
            return { body: { post: { id, title: `Post ${id}` }, replies: [{ id: id * 1000, author: "Bob" }] } };
        });

        for (let id = 1; id <= MAX_CACHED_POSTS + 5; id++) {
            await executor.execute("read_post", { post_id: id });
        }

        expect(executor.cacheSize).toEqual({ posts: MAX_CACHED_POSTS, replies: MAX_CACHED_POSTS });
    });

    it("records a created post with the id the forum assigned", async () => {
        const { fetch, memory, executor } = setup(() => ({ body: { id: 55, title: "Hello" } }));

        await executor.execute("create_post", { title: "Hello", body: "First!" });

        expect(fetch.requests[0].body).toEqual({ title: "Hello", body: "First!" });
        expect(memory.postsCreated.map(p => [p.id, p.title])).toEqual([[55, "Hello"]]);
    });

    it("votes on replies through the reply endpoint", async () => {
        const { fetch, memory, executor } = setup(() => ({ body: { ok: true } }));

        await executor.execute("vote", { reply_id: 9, value: -1 });

        expect(fetch.requests[0].url).toBe("http://forum.test/api/v1/replies/9/vote");
        expect(fetch.requests[0].body).toEqual({ value: -1 });
        expect(memory.votesCast.get("reply:9")).toBe(-1);
    });

    it("refuses a vote without a target", async () => {
        const { fetch, executor } = setup();

        const outcome = await executor.execute("vote", { value: 1 });

        expect(outcome).toEqual({ ok: false, failure: { kind: "invalid_args", message: "Error: must provide either post_id or reply_id" } });
        expect(fetch.requests).toHaveLength(0);
    });

    it("asks for unread notifications by default and remembers who wrote", async () => {
        const { fetch, memory, executor } = setup(() => ({ body: [{ id: 1, from_bot: "Dee", post_id: 3 }] }));

        await executor.execute("check_notifications", {});
        await executor.execute("check_notifications", { unread_only: false });

        expect(fetch.requests.map(r => r.url)).toEqual([
            "http://forum.test/api/v1/notifications?unread_only=true",
            "http://forum.test/api/v1/notifications",
        ]);
        expect(memory.botsInteracted.get("Dee")?.interactionCount).toBe(2);
    });

    it("encodes search queries and bot names", async () => {
        const { fetch, executor } = setup(() => ({ body: [] }));

        await executor.execute("search_posts", { query: "rust lang" });
        await executor.execute("get_bot", { bot_name: "Bob Two" });

        expect(fetch.requests.map(r => r.url)).toEqual([
            "http://forum.test/api/v1/search?q=rust+lang",
            "http://forum.test/api/v1/bots/Bob%20Two",
        ]);
    });

    it("turns HTTP errors into failures carrying the forum's response", async () => {
        const { memory, executor } = setup(() => ({ status: 404, body: { detail: "Not found" } }));

        const outcome = await executor.execute("read_post", { post_id: 8 });

        expect(outcome).toEqual({ ok: false, failure: { kind: "http", message: 'HTTP error 404: {"detail":"Not found"}' } });
        expect(memory.postsRead.size).toBe(0);
    });

    it("turns transport errors into failures", async () => {
        const { executor } = setup(() => {
            throw new TypeError("fetch failed");
        });

        const outcome = await executor.execute("list_bots", {});

        expect(outcome).toEqual({ ok: false, failure: { kind: "network", message: "Error: fetch failed" } });
        expect(outcomeText(outcome)).toBe("Error: fetch failed");
    });

    it("rejects unknown tools and malformed arguments before any request", async () => {
        const { fetch, executor } = setup();

        expect(await executor.execute("delete_everything", {})).toEqual({
            ok: false,
            failure: { kind: "unknown_tool", message: "Unknown tool: delete_everything" },
        });
        const bad = await executor.execute("read_post", { post_id: "seven" });
        expect(bad.ok).toBe(false);
        expect(outcomeText(bad)).toMatch(/^Error: invalid arguments for read_post: post_id: /);
        expect(fetch.requests).toHaveLength(0);
    });
});

describe("parseForumCall", () => {
    it("validates into a tagged call", () => {
        expect(parseForumCall("vote", { post_id: 3, value: 1 })).toEqual({
            ok: true,
            call: { name: "vote", args: { post_id: 3, value: 1 } },
        });
    });

    it("treats missing arguments as an empty object", () => {
        expect(parseForumCall("list_bots", undefined)).toEqual({ ok: true, call: { name: "list_bots", args: {} } });
    });

    it("rejects a vote value other than 1 or -1", () => {
        expect(parseForumCall("vote", { post_id: 3, value: 2 }).ok).toBe(false);
    });
});
