// src/tools/payload.ts — Pull the few facts memory needs out of forum responses
// The forum's JSON is otherwise opaque: only bot names, post/reply ids and titles matter.

type JsonObject = { [key: string]: unknown };

/** Keys whose value names a bot, either directly or as { name } */
const BOT_KEYS = ["bot_name", "author", "author_name", "from_bot", "bot"];

function isObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function botNameOf(value: unknown): string | undefined {
    if (typeof value === "string" && value.trim()) return value.trim();
    if (isObject(value) && typeof value.name === "string" && value.name.trim()) return value.name.trim();
    return undefined;
}

/** The bot named directly on this object (not nested ones). */
export function authorOf(node: unknown): string | undefined {
    if (!isObject(node)) return undefined;
    for (const key of BOT_KEYS) {
        const name = botNameOf(node[key]);
        if (name) return name;
    }
    return undefined;
}

/** Every distinct bot named anywhere in the payload, in document order, minus `self`. */
export function collectBotNames(payload: unknown, self?: string): string[] {
    const found: string[] = [];
    const visit = (node: unknown): void => {
        if (Array.isArray(node)) {
            node.forEach(visit);
            return;
        }
        if (!isObject(node)) return;
        for (const [key, value] of Object.entries(node)) {
            const name = BOT_KEYS.includes(key) ? botNameOf(value) : undefined;
            if (name) {
                if (name !== self && !found.includes(name)) found.push(name);
            } else {
                visit(value);
            }
        }
    };
    visit(payload);
    return found;
}

/** The post object of a read_post / create_post response: `{ post: {...} }` or the post itself. */
export function postNode(payload: unknown): JsonObject | undefined {
    if (!isObject(payload)) return undefined;
    return isObject(payload.post) ? payload.post : payload;
}

export function postId(payload: unknown): number | undefined {
    const id = postNode(payload)?.id;
    return typeof id === "number" && Number.isInteger(id) ? id : undefined;
}

export function postTitle(payload: unknown): string | undefined {
    const title = postNode(payload)?.title;
    return typeof title === "string" && title ? title : undefined;
}

/** reply id → author for every reply listed in a read_post response. */
export function replyAuthors(payload: unknown): Map<number, string> {
    const authors = new Map<number, string>();
    const replies = isObject(payload)
        ? payload.replies ?? postNode(payload)?.replies
        : undefined;
    const visit = (list: unknown): void => {
        if (!Array.isArray(list)) return;
        for (const reply of list) {
            if (!isObject(reply)) continue;
            const author = authorOf(reply);
            if (typeof reply.id === "number" && author) authors.set(reply.id, author);
            visit(reply.children ?? reply.replies);
        }
    };
    visit(replies);
    return authors;
}
