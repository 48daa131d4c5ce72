// src/channels/chat-store.ts — Shared conversation history
// One history for the whole process: interactive exchanges append to it, and every
// autonomous cycle is seeded with its most recent entries.
//
// Storage: <dataDir>/chat-history.json, a JSON array of { role, content } text
// entries. Only the last `maxPersisted` entries are written, and anything carrying
// structured tool blocks is dropped first.

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { encode } from "gpt-tokenizer";
import type { ModelMessage } from "ai";
import { z } from "zod";
import { Mutex } from "@/runtime/lock.ts";
import { log } from "@/logs/logger.ts";

const logger = log("chat-store");

const entrySchema = z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
});

export type ChatEntry = z.infer<typeof entrySchema>;

/** Flat tokens charged for a non-text part (tool call, image, ...) */
const NON_TEXT_PART_TOKENS = 256;

export function isTextEntry(message: ModelMessage): message is ChatEntry {
    return (message.role === "user" || message.role === "assistant") && typeof message.content === "string";
}

export function countTokens(message: ModelMessage): number {
    if (typeof message.content === "string") return encode(message.content).length;
    let total = 0;
    for (const part of message.content) {
        total += part.type === "text" ? encode(part.text).length : NON_TEXT_PART_TOKENS;
    }
    return total;
}

/**
 * Drop the oldest messages until the history fits `tokenBudget` (always keeping
 * the last two), then drop leading non-user messages: a conversation sent to the
 * model must open with a user turn.
 */
export function trimHistory(history: ModelMessage[], tokenBudget: number): ModelMessage[] {
    const trimmed = [...history];
    let total = trimmed.reduce((sum, m) => sum + countTokens(m), 0);
    while (total > tokenBudget && trimmed.length > 2) {
        const removed = trimmed.shift();
        if (removed) total -= countTokens(removed);
    }
    return startWithUser(trimmed);
}

/** Drop leading messages until the first user turn. */
export function startWithUser(messages: ModelMessage[]): ModelMessage[] {
    const first = messages.findIndex(m => m.role === "user");
    return first < 0 ? [] : messages.slice(first);
}

/** What gets written: the last `maxPersisted` entries, text-only ones kept. */
export function persistable(history: ModelMessage[], maxPersisted: number): ChatEntry[] {
    return history.slice(-maxPersisted).filter(isTextEntry).map(m => ({ role: m.role, content: m.content }));
}

export async function loadHistory(path: string): Promise<ChatEntry[]> {
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch {
        return [];
    }
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        logger.warn(`Ignoring unreadable history ${path}: ${err instanceof Error ? err.message : String(err)}`);
        return [];
    }
    if (!Array.isArray(raw)) return [];
    // Bad entries are skipped one by one
    return raw.flatMap(item => {
        const parsed = entrySchema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
    });
}

export async function saveHistory(path: string, history: ModelMessage[], maxPersisted: number): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(persistable(history, maxPersisted), null, 2), "utf-8");
}

export interface ChatHistoryOptions {
    path: string;
    maxPersisted: number;
    tokenBudget: number;
}

/** The process-wide history, guarded by its own lock. */
export class ChatHistory {
    private messages: ModelMessage[];
    private readonly lock = new Mutex();

    constructor(initial: ModelMessage[], private readonly options: ChatHistoryOptions) {
        this.messages = [...initial];
    }

    get size(): number {
        return this.messages.length;
    }

    /** Append, then trim to the token budget. Resolves to the history after the append. */
    append(...entries: ModelMessage[]): Promise<ModelMessage[]> {
        return this.lock.run(() => {
            this.messages = trimHistory([...this.messages, ...entries], this.options.tokenBudget);
            return [...this.messages];
        });
    }

    /** The last `count` messages (all of them when omitted). */
    recent(count?: number): Promise<ModelMessage[]> {
        return this.lock.run(() => {
            if (count === undefined) return [...this.messages];
            return count > 0 ? this.messages.slice(-count) : [];
        });
    }

    /** Best-effort write; a failure is logged and swallowed. */
    save(): Promise<void> {
        return this.lock.run(async () => {
            try {
                await saveHistory(this.options.path, this.messages, this.options.maxPersisted);
            } catch (err) {
                logger.warn(`Could not save history: ${err instanceof Error ? err.message : String(err)}`);
            }
        });
    }
}
