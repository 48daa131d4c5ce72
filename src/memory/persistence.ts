// src/memory/persistence.ts — memory.json load/save
// Post ids are integers in memory and strings as JSON object keys.
// A missing or corrupt document loads as an empty store; it is never fatal.

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { MemoryStore } from "@/memory/store.ts";
import { DEFAULT_MEMORY_LIMITS, type MemoryLimits, type VoteKey } from "@/memory/types.ts";
import { log } from "@/logs/logger.ts";

const logger = log("memory");

const botSchema = z.object({
    first_seen: z.string(),
    last_seen: z.string(),
    interaction_count: z.number().int().nonnegative(),
    topics_discussed: z.array(z.string()).default([]),
    notes: z.array(z.string()).default([]),
});

const documentSchema = z.object({
    posts_read: z.record(z.string()).default({}),
    posts_replied: z.record(z.string()).default({}),
    posts_created: z.array(z.object({
        id: z.number().int(),
        title: z.string(),
        timestamp: z.string(),
    })).default([]),
    votes_cast: z.record(z.union([z.literal(1), z.literal(-1)])).default({}),
    bots_interacted: z.record(botSchema).default({}),
    cycle_summaries: z.array(z.object({
        cycle: z.number().int(),
        timestamp: z.string(),
        actions: z.array(z.string()),
        summary: z.string(),
    })).default([]),
    cycle_count: z.number().int().nonnegative().default(0),
});

export type MemoryDocument = z.infer<typeof documentSchema>;

const VOTE_KEY = /^(post|reply):\d+$/;

function isVoteKey(key: string): key is VoteKey {
    return VOTE_KEY.test(key);
}

function intKeyed(record: Record<string, string>): Array<[number, string]> {
    return Object.entries(record)
        .map(([k, v]): [number, string] => [Number(k), v])
        .filter(([k]) => Number.isInteger(k));
}

export function toDocument(store: MemoryStore): MemoryDocument {
    const bots: MemoryDocument["bots_interacted"] = {};
    for (const [name, b] of store.botsInteracted) {
        bots[name] = {
            first_seen: b.firstSeen,
            last_seen: b.lastSeen,
            interaction_count: b.interactionCount,
            topics_discussed: [...b.topicsDiscussed],
            notes: [...b.notes],
        };
    }
    return {
        posts_read: Object.fromEntries([...store.postsRead].map(([k, v]) => [String(k), v])),
        posts_replied: Object.fromEntries([...store.postsReplied].map(([k, v]) => [String(k), v])),
        posts_created: store.postsCreated.map(p => ({ ...p })),
        votes_cast: Object.fromEntries(store.votesCast),
        bots_interacted: bots,
        cycle_summaries: store.cycleSummaries.map(c => ({ ...c, actions: [...c.actions] })),
        cycle_count: store.cycleCount,
    };
}

export function fromDocument(raw: unknown, limits: MemoryLimits = DEFAULT_MEMORY_LIMITS): MemoryStore {
    const doc = documentSchema.parse(raw);
    const store = new MemoryStore(limits);

    for (const [id, ts] of intKeyed(doc.posts_read)) store.postsRead.set(id, ts);
    for (const [id, excerpt] of intKeyed(doc.posts_replied)) store.postsReplied.set(id, excerpt);
    store.postsCreated.push(...doc.posts_created);
    for (const [key, value] of Object.entries(doc.votes_cast)) {
        if (isVoteKey(key)) store.votesCast.set(key, value);
    }
    for (const [name, b] of Object.entries(doc.bots_interacted)) {
        store.botsInteracted.set(name, {
            firstSeen: b.first_seen,
            lastSeen: b.last_seen,
            interactionCount: b.interaction_count,
            topicsDiscussed: b.topics_discussed,
            notes: b.notes.slice(-limits.maxBotNotes),
        });
    }
    store.cycleSummaries = doc.cycle_summaries.slice(-limits.maxCycleSummaries);
    store.cycleCount = doc.cycle_count;
    return store;
}

export async function loadMemory(path: string, limits: MemoryLimits = DEFAULT_MEMORY_LIMITS): Promise<MemoryStore> {
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch {
        return new MemoryStore(limits);
    }
    try {
        return fromDocument(JSON.parse(text), limits);
    } catch (err) {
        logger.warn(`Ignoring unreadable memory file ${path}: ${err instanceof Error ? err.message : String(err)}`);
        return new MemoryStore(limits);
    }
}

/** Write the store to disk. Throws on I/O failure. */
export async function saveMemory(store: MemoryStore, path: string): Promise<void> {
    const json = JSON.stringify(toDocument(store), null, 2);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, json, "utf-8");
}
