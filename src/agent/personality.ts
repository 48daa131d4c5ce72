/**
 * Personality record — who the agent is on the forum.
 *
 * Stored as personality.json in the data directory. Every mutation goes through
 * PersonalityStore.update(), which serializes writers (interactive exchange and
 * cycle-triggered evolution both land here) and persists on change.
 *
 * @module agent/personality
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { Mutex } from "@/runtime/lock.ts";
import { log } from "@/logs/logger.ts";

const logger = log("personality");

// ── Schema ───────────────────────────────────────────

export const personalitySchema = z.object({
    name: z.string().default("Agent"),
    description: z.string().default(""),
    interests: z.array(z.string()).default([]),
    tone: z.string().default(""),
    opinions: z.array(z.string()).default([]),
    /** Standing instructions the user gave in chat */
    instructions: z.array(z.string()).default([]),
});

export type Personality = z.infer<typeof personalitySchema>;
export type PersonalityField = keyof Personality;

export const PERSONALITY_FIELDS: readonly PersonalityField[] = [
    "name", "description", "interests", "tone", "opinions", "instructions",
];

export function defaultPersonality(name = "Agent"): Personality {
    return personalitySchema.parse({ name });
}

/** Overlay the defined fields of `fields` on `current`. */
export function applyFields(current: Personality, fields: Partial<Personality>): Personality {
    return {
        name: fields.name ?? current.name,
        description: fields.description ?? current.description,
        interests: fields.interests ?? current.interests,
        tone: fields.tone ?? current.tone,
        opinions: fields.opinions ?? current.opinions,
        instructions: fields.instructions ?? current.instructions,
    };
}

export function samePersonality(a: Personality, b: Personality): boolean {
    return JSON.stringify(a) === JSON.stringify(b);
}

// ── Disk ─────────────────────────────────────────────

export async function loadPersonality(path: string, defaultName?: string): Promise<Personality> {
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch {
        return defaultPersonality(defaultName);
    }
    const parsed = personalitySchema.safeParse(safeJson(text));
    if (!parsed.success) {
        logger.warn(`Ignoring invalid personality file ${path}: ${parsed.error.issues[0]?.message ?? "not JSON"}`);
        return defaultPersonality(defaultName);
    }
    return parsed.data;
}

export async function savePersonality(path: string, personality: Personality): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(personality, null, 2), "utf-8");
}

function safeJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

// ── Store ────────────────────────────────────────────

export class PersonalityStore {
    private current: Personality;
    private readonly lock = new Mutex();

    constructor(initial: Personality, private readonly path: string) {
        this.current = initial;
    }

    /** Snapshot of the latest record. Safe to hold across an LLM call. */
    get(): Personality {
        return structuredClone(this.current);
    }

    /**
     * Compute the next record from the latest one and persist it if it changed.
     * Returns whether anything changed. A failed write is logged, not thrown.
     */
    update(next: (current: Personality) => Personality): Promise<boolean> {
        return this.lock.run(async () => {
            const candidate = next(this.get());
            if (samePersonality(candidate, this.current)) return false;
            this.current = candidate;
            await this.persist();
            return true;
        });
    }

    save(): Promise<void> {
        return this.lock.run(() => this.persist());
    }

    private async persist(): Promise<void> {
        try {
            await savePersonality(this.path, this.current);
        } catch (err) {
            logger.warn(`Could not save personality: ${err instanceof Error ? err.message : String(err)}`);
        }
    }
}
