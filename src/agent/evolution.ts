/**
 * Personality evolution — two gated one-shot evaluations.
 *
 *   exchange  After an interactive exchange, may overwrite any personality field
 *             the user appears to be shaping.
 *   content   After a cycle that read posts, may ADD interests/opinions. Never
 *             removes: the result is a set union with what the agent already had.
 *
 * The model answers NO_UPDATE or a JSON object. Anything unparsable is treated
 * as unchanged. Both run detached on the runtime's TaskSupervisor.
 *
 * @module agent/evolution
 */

import type { ModelMessage } from "ai";
import { z } from "zod";
import type { LlmClient } from "@/llm/client.ts";
import {
    applyFields, PERSONALITY_FIELDS,
    type Personality, type PersonalityStore,
} from "@/agent/personality.ts";

export const NO_UPDATE = "NO_UPDATE";

/** Posts handed to one content evaluation */
export const MAX_POSTS_PER_EVALUATION = 10;

export type PersonalityVerdict =
    | { kind: "unchanged" }
    | { kind: "updated"; fields: Partial<Personality> };

const UNCHANGED: PersonalityVerdict = { kind: "unchanged" };

// ── Parsing ──────────────────────────────────────────

/** The JSON object between the first "{" and the last "}", if it parses. */
function extractJsonObject(raw: string): unknown {
    const start = raw.indexOf("{");
    const end = raw.lastIndexOf("}");
    if (start < 0 || end <= start) return undefined;
    try {
        return JSON.parse(raw.slice(start, end + 1));
    } catch {
        return undefined;
    }
}

// Invalid or empty values drop out individually; the other fields still count.
const text = z.string().trim().min(1).optional().catch(undefined);
const list = z.array(z.string().trim().min(1)).min(1).optional().catch(undefined);

const exchangeUpdateSchema = z.object({
    name: text,
    description: text,
    interests: list,
    tone: text,
    opinions: list,
    instructions: list,
});

const contentUpdateSchema = z.object({
    interests: list,
    opinions: list,
});

function definedFieldCount(fields: Partial<Personality>): number {
    return PERSONALITY_FIELDS.filter(key => fields[key] !== undefined).length;
}

export function parseExchangeVerdict(raw: string): PersonalityVerdict {
    if (raw.includes(NO_UPDATE)) return UNCHANGED;
    const parsed = exchangeUpdateSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success || definedFieldCount(parsed.data) === 0) return UNCHANGED;
    return { kind: "updated", fields: parsed.data };
}

export function parseContentVerdict(raw: string): PersonalityVerdict {
    if (raw.includes(NO_UPDATE)) return UNCHANGED;
    const parsed = contentUpdateSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success || definedFieldCount(parsed.data) === 0) return UNCHANGED;
    return { kind: "updated", fields: parsed.data };
}

// ── Merging ──────────────────────────────────────────

function union(existing: string[], proposed: string[] | undefined): string[] {
    const merged = [...existing];
    for (const item of proposed ?? []) {
        if (!merged.includes(item)) merged.push(item);
    }
    return merged;
}

/** Content-driven merge: only interests/opinions, only additions. */
export function mergeAdditive(current: Personality, fields: Partial<Personality>): Personality {
    return {
        ...current,
        interests: union(current.interests, fields.interests),
        opinions: union(current.opinions, fields.opinions),
    };
}

// ── Prompts ──────────────────────────────────────────

const EXCHANGE_SYSTEM = "You analyze conversations to extract personality traits and instructions.";

const CONTENT_SYSTEM =
    "You strictly evaluate whether posts contain genuinely compelling points worth absorbing into a personality. " +
    `You almost always return ${NO_UPDATE}.`;

export function exchangePrompt(personality: Personality, userMessage: string, agentReply: string): string {
    return [
        `Current personality:\n${JSON.stringify(personality, null, 2)}`,
        "",
        `User said: ${userMessage}`,
        `Agent replied: ${agentReply}`,
        "",
        "Based on this exchange, should the personality be updated? " +
        "The user might be shaping the agent's identity, interests, tone, or giving instructions.",
        "",
        "If updates are needed, return ONLY a JSON object with the updated personality fields. " +
        "Keep existing values unless explicitly changed. " +
        `If no updates needed, return exactly: ${NO_UPDATE}`,
        "",
        "Fields: name (string), description (string), interests (list of strings), " +
        "tone (string), opinions (list of strings), instructions (list of strings)",
    ].join("\n");
}

export function contentPrompt(personality: Personality, posts: string[]): string {
    const postsText = posts.slice(0, MAX_POSTS_PER_EVALUATION).join("\n\n---\n\n");
    return [
        `Current interests:\n${JSON.stringify(personality.interests, null, 2)}`,
        "",
        `Current opinions:\n${JSON.stringify(personality.opinions, null, 2)}`,
        "",
        `Posts read this cycle:\n${postsText}`,
        "",
        "You are evaluating whether any of these posts should influence this agent's personality.",
        "",
        `SET A VERY HIGH BAR. Most posts should result in ${NO_UPDATE}.`,
        "Only update if a post makes a genuinely strong, well-argued, thought-provoking point " +
        "that would meaningfully shift this agent's thinking or introduce a new deep interest.",
        "",
        "Examples of what QUALIFIES:",
        "- A compelling argument that challenges an existing opinion",
        "- An insight that opens a genuinely new area of interest",
        "- A well-reasoned stance the agent hadn't considered",
        "",
        "Examples of what does NOT qualify:",
        "- Generic opinions or mild takes",
        "- Anything the agent already believes or is interested in",
        "- Casual conversation, jokes, or questions without substance",
        "- Short or low-effort posts",
        "",
        "You may ONLY modify:",
        "- interests: add new ones (do not remove existing)",
        "- opinions: add new stances (do not remove existing)",
        "",
        "If any update is warranted, return ONLY a JSON object like:",
        '{"interests": ["existing1", "existing2", "new_interest"], "opinions": ["existing1", "new_opinion"]}',
        "",
        "Include ALL existing values plus any additions.",
        `If no update is warranted (the usual case), return exactly: ${NO_UPDATE}`,
    ].join("\n");
}

// ── Evaluations ──────────────────────────────────────

export async function evaluateExchange(
    llm: LlmClient,
    personality: Personality,
    userMessage: string,
    agentReply: string,
    abortSignal?: AbortSignal,
): Promise<PersonalityVerdict> {
    const raw = await llm.completeText(exchangePrompt(personality, userMessage, agentReply), EXCHANGE_SYSTEM, abortSignal);
    return parseExchangeVerdict(raw);
}

export async function evaluatePosts(
    llm: LlmClient,
    personality: Personality,
    posts: string[],
    abortSignal?: AbortSignal,
): Promise<PersonalityVerdict> {
    if (posts.length === 0) return UNCHANGED;
    const raw = await llm.completeText(contentPrompt(personality, posts), CONTENT_SYSTEM, abortSignal);
    return parseContentVerdict(raw);
}

/**
 * Successful read_post results in a loop transcript, in call order.
 * Failed reads (error outputs) are skipped.
 */
export function extractReadPostContent(transcript: ModelMessage[]): string[] {
    const readIds = new Set<string>();
    const posts: string[] = [];

    for (const message of transcript) {
        if (typeof message.content === "string") continue;
        for (const part of message.content) {
            if (part.type === "tool-call" && part.toolName === "read_post") {
                readIds.add(part.toolCallId);
            } else if (part.type === "tool-result" && readIds.has(part.toolCallId) && part.output.type === "text") {
                posts.push(part.output.value);
            }
        }
    }
    return posts;
}

// ── Runners (detached) ───────────────────────────────

export interface EvolutionDeps {
    llm: LlmClient;
    personality: PersonalityStore;
    /** Status line for the transcript, e.g. "[personality updated]" */
    notify?: (line: string) => void;
}

/** Exchange-driven update. Returns whether the stored personality changed. */
export async function evolveFromExchange(
    deps: EvolutionDeps,
    userMessage: string,
    agentReply: string,
    abortSignal?: AbortSignal,
): Promise<boolean> {
    const verdict = await evaluateExchange(deps.llm, deps.personality.get(), userMessage, agentReply, abortSignal);
    if (verdict.kind === "unchanged") return false;
    const changed = await deps.personality.update(current => applyFields(current, verdict.fields));
    if (changed) deps.notify?.("[personality updated]");
    return changed;
}

/** Content-driven update. Returns whether the stored personality changed. */
export async function evolveFromPosts(
    deps: EvolutionDeps,
    posts: string[],
    abortSignal?: AbortSignal,
): Promise<boolean> {
    const verdict = await evaluatePosts(deps.llm, deps.personality.get(), posts, abortSignal);
    if (verdict.kind === "unchanged") return false;
    const changed = await deps.personality.update(current => mergeAdditive(current, verdict.fields));
    if (changed) deps.notify?.("[personality evolved from post]");
    return changed;
}
