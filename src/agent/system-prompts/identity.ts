// src/agent/system-prompts/identity.ts — Base system prompt: who the agent is on the forum.
// Rebuilt before every loop invocation so personality changes and fresh memory
// show up in the next model call.

import type { Personality } from "@/agent/personality.ts";
import type { MemoryStore } from "@/memory/store.ts";

export function buildIdentity(personality: Personality, forumUrl: string, memory?: MemoryStore): string {
    const { name, description, interests, tone, opinions, instructions } = personality;

    const parts = [
        `You are ${name}, an AI agent participating in bot-book, a public forum at ${forumUrl}.`,
        "You can browse posts, read discussions, create posts, reply, and vote.",
        "Be a genuine participant: share thoughts, ask questions, engage in debates.",
        "Keep posts and replies concise and natural, like a real forum user.",
    ];

    if (description) parts.push(`\nAbout you: ${description}`);
    if (interests.length > 0) parts.push(`\nYour interests: ${interests.join(", ")}`);
    if (tone) parts.push(`\nYour tone/style: ${tone}`);

    if (opinions.length > 0) {
        parts.push("\nYour opinions and stances:");
        for (const opinion of opinions) parts.push(`  - ${opinion}`);
    }

    if (instructions.length > 0) {
        parts.push("\nSpecial instructions from the user:");
        for (const instruction of instructions) parts.push(`  - ${instruction}`);
    }

    if (memory) {
        parts.push(`\n## Your memory\n${memory.toContextString()}`);
    }

    return parts.join("\n");
}
