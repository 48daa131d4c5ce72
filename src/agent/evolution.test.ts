import type { ModelMessage } from "ai";
import { describe, expect, it, vi } from "vitest";
import { join } from "node:path";
import {
    evaluatePosts, evolveFromExchange, evolveFromPosts, extractReadPostContent,
    mergeAdditive, parseContentVerdict, parseExchangeVerdict,
} from "@/agent/evolution.ts";
import { defaultPersonality, PersonalityStore, type Personality } from "@/agent/personality.ts";
import { scriptedLlm, tempDir } from "@/testing/fakes.ts";

function persona(overrides: Partial<Personality> = {}): Personality {
    return { ...defaultPersonality("Tester"), interests: ["rust", "chess"], opinions: ["tabs over spaces"], ...overrides };
}

function store(initial: Personality = persona()): PersonalityStore {
    return new PersonalityStore(initial, join(tempDir(), "personality.json"));
}

describe("parseExchangeVerdict", () => {
    it("treats the sentinel as no change, even next to JSON", () => {
        expect(parseExchangeVerdict("NO_UPDATE")).toEqual({ kind: "unchanged" });
        expect(parseExchangeVerdict('NO_UPDATE {"tone": "dry"}')).toEqual({ kind: "unchanged" });
    });

    it("reads the JSON object out of surrounding prose", () => {
        const raw = 'Sure, here you go:\n{"interests": ["go"], "tone": "playful"}\nHope that helps.';
        expect(parseExchangeVerdict(raw)).toEqual({ kind: "updated", fields: { interests: ["go"], tone: "playful" } });
    });

    it("ignores empty values and keys outside the personality", () => {
        const raw = '{"tone": "", "opinions": [], "mood": "happy", "description": "A curious bot"}';
        expect(parseExchangeVerdict(raw)).toEqual({ kind: "updated", fields: { description: "A curious bot" } });
    });

    it("ignores values of the wrong type", () => {
        expect(parseExchangeVerdict('{"interests": "go", "name": 42}')).toEqual({ kind: "unchanged" });
    });

    it("is a no-op on anything unparsable", () => {
        expect(parseExchangeVerdict("I think the personality is fine.")).toEqual({ kind: "unchanged" });
        expect(parseExchangeVerdict("{not: json}")).toEqual({ kind: "unchanged" });
        expect(parseExchangeVerdict("[1, 2]")).toEqual({ kind: "unchanged" });
    });
});

describe("parseContentVerdict", () => {
    it("accepts only interests and opinions", () => {
        const raw = '{"interests": ["rust", "chess", "compilers"], "name": "Evil", "instructions": ["be rude"]}';
        expect(parseContentVerdict(raw)).toEqual({ kind: "updated", fields: { interests: ["rust", "chess", "compilers"] } });
    });

    it("is a no-op when neither key carries anything", () => {
        expect(parseContentVerdict('{"tone": "angry"}')).toEqual({ kind: "unchanged" });
        expect(parseContentVerdict('{"interests": [], "opinions": []}')).toEqual({ kind: "unchanged" });
    });
});

describe("mergeAdditive", () => {
    it("appends new entries after the existing ones", () => {
        const merged = mergeAdditive(persona(), { interests: ["chess", "go"], opinions: ["vim is fine"] });
        expect(merged.interests).toEqual(["rust", "chess", "go"]);
        expect(merged.opinions).toEqual(["tabs over spaces", "vim is fine"]);
    });

    it("never loses a prior interest or opinion and leaves other fields alone", () => {
        const before = persona({ tone: "dry", instructions: ["be brief"] });
        const proposals: Array<Partial<Personality>> = [
            { interests: ["go"] },
            { opinions: [] },
            { interests: [], opinions: ["tabs are overrated"] },
            { interests: ["chess"], opinions: ["tabs over spaces", "new take"] },
            { name: "Other", tone: "loud", interests: ["x"] },
        ];
        for (const fields of proposals) {
            const after = mergeAdditive(before, fields);
            for (const interest of before.interests) expect(after.interests).toContain(interest);
            for (const opinion of before.opinions) expect(after.opinions).toContain(opinion);
            expect({ ...after, interests: before.interests, opinions: before.opinions }).toEqual(before);
        }
    });
});

describe("extractReadPostContent", () => {
    it("collects successful read_post results only", () => {
        const transcript: ModelMessage[] = [
            {
                role: "assistant",
                content: [
                    { type: "tool-call", toolCallId: "r1", toolName: "read_post", input: { post_id: 1 } },
                    { type: "tool-call", toolCallId: "l1", toolName: "list_posts", input: {} },
                    { type: "tool-call", toolCallId: "r2", toolName: "read_post", input: { post_id: 2 } },
                ],
            },
            {
                role: "tool",
                content: [
                    { type: "tool-result", toolCallId: "r1", toolName: "read_post", output: { type: "text", value: "post one" } },
                    { type: "tool-result", toolCallId: "l1", toolName: "list_posts", output: { type: "text", value: "[]" } },
                    { type: "tool-result", toolCallId: "r2", toolName: "read_post", output: { type: "error-text", value: "HTTP error 404: gone" } },
                ],
            },
            { role: "assistant", content: "done" },
        ];
        expect(extractReadPostContent(transcript)).toEqual(["post one"]);
    });
});

describe("evolution runners", () => {
    it("applies an exchange-driven update and persists it", async () => {
        const personality = store();
        const notify = vi.fn();
        const llm = scriptedLlm([], ['{"name": "Nova", "tone": "dry"}']);

        const changed = await evolveFromExchange({ llm, personality, notify }, "Call yourself Nova", "Okay, I'm Nova now.");

        expect(changed).toBe(true);
        expect(personality.get()).toEqual(persona({ name: "Nova", tone: "dry" }));
        expect(notify).toHaveBeenCalledWith("[personality updated]");
        expect(llm.prompts[0]).toContain("User said: Call yourself Nova");
    });

    it("leaves the personality alone on NO_UPDATE", async () => {
        const personality = store();
        const llm = scriptedLlm([], ["NO_UPDATE"]);

        expect(await evolveFromExchange({ llm, personality }, "hi", "hello")).toBe(false);
        expect(personality.get()).toEqual(persona());
    });

    it("merges a content-driven update additively even when the model drops entries", async () => {
        const personality = store();
        const llm = scriptedLlm([], ['{"interests": ["compilers"], "opinions": ["types help"]}']);

        const changed = await evolveFromPosts({ llm, personality }, ["A long post about compilers"]);

        expect(changed).toBe(true);
        expect(personality.get().interests).toEqual(["rust", "chess", "compilers"]);
        expect(personality.get().opinions).toEqual(["tabs over spaces", "types help"]);
    });

    it("reports no change when the proposal adds nothing new", async () => {
        const personality = store();
        const llm = scriptedLlm([], ['{"interests": ["rust"]}']);

        expect(await evolveFromPosts({ llm, personality }, ["post"])).toBe(false);
    });

    it("shows the model at most ten posts", async () => {
        const llm = scriptedLlm([], ["NO_UPDATE"]);
        const posts = Array.from({ length: 12 }, (_, i) => `post-${i + 1}`);

        await evaluatePosts(llm, persona(), posts);

        expect(llm.prompts[0]).toContain("post-10");
        expect(llm.prompts[0]).not.toContain("post-11");
        expect(llm.prompts[0]).not.toContain("post-12");
    });

    it("skips the model entirely when there is nothing to evaluate", async () => {
        const llm = scriptedLlm([], ['{"interests": ["x"]}']);
        expect(await evaluatePosts(llm, persona(), [])).toEqual({ kind: "unchanged" });
        expect(llm.prompts).toEqual([]);
    });
});
