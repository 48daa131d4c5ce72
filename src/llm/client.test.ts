import { describe, expect, it } from "vitest";
import { MockLanguageModelV2 } from "ai/test";
import { createLlmClient } from "@/llm/client.ts";
import { forumToolCatalog } from "@/tools/forum-tools.ts";

const usage = { inputTokens: 12, outputTokens: 3, totalTokens: 15 };
const noRetry = { maxAttempts: 1 };

function request() {
    return {
        messages: [{ role: "user" as const, content: "read post 7" }],
        system: "You are Tester",
        tools: forumToolCatalog,
    };
}

describe("createLlmClient", () => {
    it("hands tool calls back without running them", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async () => ({
                content: [
                    { type: "text", text: "Let me look." },
                    { type: "tool-call", toolCallId: "call-1", toolName: "read_post", input: '{"post_id":7}' },
                ],
                finishReason: "tool-calls",
                usage,
                warnings: [],
            }),
        });
        const llm = createLlmClient(model, { maxOutputTokens: 256, retry: noRetry });

        expect(await llm.complete(request())).toEqual({
            kind: "tool-request",
            calls: [{ id: "call-1", name: "read_post", input: { post_id: 7 } }],
            text: "Let me look.",
            usage: { inputTokens: 12, outputTokens: 3 },
        });
        expect(model.doGenerateCalls).toHaveLength(1);
    });

    it("returns the text of a stop as the final answer", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async () => ({
                content: [{ type: "text", text: "All done." }],
                finishReason: "stop",
                usage,
                warnings: [],
            }),
        });
        const llm = createLlmClient(model, { maxOutputTokens: 256, retry: noRetry });

        expect(await llm.complete(request())).toEqual({
            kind: "final",
            text: "All done.",
            usage: { inputTokens: 12, outputTokens: 3 },
        });
    });

    it("treats a tool-calls finish without any call as aborted", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async () => ({
                content: [{ type: "text", text: "hmm" }],
                finishReason: "tool-calls",
                usage,
                warnings: [],
            }),
        });
        const llm = createLlmClient(model, { maxOutputTokens: 256, retry: noRetry });

        expect(await llm.complete(request())).toMatchObject({ kind: "aborted", reason: "tool-calls" });
    });

    it("treats any other finish reason as aborted", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async () => ({
                content: [{ type: "text", text: "cut off mid" }],
                finishReason: "length",
                usage: { inputTokens: undefined, outputTokens: undefined, totalTokens: undefined },
                warnings: [],
            }),
        });
        const llm = createLlmClient(model, { maxOutputTokens: 256, retry: noRetry });

        expect(await llm.complete(request())).toEqual({
            kind: "aborted",
            reason: "length",
            usage: { inputTokens: 0, outputTokens: 0 },
        });
    });

    it("retries a transient failure through withRetry", async () => {
        let attempts = 0;
        const model = new MockLanguageModelV2({
            doGenerate: async () => {
                attempts++;
                if (attempts === 1) throw new Error("fetch failed");
                return {
                    content: [{ type: "text", text: "recovered" }],
                    finishReason: "stop",
                    usage,
                    warnings: [],
                };
            },
        });
        const llm = createLlmClient(model, {
            maxOutputTokens: 256,
            retry: { maxAttempts: 2, initialDelayMs: 0, maxDelayMs: 0, jitter: false },
        });

        expect(await llm.complete(request())).toMatchObject({ kind: "final", text: "recovered" });
        expect(attempts).toBe(2);
    });

    it("answers one-shot prompts without tools", async () => {
        const model = new MockLanguageModelV2({
            doGenerate: async () => ({
                content: [{ type: "text", text: "NO_UPDATE" }],
                finishReason: "stop",
                usage,
                warnings: [],
            }),
        });
        const llm = createLlmClient(model, { maxOutputTokens: 256, retry: noRetry });

        expect(await llm.completeText("Evaluate this exchange", "You analyze conversations")).toBe("NO_UPDATE");
        expect(model.doGenerateCalls).toHaveLength(1);
        expect(model.doGenerateCalls[0].tools ?? []).toEqual([]);
        expect(model.doGenerateCalls[0].prompt[0]).toEqual({ role: "system", content: "You analyze conversations" });
    });
});
