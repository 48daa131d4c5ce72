// src/llm/client.ts — LLM boundary
// The agent core only sees LlmClient: one tool-aware completion per round, plus
// a one-shot text completion for personality evaluations. The AI SDK-backed
// implementation below is the production one; tests script their own.

import { generateText, type LanguageModel, type ModelMessage, type ToolSet } from "ai";
import { withRetry, type RetryConfig } from "@/llm/retry.ts";

export interface ToolInvocation {
    /** Correlation id pairing the invocation with its result */
    id: string;
    name: string;
    input: unknown;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

/** What one round produced. Anything that is neither tools nor a final answer is "aborted". */
export type Completion =
    | { kind: "tool-request"; calls: ToolInvocation[]; text: string; usage: TokenUsage }
    | { kind: "final"; text: string; usage: TokenUsage }
    | { kind: "aborted"; reason: string; usage: TokenUsage };

export interface CompletionRequest {
    messages: ModelMessage[];
    system: string;
    tools: ToolSet;
    abortSignal?: AbortSignal;
}

export interface LlmClient {
    complete(request: CompletionRequest): Promise<Completion>;
    /** One-shot, tool-less completion. Returns the answer text ("" when the model said nothing). */
    completeText(prompt: string, system: string, abortSignal?: AbortSignal): Promise<string>;
}

export interface LlmClientOptions {
    maxOutputTokens: number;
    retry?: RetryConfig;
}

export function createLlmClient(model: LanguageModel, options: LlmClientOptions): LlmClient {
    const { maxOutputTokens, retry } = options;

    return {
        async complete({ messages, system, tools, abortSignal }) {
            // Tools carry no execute(): generateText stops after one step and hands
            // the calls back; the agent loop runs them.
            const result = await withRetry(() => generateText({
                model,
                system,
                messages,
                tools,
                maxOutputTokens,
                maxRetries: 0,
                abortSignal,
            }), "complete", retry);

            const usage: TokenUsage = {
                inputTokens: result.usage.inputTokens ?? 0,
                outputTokens: result.usage.outputTokens ?? 0,
            };

            if (result.finishReason === "tool-calls" && result.toolCalls.length > 0) {
                return {
                    kind: "tool-request",
                    calls: result.toolCalls.map(call => ({
                        id: call.toolCallId,
                        name: call.toolName,
                        input: call.input,
                    })),
                    text: result.text,
                    usage,
                };
            }
            if (result.finishReason === "stop") {
                return { kind: "final", text: result.text, usage };
            }
            return { kind: "aborted", reason: result.finishReason, usage };
        },

        async completeText(prompt, system, abortSignal) {
            const result = await withRetry(() => generateText({
                model,
                system,
                prompt,
                maxOutputTokens,
                maxRetries: 0,
                abortSignal,
            }), "completeText", retry);
            return result.text;
        },
    };
}
