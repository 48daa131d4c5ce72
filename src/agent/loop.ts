// src/agent/loop.ts — Tool-use loop: ask model → run requested tools → feed results back
//
// Each round submits the whole conversation. A tool-request round appends the
// assistant's message (text + tool-call parts) and then ONE tool message carrying
// every result, in the order the model asked for them. Tools run strictly one
// after another. The loop ends on a final answer, an unrecognized completion,
// or when maxRounds model calls have been made.

import type { ModelMessage, ToolCallPart, ToolResultPart, ToolSet, TextPart } from "ai";
import type { LlmClient, ToolInvocation } from "@/llm/client.ts";
import { outcomeText, type ToolExecutor, type ToolOutcome } from "@/tools/executor.ts";
import { activity } from "@/logs/activity-log.ts";
import { log } from "@/logs/logger.ts";

const logger = log("agent-loop");

export const DEFAULT_MAX_ROUNDS = 20;

/** Text shown wherever a loop ended without a final answer */
export const NO_ANSWER_TEXT = "(max iterations reached)";

export type LoopOutcome =
    | { kind: "completed"; text: string }
    | { kind: "budget_exhausted"; rounds: number }
    | { kind: "aborted"; reason: string };

export interface LoopStats {
    inputTokens: number;
    outputTokens: number;
    /** Every tool invoked, in call order, duplicates kept */
    toolsUsed: string[];
    modelCalls: number;
}

export interface LoopResult {
    outcome: LoopOutcome;
    stats: LoopStats;
    /** Messages appended during this invocation (assistant + tool turns, in order) */
    transcript: ModelMessage[];
}

export interface AgentLoopOptions {
    messages: ModelMessage[];
    system: string;
    tools: ToolSet;
    executor: ToolExecutor;
    llm: LlmClient;
    maxRounds?: number;
    /** "CHAT" / "AUTO", tags activity log entries */
    label?: string;
    /** Fired once, at the first round that produces tool calls or a final answer */
    onFirstOutput?: () => void;
    /** Fired just before each tool executes */
    onToolCall?: (call: ToolInvocation) => void;
    abortSignal?: AbortSignal;
}

export function loopText(outcome: LoopOutcome): string {
    return outcome.kind === "completed" ? outcome.text : NO_ANSWER_TEXT;
}

export async function runAgentLoop(options: AgentLoopOptions): Promise<LoopResult> {
    const {
        system, tools, executor, llm, label,
        maxRounds = DEFAULT_MAX_ROUNDS,
        onFirstOutput, onToolCall, abortSignal,
    } = options;

    const conversation: ModelMessage[] = [...options.messages];
    const transcript: ModelMessage[] = [];
    const stats: LoopStats = { inputTokens: 0, outputTokens: 0, toolsUsed: [], modelCalls: 0 };

    let notified = false;
    const notify = () => {
        if (notified) return;
        notified = true;
        onFirstOutput?.();
    };

    const append = (message: ModelMessage) => {
        conversation.push(message);
        transcript.push(message);
    };

    const finish = (outcome: LoopOutcome): LoopResult => {
        notify();
        return { outcome, stats, transcript };
    };

    for (let round = 1; round <= maxRounds; round++) {
        const completion = await llm.complete({ messages: conversation, system, tools, abortSignal });
        stats.modelCalls++;
        stats.inputTokens += completion.usage.inputTokens;
        stats.outputTokens += completion.usage.outputTokens;

        if (completion.kind === "final") {
            append({ role: "assistant", content: completion.text });
            return finish({ kind: "completed", text: completion.text });
        }

        if (completion.kind === "aborted") {
            logger.warn(`Round ${round} ended without tools or an answer (${completion.reason})`);
            return finish({ kind: "aborted", reason: completion.reason });
        }

        notify();

        const requestParts: Array<TextPart | ToolCallPart> = [];
        if (completion.text) requestParts.push({ type: "text", text: completion.text });
        for (const call of completion.calls) {
            requestParts.push({ type: "tool-call", toolCallId: call.id, toolName: call.name, input: call.input });
        }
        append({ role: "assistant", content: requestParts });

        const results: ToolResultPart[] = [];
        for (const call of completion.calls) {
            stats.toolsUsed.push(call.name);
            onToolCall?.(call);
            activity.toolCall(call.name, call.input, label, round);

            const t0 = Date.now();
            const outcome = await runTool(executor, call);
            const text = outcomeText(outcome);
            activity.toolResult(call.name, text.slice(0, 500), outcome.ok, Date.now() - t0, label, round);

            results.push({
                type: "tool-result",
                toolCallId: call.id,
                toolName: call.name,
                output: outcome.ok ? { type: "text", value: text } : { type: "error-text", value: text },
            });
        }
        append({ role: "tool", content: results });
    }

    logger.warn(`Round budget exhausted after ${maxRounds} model calls`);
    return finish({ kind: "budget_exhausted", rounds: maxRounds });
}

/** The executor contract is total; a throw here is a bug in it, still reported to the model as text. */
async function runTool(executor: ToolExecutor, call: ToolInvocation): Promise<ToolOutcome> {
    try {
        return await executor.execute(call.name, call.input);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Tool ${call.name} threw`, err);
        return { ok: false, failure: { kind: "network", message: `Error: ${message}` } };
    }
}
