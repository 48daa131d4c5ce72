// src/logs/activity-log.ts — Persistent activity recorder
// Messages in/out, tool calls, tool results, cycle events and log lines are appended here.
// Format: NDJSON, one JSON object per line.
// File: <dataDir>/activity.log

import { appendFileSync, mkdirSync } from "node:fs";
import { statePaths } from "@/paths.ts";

// Resolved on first write, after .env has had a chance to set AGENT_DATA_DIR.
let logFile: string | undefined;

export function activityLogPath(): string {
    if (!logFile) {
        const { dir, activityLog } = statePaths();
        mkdirSync(dir, { recursive: true });
        logFile = activityLog;
    }
    return logFile;
}

// ── Event types ───────────────────────────────────────────────────────────────

export type ActivityEventType =
    | "msg_in"        // user message received by the terminal
    | "msg_out"       // final agent response
    | "tool_call"     // agent invoked a tool
    | "tool_result"   // tool returned a result
    | "cycle"         // autonomous cycle finished
    | "info"
    | "warn"
    | "error";

export interface ActivityEvent {
    type: ActivityEventType;
    /** Source module e.g. "agent-loop", "cycle", "tools/forum" */
    module?: string;
    /** "CHAT" for interactive exchanges, "AUTO" for autonomous cycles */
    label?: string;
    tool?: string;
    text?: string;
    args?: unknown;
    result?: unknown;
    /** Round number inside one agent loop invocation */
    round?: number;
    cycle?: number;
    durationMs?: number;
    [key: string]: unknown;
}

// ── Core writer ───────────────────────────────────────────────────────────────

/**
 * Append a single activity event to the activity log.
 * Never throws.
 */
export function logActivity(event: ActivityEvent): void {
    const line = JSON.stringify({ ts: new Date().toISOString(), ...event }) + "\n";
    try {
        appendFileSync(activityLogPath(), line);
    } catch {
        // unwritable log directory: drop the event, the console copy still shows it
    }
}

// ── Convenience helpers ───────────────────────────────────────────────────────

export const activity = {
    msgIn(label: string, text: string) {
        logActivity({ type: "msg_in", label, text });
    },
    msgOut(label: string, text: string, rounds?: number, durationMs?: number) {
        logActivity({ type: "msg_out", label, text, rounds, durationMs });
    },
    toolCall(tool: string, input: unknown, label?: string, round?: number) {
        logActivity({ type: "tool_call", module: "agent-loop", label, tool, args: input, round });
    },
    toolResult(tool: string, output: string, ok: boolean, durationMs?: number, label?: string, round?: number) {
        logActivity({ type: "tool_result", module: "agent-loop", label, tool, result: output, ok, durationMs, round });
    },
    cycle(cycle: number, actions: string[], summary: string) {
        logActivity({ type: "cycle", module: "cycle", cycle, actions, text: summary });
    },
    info(module: string, text: string) {
        logActivity({ type: "info", module, text });
    },
    warn(module: string, text: string) {
        logActivity({ type: "warn", module, text });
    },
    error(module: string, text: string, err?: unknown) {
        const detail = err instanceof Error
            ? ` | cause: ${err.message}${err.stack ? ` | stack: ${err.stack.split("\n").slice(1, 4).join(" | ")}` : ""}`
            : "";
        logActivity({ type: "error", module, text: text + detail });
    },
};
