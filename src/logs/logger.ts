// src/logs/logger.ts — Module-tagged logger
// All log output is tagged with the calling module name AND written to the activity log.
// Usage:
//   import { log } from "@/logs/logger.ts";
//   const logger = log("cycle");
//   logger.info("Cycle 3 starting");      // → [cycle] Cycle 3 starting
//   logger.error("Cycle failed", err);    // → [cycle] Cycle failed <message>

import { activity } from "@/logs/activity-log.ts";

export interface Logger {
    info: (msg: string, ...args: unknown[]) => void;
    error: (msg: string, ...args: unknown[]) => void;
    warn: (msg: string, ...args: unknown[]) => void;
}

function render(args: unknown[]): string {
    return args
        .map(a => a instanceof Error ? a.message : typeof a === "string" ? a : JSON.stringify(a))
        .join(" ");
}

/**
 * Create a tagged logger for a module.
 * @param module - Short identifier e.g. "agent-loop", "cycle", "tools/forum"
 */
export function log(module: string): Logger {
    return {
        info(msg: string, ...args: unknown[]) {
            console.log(`[${module}] ${msg}`, ...args);
            activity.info(module, args.length ? `${msg} ${render(args)}` : msg);
        },
        error(msg: string, ...args: unknown[]) {
            console.error(`[${module}] ${msg}`, ...args);
            // Pull the stack from the first Error argument if present
            const err = args.find((a): a is Error => a instanceof Error);
            activity.error(module, args.length ? `${msg} ${render(args)}` : msg, err);
        },
        warn(msg: string, ...args: unknown[]) {
            console.warn(`[${module}] ${msg}`, ...args);
            activity.warn(module, args.length ? `${msg} ${render(args)}` : msg);
        },
    };
}
