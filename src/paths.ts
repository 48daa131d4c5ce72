// src/paths.ts — Canonical locations of persisted agent state
// Everything the agent writes lives under one data directory:
//   <root>/.agents/ by default, or AGENT_DATA_DIR (relative to the project root).

import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Absolute path to the project root (one level above src/). */
export const PROJECT_ROOT = resolve(__dirname, "..");

/** Resolve the data directory, honouring AGENT_DATA_DIR. */
export function resolveDataDir(override?: string): string {
    return resolve(PROJECT_ROOT, override || process.env.AGENT_DATA_DIR || ".agents");
}

export interface StatePaths {
    dir: string;
    memory: string;
    personality: string;
    history: string;
    activityLog: string;
}

export function statePaths(dataDir: string = resolveDataDir()): StatePaths {
    return {
        dir: dataDir,
        memory: resolve(dataDir, "memory.json"),
        personality: resolve(dataDir, "personality.json"),
        history: resolve(dataDir, "chat-history.json"),
        activityLog: resolve(dataDir, "activity.log"),
    };
}
