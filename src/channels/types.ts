// src/channels/types.ts — Channel contract
// A channel feeds user input to the runtime and shows its output.

import type { AgentRuntime } from "@/runtime/runtime.ts";

export interface Channel {
    /** Unique identifier */
    name: string;
    /** Run until the user leaves or input ends. */
    start(runtime: AgentRuntime): Promise<void>;
}
