// src/providers/anthropic_provider.ts
// Anthropic provider using the official @ai-sdk/anthropic package.
//
// Anthropic has its own native SDK integration which handles authentication,
// content blocks, and tool use natively.
//
// Docs: https://ai-sdk.dev/providers/ai-sdk-providers/anthropic

import { createAnthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import type { ModelProvider } from "@/providers/index.ts";

/**
 * Creates an Anthropic provider instance.
 *
 * @param apiKey - API key checked at startup by requireCredentials()
 */
export function createAnthropicProvider(apiKey: string): ModelProvider {
    const provider = createAnthropic({ apiKey });

    return {
        name: "anthropic",
        chat(modelId: string): LanguageModel {
            return provider(modelId);
        },
    };
}
