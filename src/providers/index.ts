// src/providers/index.ts — Provider registry: getModel(), parseModelString()
// To add a new provider: add a key to `registry` below.
//
// Model string format: "<provider>/<model-id>"
// Example: "anthropic/claude-haiku-4-5"

import type { LanguageModel } from "ai";
import { createAnthropicProvider } from "@/providers/anthropic_provider.ts";

export interface ModelProvider {
    name: string;
    chat(modelId: string): LanguageModel;
}

// Each key is the prefix used in the model string (before the first "/").
const registry: Record<string, (apiKey: string) => ModelProvider> = {
    anthropic: (apiKey) => createAnthropicProvider(apiKey),
};

export interface ModelRef {
    provider: string;
    modelId: string;
}

/**
 * Split "<provider>/<model-id>".
 * Only the first "/" separates; the model id may itself contain slashes.
 */
export function parseModelString(modelString: string): ModelRef {
    const slashIndex = modelString.indexOf("/");
    if (slashIndex <= 0 || slashIndex === modelString.length - 1) {
        throw new Error(
            `Invalid model string "${modelString}", expected format: "<provider>/<model-id>"`
        );
    }
    return {
        provider: modelString.slice(0, slashIndex),
        modelId: modelString.slice(slashIndex + 1),
    };
}

export function getModel(modelString: string, apiKey: string): LanguageModel {
    const { provider, modelId } = parseModelString(modelString);
    const factory = registry[provider];
    if (!factory) {
        throw new Error(
            `Unknown provider "${provider}". Known providers: ${Object.keys(registry).join(", ")}`
        );
    }
    return factory(apiKey).chat(modelId);
}
