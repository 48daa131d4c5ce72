/**
 * LLM retry — wraps model calls with exponential backoff and error classification.
 *
 * Error handling strategy:
 *   - Rate limit (429) → backoff + retry
 *   - Timeout / overloaded → backoff + retry
 *   - Auth error (401/403) → fail immediately
 *   - Context overflow → fail immediately
 *   - Network error → backoff + retry
 *   - Aborted by the caller → fail immediately
 *   - Unknown → retry up to max attempts
 *
 * @module llm/retry
 */

import { log } from "@/logs/logger.ts";

const logger = log("llm-retry");

export interface RetryConfig {
    /** Max attempts including the first (default: 3) */
    maxAttempts?: number;
    /** Initial delay in ms (default: 1000) */
    initialDelayMs?: number;
    /** Max delay in ms (default: 15000) */
    maxDelayMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Add ±25% jitter to delay (default: true) */
    jitter?: boolean;
}

const DEFAULT_RETRY: Required<RetryConfig> = {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 15000,
    backoffMultiplier: 2,
    jitter: true,
};

export type ErrorType = "rate_limit" | "timeout" | "auth" | "context_overflow" | "network" | "overloaded" | "aborted" | "unknown";

/** Classify an error to determine retry strategy */
export function classifyError(error: unknown): ErrorType {
    if (error instanceof Error && error.name === "AbortError") return "aborted";

    const msg = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
    const statusMatch = msg.match(/status[:\s]*(\d{3})/);
    const status = statusMatch ? parseInt(statusMatch[1], 10) : 0;

    if (status === 429 || msg.includes("rate limit") || msg.includes("too many requests")) {
        return "rate_limit";
    }
    if (status === 401 || status === 403 || msg.includes("unauthorized") || msg.includes("invalid api key") || msg.includes("authentication")) {
        return "auth";
    }
    if (msg.includes("context") && (msg.includes("overflow") || msg.includes("too long") || msg.includes("maximum"))) {
        return "context_overflow";
    }
    if (status === 503 || status === 502 || status === 529 || msg.includes("overloaded") || msg.includes("capacity")) {
        return "overloaded";
    }
    if (msg.includes("timeout") || msg.includes("timed out") || msg.includes("econnreset") || msg.includes("etimedout")) {
        return "timeout";
    }
    if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("network") || msg.includes("fetch failed")) {
        return "network";
    }
    return "unknown";
}

function shouldRetry(errorType: ErrorType): boolean {
    return errorType !== "auth" && errorType !== "context_overflow" && errorType !== "aborted";
}

/** Exponential backoff, capped, with optional jitter */
export function calculateDelay(attempt: number, config: Required<RetryConfig>, random: () => number = Math.random): number {
    const base = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
    const capped = Math.min(base, config.maxDelayMs);
    if (!config.jitter) return capped;
    return capped * (0.75 + random() * 0.5);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying retryable failures with backoff.
 * The last error is rethrown once attempts run out or the error is not retryable.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    label: string,
    retryConfig?: RetryConfig,
    wait: (ms: number) => Promise<void> = sleep,
): Promise<T> {
    const config = { ...DEFAULT_RETRY, ...retryConfig };
    let lastError: unknown;

    for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;
            const errorType = classifyError(error);
            const errMsg = error instanceof Error ? error.message : String(error);

            if (!shouldRetry(errorType) || attempt >= config.maxAttempts - 1) {
                if (attempt > 0) {
                    logger.error(`${label}: failed after ${attempt + 1} attempt(s) [${errorType}]: ${errMsg.slice(0, 200)}`);
                }
                throw error;
            }

            const delay = calculateDelay(attempt, config);
            logger.warn(`${label}: attempt ${attempt + 1}/${config.maxAttempts} failed [${errorType}]: ${errMsg.slice(0, 150)}. Retrying in ${Math.round(delay)}ms...`);
            await wait(delay);
        }
    }

    throw lastError;
}
