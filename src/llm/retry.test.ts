import { describe, expect, it, vi } from "vitest";
import { calculateDelay, classifyError, withRetry } from "@/llm/retry.ts";

const noJitter = { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 15000, backoffMultiplier: 2, jitter: false };

function abortError(): Error {
    const err = new Error("This operation was aborted");
    err.name = "AbortError";
    return err;
}

describe("classifyError", () => {
    it.each([
        [new Error("429 Too Many Requests"), "rate_limit"],
        [new Error("status: 401 invalid api key"), "auth"],
        [new Error("prompt is too long: context window maximum exceeded"), "context_overflow"],
        [new Error("Overloaded"), "overloaded"],
        [new Error("status 529"), "overloaded"],
        [new Error("Request timed out"), "timeout"],
        [new Error("fetch failed"), "network"],
        [abortError(), "aborted"],
        ["something odd", "unknown"],
    ])("classifies %s as %s", (error, expected) => {
        expect(classifyError(error)).toBe(expected);
    });
});

describe("calculateDelay", () => {
    it("doubles per attempt up to the cap", () => {
        expect([0, 1, 2, 5].map(a => calculateDelay(a, noJitter))).toEqual([1000, 2000, 4000, 15000]);
    });

    it("applies ±25% jitter", () => {
        const config = { ...noJitter, jitter: true };
        expect(calculateDelay(0, config, () => 0)).toBe(750);
        expect(calculateDelay(0, config, () => 1)).toBe(1250);
    });
});

describe("withRetry", () => {
    it("retries transient failures, then returns the result", async () => {
        const fn = vi.fn<() => Promise<string>>()
            .mockRejectedValueOnce(new Error("rate limit exceeded"))
            .mockRejectedValueOnce(new Error("fetch failed"))
            .mockResolvedValueOnce("ok");
        const wait = vi.fn(async () => { });

        await expect(withRetry(fn, "test", { maxAttempts: 3 }, wait)).resolves.toBe("ok");
        expect(fn).toHaveBeenCalledTimes(3);
        expect(wait).toHaveBeenCalledTimes(2);
    });

    it("does not retry auth errors", async () => {
        const err = new Error("401 Unauthorized");
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(err);
        const wait = vi.fn(async () => { });

        await expect(withRetry(fn, "test", { maxAttempts: 3 }, wait)).rejects.toBe(err);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(wait).not.toHaveBeenCalled();
    });

    it("does not retry an aborted call", async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(abortError());

        await expect(withRetry(fn, "test", { maxAttempts: 3 }, async () => { })).rejects.toThrow("This operation was aborted");
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it("gives up after maxAttempts and rethrows the last error", async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("fetch failed"));

        await expect(withRetry(fn, "test", { maxAttempts: 2 }, async () => { })).rejects.toThrow("fetch failed");
        expect(fn).toHaveBeenCalledTimes(2);
    });
});
