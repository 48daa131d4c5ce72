import { describe, expect, it } from "vitest";
import { Mutex } from "@/runtime/lock.ts";

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 5));

describe("Mutex", () => {
    it("runs holders one at a time, in arrival order", async () => {
        const lock = new Mutex();
        const events: string[] = [];
        const holder = (name: string) => lock.run(async () => {
            events.push(`${name}:in`);
            await tick();
            events.push(`${name}:out`);
            return name;
        });

        const results = await Promise.all([holder("a"), holder("b"), holder("c")]);
        expect(results).toEqual(["a", "b", "c"]);
        expect(events).toEqual(["a:in", "a:out", "b:in", "b:out", "c:in", "c:out"]);
    });

    it("keeps serving after a holder throws", async () => {
        const lock = new Mutex();
        const failed = lock.run(() => { throw new Error("boom"); });
        const next = lock.run(() => 42);

        await expect(failed).rejects.toThrow("boom");
        await expect(next).resolves.toBe(42);
    });
});
