// src/runtime/lock.ts — Promise-chain mutex
// One instance per shared structure (memory, personality, history).
// Hold it across the read-modify-write and its persist, never across an LLM or forum call.

export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    /**
     * Run `fn` once every previously queued holder has settled.
     * A failing holder does not poison the chain for the next one.
     */
    run<T>(fn: () => T | Promise<T>): Promise<T> {
        const result = this.tail.then(() => fn());
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }
}
