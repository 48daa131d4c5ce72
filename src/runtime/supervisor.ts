/**
 * Detached task supervisor — owns fire-and-forget work (personality evolution)
 * so shutdown can wait for it, then cancel what is left.
 *
 * Tasks receive an AbortSignal; errors are logged and swallowed here so a
 * background failure never reaches the caller that spawned it.
 *
 * @module runtime/supervisor
 */

import { log } from "@/logs/logger.ts";

const logger = log("supervisor");

export type DetachedTask = (signal: AbortSignal) => Promise<void>;

interface Tracked {
    name: string;
    controller: AbortController;
    done: Promise<void>;
}

export class TaskSupervisor {
    private readonly tasks = new Map<number, Tracked>();
    private nextId = 0;
    private closed = false;

    /** Start `task` without awaiting it. Ignored after close(). */
    spawn(name: string, task: DetachedTask): void {
        if (this.closed) {
            logger.warn(`Not starting "${name}": supervisor is shutting down`);
            return;
        }
        const id = this.nextId++;
        const controller = new AbortController();
        const done = Promise.resolve()
            .then(() => task(controller.signal))
            .catch((err: unknown) => {
                if (controller.signal.aborted) return;
                logger.warn(`Background task "${name}" failed: ${err instanceof Error ? err.message : String(err)}`);
            })
            .finally(() => {
                this.tasks.delete(id);
            });
        this.tasks.set(id, { name, controller, done });
    }

    get outstanding(): string[] {
        return [...this.tasks.values()].map(t => t.name);
    }

    /** Resolve once every task spawned so far has settled. */
    async idle(): Promise<void> {
        while (this.tasks.size > 0) {
            await Promise.all([...this.tasks.values()].map(t => t.done));
        }
    }

    /**
     * Refuse new work, wait up to `timeoutMs` for outstanding tasks,
     * then abort whatever is still running.
     */
    async close(timeoutMs: number): Promise<void> {
        this.closed = true;
        if (this.tasks.size === 0) return;

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<"timeout">(resolve => {
            timer = setTimeout(() => resolve("timeout"), timeoutMs);
        });
        const result = await Promise.race([this.idle().then(() => "idle" as const), timeout]);
        clearTimeout(timer);

        if (result === "timeout") {
            const names = this.outstanding;
            logger.warn(`Cancelling ${names.length} background task(s): ${names.join(", ")}`);
            for (const t of this.tasks.values()) t.controller.abort();
            await Promise.all([...this.tasks.values()].map(t => t.done));
        }
    }
}
