import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { MemoryStore } from "@/memory/store.ts";
import { fromDocument, loadMemory, saveMemory } from "@/memory/persistence.ts";
import { tempDir } from "@/testing/fakes.ts";

const clock = () => new Date("2025-03-01T00:00:00.000Z");

function populated(): MemoryStore {
    const memory = new MemoryStore(undefined, clock);
    memory.recordAction({ type: "read_post", postId: 3, botsSeen: ["Bob"], topics: ["Rust"] });
    memory.recordAction({ type: "reply", tool: "reply_to_post", targetId: 3, body: "Agreed", botsSeen: ["Bob"], topics: ["Rust"] });
    memory.recordAction({ type: "create_post", postId: 9, title: "Ideas" });
    memory.recordAction({ type: "vote", key: "reply:11", value: -1 });
    memory.addCycleSummary(4, ["read_post", "reply_to_post"], "Replied to Bob");
    memory.cycleCount = 4;
    return memory;
}

describe("memory persistence", () => {
    it("writes snake_case keys with ids as strings", async () => {
        const path = join(tempDir(), "memory.json");
        await saveMemory(populated(), path);

        const doc = JSON.parse(readFileSync(path, "utf-8"));
        expect(doc.posts_read).toEqual({ "3": "2025-03-01T00:00:00.000Z" });
        expect(doc.posts_replied).toEqual({ "3": "Agreed" });
        expect(doc.votes_cast).toEqual({ "reply:11": -1 });
        expect(doc.bots_interacted.Bob.interaction_count).toBe(2);
        expect(doc.cycle_count).toBe(4);
    });

    it("restores what it saved", async () => {
        const path = join(tempDir(), "memory.json");
        const original = populated();
        await saveMemory(original, path);

        const loaded = await loadMemory(path);
        expect([...loaded.postsRead]).toEqual([...original.postsRead]);
        expect(loaded.alreadyReplied(3)).toBe(true);
        expect(loaded.postsCreated).toEqual([{ id: 9, title: "Ideas", timestamp: "2025-03-01T00:00:00.000Z" }]);
        expect(loaded.votesCast.get("reply:11")).toBe(-1);
        expect(loaded.botsInteracted.get("Bob")?.notes).toEqual(["Replied: Agreed"]);
        expect(loaded.cycleSummaries).toEqual(original.cycleSummaries);
        expect(loaded.cycleCount).toBe(4);
    });

    it("starts empty when the file does not exist", async () => {
        const loaded = await loadMemory(join(tempDir(), "missing.json"));
        expect(loaded.cycleCount).toBe(0);
        expect(loaded.postsRead.size).toBe(0);
    });

    it("starts empty when the file is not valid JSON", async () => {
        const path = join(tempDir(), "memory.json");
        writeFileSync(path, "{ not json");

        const loaded = await loadMemory(path);
        expect(loaded.postsReplied.size).toBe(0);
    });

    it("fills in fields an older document lacks", () => {
        const loaded = fromDocument({ cycle_count: 7, posts_replied: { "5": "hi" } });
        expect(loaded.cycleCount).toBe(7);
        expect(loaded.alreadyReplied(5)).toBe(true);
        expect(loaded.cycleSummaries).toEqual([]);
    });

    it("drops vote keys it does not recognise", () => {
        const loaded = fromDocument({ votes_cast: { "post:1": 1, "comment:2": 1 } });
        expect([...loaded.votesCast.keys()]).toEqual(["post:1"]);
    });

    it("creates the data directory on save", async () => {
        const path = join(tempDir(), "nested", "dir", "memory.json");
        await saveMemory(new MemoryStore(), path);
        expect(JSON.parse(readFileSync(path, "utf-8")).cycle_count).toBe(0);
    });
});
