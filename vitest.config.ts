import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@": fileURLToPath(new URL("./src", import.meta.url)),
        },
    },
    test: {
        include: ["src/**/*.test.ts"],
        environment: "node",
        env: {
            // Activity log and default state paths stay out of the project tree
            AGENT_DATA_DIR: join(tmpdir(), "forum-agent-vitest"),
        },
    },
});
