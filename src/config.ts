// src/config.ts — Config loader
// Resolution order:
//   1. src/forum-agent.config.json (committed defaults, validated with zod)
//   2. .env (gitignored, loaded by dotenv into process.env)
//   3. Environment variable overrides (FORUM_URL, LLM_MODEL, AUTO_INTERVAL, ...)
// Credentials never live in the config file; see requireCredentials().

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { PROJECT_ROOT, resolveDataDir } from "@/paths.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const CONFIG_PATH = resolve(__dirname, "forum-agent.config.json");

const positiveInt = z.number().int().positive();

const fileConfigSchema = z.object({
    agent: z.object({
        /** Name used in prompts until the personality record names the agent */
        defaultName: z.string().min(1),
    }),
    llm: z.object({
        /** "<provider>/<model-id>", e.g. "anthropic/claude-haiku-4-5" */
        model: z.string().min(1),
        maxOutputTokens: positiveInt,
        /** Round budget per agent loop invocation */
        maxRounds: positiveInt,
        /** USD per 1M tokens: [input, output], keyed by model id (without provider prefix) */
        pricing: z.record(z.tuple([z.number().nonnegative(), z.number().nonnegative()])),
    }),
    retry: z.object({
        maxAttempts: positiveInt,
        initialDelayMs: z.number().int().nonnegative(),
        maxDelayMs: z.number().int().nonnegative(),
    }),
    forum: z.object({
        baseUrl: z.string().url(),
        httpTimeoutMs: positiveInt,
    }),
    cycle: z.object({
        intervalSeconds: positiveInt,
        warmupSeconds: z.number().int().nonnegative(),
        /** Interactive messages seeded into each autonomous cycle */
        contextMessages: z.number().int().nonnegative(),
        /** Replied-to ids listed in the cycle reminder */
        replyReminderCount: positiveInt,
        maxPostsForEvolution: positiveInt,
    }),
    memory: z.object({
        maxCycleSummaries: positiveInt,
        maxBotNotes: positiveInt,
    }),
    history: z.object({
        maxPersisted: positiveInt,
        tokenBudget: positiveInt,
    }),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface AppConfig extends FileConfig {
    /** Absolute directory holding memory.json, personality.json, chat-history.json */
    dataDir: string;
}

export interface Credentials {
    llmApiKey: string;
    forumApiKey: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export class MissingCredentialError extends Error {
    constructor(readonly variable: string, hint: string) {
        super(`${variable} not set. ${hint}`);
        this.name = "MissingCredentialError";
    }
}

type Env = Record<string, string | undefined>;

/** Load .env from the project root into process.env (existing vars win). */
export function loadEnvFile(path: string = resolve(PROJECT_ROOT, ".env")): void {
    loadDotenv({ path });
}

function intFromEnv(env: Env, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

/** Overlay environment overrides on a validated file config. */
export function applyEnvOverrides(file: FileConfig, env: Env): AppConfig {
    const interval = intFromEnv(env, "AUTO_INTERVAL");
    const maxRounds = intFromEnv(env, "MAX_ITERATIONS");
    const httpTimeoutSeconds = intFromEnv(env, "HTTP_TIMEOUT");

    return {
        ...file,
        llm: {
            ...file.llm,
            model: env.LLM_MODEL || file.llm.model,
            maxRounds: maxRounds ?? file.llm.maxRounds,
        },
        forum: {
            baseUrl: (env.FORUM_URL || file.forum.baseUrl).replace(/\/+$/, ""),
            httpTimeoutMs: httpTimeoutSeconds !== undefined ? httpTimeoutSeconds * 1000 : file.forum.httpTimeoutMs,
        },
        cycle: {
            ...file.cycle,
            intervalSeconds: interval ?? file.cycle.intervalSeconds,
        },
        dataDir: resolveDataDir(env.AGENT_DATA_DIR),
    };
}

export function parseFileConfig(raw: unknown): FileConfig {
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        throw new ConfigError(`Invalid config: ${issues}`);
    }
    return parsed.data;
}

export function loadConfig(env: Env = process.env, configPath: string = CONFIG_PATH): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (err) {
        throw new ConfigError(`Failed to read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return applyEnvOverrides(parseFileConfig(raw), env);
}

/**
 * Both credentials are mandatory. Absence is fatal at startup, never retried.
 * @throws MissingCredentialError naming the first missing variable
 */
export function requireCredentials(env: Env = process.env): Credentials {
    const llmApiKey = env.ANTHROPIC_API_KEY?.trim();
    if (!llmApiKey) {
        throw new MissingCredentialError("ANTHROPIC_API_KEY", "Copy .env.example to .env and fill it in.");
    }
    const forumApiKey = env.FORUM_API_KEY?.trim();
    if (!forumApiKey) {
        throw new MissingCredentialError("FORUM_API_KEY", "Register a bot on the forum first and put its key in .env.");
    }
    return { llmApiKey, forumApiKey };
}
