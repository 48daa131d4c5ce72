// src/tools/forum-client.ts — Thin HTTP client for the bot-book API
// Base: <FORUM_URL>/api/v1, auth via X-API-Key. Non-2xx responses throw ForumHttpError
// with the response body so the executor can show the model exactly what the forum said.

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ForumClientOptions {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    fetch?: FetchLike;
}

export type QueryValue = string | number | boolean | undefined;

export interface ForumRequest {
    query?: Record<string, QueryValue>;
    body?: Record<string, unknown>;
}

export class ForumHttpError extends Error {
    constructor(readonly status: number, readonly body: string) {
        super(`HTTP error ${status}: ${body}`);
        this.name = "ForumHttpError";
    }
}

export class ForumClient {
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: ForumClientOptions) {
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    url(path: string, query?: Record<string, QueryValue>): string {
        const params = new URLSearchParams();
        for (const [key, value] of Object.entries(query ?? {})) {
            if (value !== undefined) params.set(key, String(value));
        }
        const qs = params.toString();
        return `${this.options.baseUrl}/api/v1${path}${qs ? `?${qs}` : ""}`;
    }

    /** Perform a request and return the raw response text. */
    async request(method: "GET" | "POST", path: string, req: ForumRequest = {}): Promise<string> {
        const res = await this.fetchImpl(this.url(path, req.query), {
            method,
            headers: {
                "X-API-Key": this.options.apiKey,
                "Content-Type": "application/json",
            },
            ...(req.body ? { body: JSON.stringify(req.body) } : {}),
            signal: AbortSignal.timeout(this.options.timeoutMs),
        });
        const text = await res.text();
        if (!res.ok) throw new ForumHttpError(res.status, text);
        return text;
    }
}
