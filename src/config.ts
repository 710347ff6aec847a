import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import YAML from "yaml";
import { z } from "zod";
import { isLogLevel } from "./logger";
import { MAX_BLOCKS_PER_MESSAGE, blocksPerMessage } from "./renderer";
import type { AppConfig } from "./types";

const ROOT_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..");

const DEFAULTS: AppConfig = {
    feeds: [],
    filters: {
        requiredKeywords: ["AI", "machine learning", "LLM"],
        blockedKeywords: ["sponsored", "advertisement"],
    },
    digest: {
        profile: "ai",
        maxArticles: 10,
        minScore: 6,
        articlesPerFeed: 15,
        bodyLimit: 800,
        processAll: true,
        maxArticlesToProcess: 50,
    },
    llm: {
        provider: "openai",
        apiKey: "",
        model: "gpt-4o-mini",
        baseUrl: "",
        maxTokens: 2000,
        temperature: 0.3,
        timeout: 60_000,
        maxBodyChars: 2000,
        concurrency: 1,
        annotationFields: ["related_companies", "market_impact", "investment_insight"],
    },
    slack: {
        webhookUrl: "",
        title: "📰 News Digest",
        showSource: true,
        showScore: true,
        showCategory: true,
        maxBatchSize: 15,
        maxRetries: 3,
        timeout: 10_000,
        batchPauseMs: 1000,
        backoffBaseMs: 1000,
        defaultRetryAfterSeconds: 5,
        maxRetryAfterSeconds: 60,
    },
    archive: {
        enabled: true,
        dir: "data/archive",
    },
    fetch: {
        timeout: 15_000,
        userAgent: "feed-digest/0.1",
    },
    logging: {
        level: "info",
    },
};

const positiveInt = z.number().int().positive();

const configSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
    feeds: z.array(z.object({
        name: z.string().min(1),
        url: z.string().url(),
        enabled: z.boolean().default(true),
    })),
    filters: z.object({
        requiredKeywords: z.array(z.string()),
        blockedKeywords: z.array(z.string()),
    }),
    digest: z.object({
        profile: z.string().min(1),
        maxArticles: positiveInt,
        minScore: z.number().int().min(1).max(10),
        articlesPerFeed: positiveInt,
        bodyLimit: positiveInt,
        processAll: z.boolean(),
        maxArticlesToProcess: positiveInt,
    }),
    llm: z.object({
        provider: z.enum(["openai", "anthropic"]),
        apiKey: z.string(),
        model: z.string().min(1),
        baseUrl: z.string(),
        maxTokens: positiveInt,
        temperature: z.number().min(0).max(2),
        timeout: positiveInt,
        maxBodyChars: positiveInt,
        concurrency: positiveInt,
        annotationFields: z.array(z.string().min(1)),
    }),
    slack: z.object({
        webhookUrl: z.string(),
        title: z.string().min(1),
        showSource: z.boolean(),
        showScore: z.boolean(),
        showCategory: z.boolean(),
        maxBatchSize: positiveInt.refine(
            (n) => blocksPerMessage(n) <= MAX_BLOCKS_PER_MESSAGE,
            { message: `a batch this large renders more than ${MAX_BLOCKS_PER_MESSAGE} Slack blocks` },
        ),
        maxRetries: positiveInt,
        timeout: positiveInt,
        batchPauseMs: z.number().int().nonnegative(),
        backoffBaseMs: z.number().int().nonnegative(),
        defaultRetryAfterSeconds: z.number().nonnegative(),
        maxRetryAfterSeconds: z.number().nonnegative(),
    }),
    archive: z.object({
        enabled: z.boolean(),
        dir: z.string().min(1),
    }),
    fetch: z.object({
        timeout: positiveInt,
        userAgent: z.string().min(1),
    }),
    logging: z.object({
        level: z.enum(["debug", "info", "warn", "error"]),
    }),
});

export class ConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
        this.name = "ConfigError";
    }
}

export interface LoadConfigOptions {
    /** Defaults to `<root>/config.yaml`; a missing default file means "all defaults". */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    /** Dry runs never post, so they do not need a webhook URL. */
    requireWebhook?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function snakeToCamel(obj: unknown): unknown {
    if (Array.isArray(obj)) return obj.map(snakeToCamel);
    if (isPlainObject(obj)) {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
            result[camelKey] = snakeToCamel(value);
        }
        return result;
    }
    return obj;
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };
    for (const [key, sv] of Object.entries(source)) {
        const tv = result[key];
        if (isPlainObject(sv) && isPlainObject(tv)) {
            result[key] = deepMerge(tv, sv);
        } else if (sv !== undefined && sv !== null) {
            result[key] = sv;
        }
    }
    return result;
}

function readYaml(path: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = YAML.parse(readFileSync(path, "utf-8"));
    } catch (err) {
        throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) throw new ConfigError([`${path}: top level must be a mapping`]);
    const normalized = snakeToCamel(parsed);
    return isPlainObject(normalized) ? normalized : {};
}

/** Loads `<root>/.env` into process.env; variables already set win. */
export function loadEnvFile(path = resolve(ROOT_DIR, ".env")): void {
    if (existsSync(path)) dotenv.config({ path });
}

/**
 * Builds the run configuration once: defaults ← config.yaml ← environment.
 * Throws ConfigError listing every problem; nothing touches the network before this returns.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const configPath = options.configPath ?? resolve(ROOT_DIR, "config.yaml");

    let merged: Record<string, unknown> = Object.fromEntries(Object.entries(DEFAULTS));
    if (existsSync(configPath)) {
        merged = deepMerge(merged, readYaml(configPath));
    } else if (options.configPath) {
        throw new ConfigError([`config file not found: ${configPath}`]);
    }

    const result = configSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`));
    }
    const config = result.data;

    // Env fallbacks
    if (!config.slack.webhookUrl) config.slack.webhookUrl = env.SLACK_WEBHOOK_URL ?? "";
    if (!config.llm.apiKey) {
        config.llm.apiKey = (config.llm.provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY) ?? "";
    }
    const level = env.LOG_LEVEL?.toLowerCase();
    if (level && isLogLevel(level)) {
        config.logging.level = level;
    }

    const problems: string[] = [];
    if (options.requireWebhook !== false && !config.slack.webhookUrl) {
        problems.push("missing SLACK_WEBHOOK_URL (or slack.webhook_url)");
    }
    if (!config.llm.apiKey) {
        problems.push(config.llm.provider === "anthropic"
            ? "missing ANTHROPIC_API_KEY (or llm.api_key)"
            : "missing OPENAI_API_KEY (or llm.api_key)");
    }
    if (config.feeds.filter((f) => f.enabled).length === 0) {
        problems.push("no enabled feeds configured");
    }
    if (problems.length > 0) throw new ConfigError(problems);

    return config;
}

export { DEFAULTS, ROOT_DIR };
