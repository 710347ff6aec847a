// ── Source-agnostic item ──

export interface Item {
    title: string;
    url: string;          // identity key
    body: string;         // plain text (stripped HTML), analysis input
    source: string;       // feed name
    publishedAt: string;  // display string, may be empty
}

export const KNOWN_CATEGORIES = [
    "RESEARCH",
    "PRODUCT",
    "INDUSTRY",
    "MARKET",
    "POLICY",
    "OPINION",
    "TUTORIAL",
] as const;

export type KnownCategory = (typeof KNOWN_CATEGORIES)[number];

/** Labels outside KNOWN_CATEGORIES pass through untouched. */
export type Category = KnownCategory | (string & {});

export interface Analysis {
    summary: string;
    score: number;        // integer in [1, 10]
    category: Category;
    annotations: Record<string, string>;
}

export interface EnrichedItem extends Item {
    analysisSummary: string;
    score: number;
    category: Category;
    annotations: Record<string, string>;
}

// ── Stage results ──

export type EnrichOutcome =
    | { kind: "enriched"; item: EnrichedItem }
    | { kind: "skipped"; item: Item; reason: string };

export interface EnrichReport {
    enriched: EnrichedItem[];
    skipped: { item: Item; reason: string }[];
    cancelled: boolean;
}

export interface RankResult {
    notifySet: EnrichedItem[];
    archiveSet: EnrichedItem[];
}

export interface Batch {
    batchIndex: number;      // 0-based
    totalBatches: number;
    totalItemCount: number;
    startRank: number;       // 1-based rank of items[0] in the full sequence
    items: EnrichedItem[];
}

export type BatchOutcome =
    | { kind: "sent"; batchIndex: number; attempts: number }
    | { kind: "failed"; batchIndex: number; attempts: number; reason: string };

export interface DispatchResult {
    allSucceeded: boolean;
    perBatchStatus: boolean[];
    outcomes: BatchOutcome[];
    cancelled: boolean;
}

/** A row handed to the archive: enriched, or skipped with empty analysis fields. */
export interface ArchiveEntry extends Item {
    analysisSummary: string;
    score: number | null;
    category: string;
    annotations: Record<string, string>;
}

// ── Config ──

export interface FeedConfig {
    name: string;
    url: string;
    enabled: boolean;
}

export interface AppConfig {
    feeds: FeedConfig[];
    filters: {
        requiredKeywords: string[];
        blockedKeywords: string[];
    };
    digest: {
        profile: string;
        maxArticles: number;
        minScore: number;
        articlesPerFeed: number;
        bodyLimit: number;
        processAll: boolean;
        maxArticlesToProcess: number;
    };
    llm: {
        provider: "openai" | "anthropic";
        apiKey: string;
        model: string;
        baseUrl: string;
        maxTokens: number;
        temperature: number;
        timeout: number;
        maxBodyChars: number;
        concurrency: number;
        annotationFields: string[];
    };
    slack: {
        webhookUrl: string;
        title: string;
        showSource: boolean;
        showScore: boolean;
        showCategory: boolean;
        maxBatchSize: number;
        maxRetries: number;
        timeout: number;
        batchPauseMs: number;
        backoffBaseMs: number;
        defaultRetryAfterSeconds: number;
        maxRetryAfterSeconds: number;
    };
    archive: {
        enabled: boolean;
        dir: string;
    };
    fetch: {
        timeout: number;
        userAgent: string;
    };
    logging: {
        level: "debug" | "info" | "warn" | "error";
    };
}
