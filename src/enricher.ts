import { z } from "zod";
import type { AnalysisRequest, AnalysisService } from "./analyzer";
import { errorMessage, silentLogger } from "./logger";
import type { Logger } from "./logger";
import { KNOWN_CATEGORIES } from "./types";
import type { Analysis, EnrichOutcome, EnrichReport, EnrichedItem, Item } from "./types";

/** Score given to items whose model-reported score is unusable. */
export const FALLBACK_SCORE = 5;

const SYSTEM_PROMPT = `You are a senior technology and markets analyst. Analyse the news article you are given and respond with a single JSON object.

1. summary: 3-6 sentences covering what happened, the key numbers, dates, companies or people involved, and why it matters.
2. score: an integer from 1 to 10, the sum of
   - novelty (1-3): is this breaking or exclusive news?
   - impact (1-4): how much does it move the industry or the market?
   - actionability (1-3): does a reader need to pay attention now?
3. category: one of ${KNOWN_CATEGORIES.join(", ")}.
4. related_companies: listed companies directly or indirectly affected, with tickers, and why.
5. market_impact: expected short-term (1-2 weeks) and medium-term (1-3 months) effects.
6. investment_insight: opportunities, risks and what to watch next.

Respond with JSON only:
{
  "summary": "...",
  "score": 7,
  "category": "PRODUCT",
  "related_companies": "...",
  "market_impact": "...",
  "investment_insight": "..."
}`;

const PROFILE_CONTEXT: Record<string, string> = {
    ai: "This is AI / technology news. Focus on effects on tech stocks and the AI supply chain.",
    tw_stock: "This is Taiwan stock market news. Focus on Taiwan-listed companies and use their numeric tickers (e.g. 2330).",
    us_stock: "This is US stock market news. Focus on US-listed companies and use their tickers (e.g. NVDA, AAPL).",
};

export interface EnrichOptions {
    /** Selects the analysis focus line; unknown profiles are passed through as free text. */
    profile: string;
    maxBodyChars: number;
    annotationFields: readonly string[];
    /** Calls in flight at once. 1 (the default) means strictly sequential. */
    concurrency?: number;
    /** Once aborted, no new analysis call is started. In-flight calls finish normally. */
    signal?: AbortSignal;
    logger?: Logger;
}

export function buildAnalysisRequest(item: Item, options: Pick<EnrichOptions, "profile" | "maxBodyChars">): AnalysisRequest {
    const context = PROFILE_CONTEXT[options.profile] ?? options.profile;
    const body = (item.body ?? "").trim().slice(0, options.maxBodyChars);
    const user = `Context: ${context}

Source: ${item.source}
Title: ${item.title}
URL: ${item.url}

Content:
${body || "(no content)"}`;
    return { system: SYSTEM_PROMPT, user };
}

// ── Response validation ──

const requiredValue = (name: string) =>
    z.custom<unknown>((v) => v !== undefined, { message: `${name} is required` });

const analysisSchema = z.object({
    summary: z.string().trim().min(1, "summary is empty"),
    score: requiredValue("score"),
    category: z.string().trim().min(1, "category is empty"),
});

export type ParseResult =
    | { ok: true; analysis: Analysis; scoreCorrected: boolean }
    | { ok: false; reason: string };

/** Models sometimes wrap JSON in a markdown fence even when asked not to. */
export function extractJson(text: string): string {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
    return (fenced?.[1] ?? text).trim();
}

function toNumber(raw: unknown): number {
    if (typeof raw === "number") return raw;
    if (typeof raw === "string" && raw.trim() !== "") return Number(raw.trim());
    return NaN;
}

/** Integer score in [1, 10]; anything else becomes FALLBACK_SCORE. */
export function normalizeScore(raw: unknown): { score: number; corrected: boolean } {
    const n = toNumber(raw);
    if (!Number.isFinite(n) || n < 1 || n > 10) return { score: FALLBACK_SCORE, corrected: true };
    return { score: Math.trunc(n), corrected: false };
}

function toAnnotation(value: unknown): string {
    if (value === undefined || value === null) return "";
    if (typeof value === "string") return value;
    return JSON.stringify(value);
}

export function parseAnalysis(raw: string, annotationFields: readonly string[] = []): ParseResult {
    let data: unknown;
    try {
        data = JSON.parse(extractJson(raw));
    } catch (err) {
        return { ok: false, reason: `invalid JSON: ${errorMessage(err)}` };
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return { ok: false, reason: "response is not a JSON object" };
    }

    const parsed = analysisSchema.safeParse(data);
    if (!parsed.success) {
        return { ok: false, reason: parsed.error.issues.map((i) => i.message).join("; ") };
    }

    const record: Record<string, unknown> = Object.fromEntries(Object.entries(data));
    const annotations: Record<string, string> = {};
    for (const field of annotationFields) annotations[field] = toAnnotation(record[field]);

    const { score, corrected } = normalizeScore(parsed.data.score);
    return {
        ok: true,
        scoreCorrected: corrected,
        analysis: {
            summary: parsed.data.summary,
            score,
            category: parsed.data.category,
            annotations,
        },
    };
}

// ── Enrichment ──

/** One item, one analysis call. Never throws: every failure becomes a skip. */
export async function enrichOne(item: Item, service: AnalysisService, options: EnrichOptions): Promise<EnrichOutcome> {
    const logger = options.logger ?? silentLogger;
    let raw: string;
    try {
        raw = await service.analyze(buildAnalysisRequest(item, options));
    } catch (err) {
        return { kind: "skipped", item, reason: `analysis failed: ${errorMessage(err)}` };
    }

    const result = parseAnalysis(raw, options.annotationFields);
    if (!result.ok) return { kind: "skipped", item, reason: result.reason };

    if (result.scoreCorrected) {
        logger.warn(`⚠️  Unusable score, using ${FALLBACK_SCORE}`, { title: item.title, url: item.url });
    }

    const { summary, score, category, annotations } = result.analysis;
    const enriched: EnrichedItem = { ...item, analysisSummary: summary, score, category, annotations };
    return { kind: "enriched", item: enriched };
}

/**
 * Enrich items in input order. With concurrency > 1 a small worker pool is
 * used; results still come back in input order.
 */
export async function enrichItems(items: readonly Item[], service: AnalysisService, options: EnrichOptions): Promise<EnrichReport> {
    const logger = options.logger ?? silentLogger;
    const total = items.length;
    const outcomes: (EnrichOutcome | undefined)[] = new Array(total).fill(undefined);
    let cursor = 0;
    let cancelled = false;

    async function worker() {
        while (true) {
            if (cursor >= total) break;
            if (options.signal?.aborted) {
                cancelled = true;
                break;
            }
            const idx = cursor++;
            const item = items[idx];
            if (!item) continue;

            const outcome = await enrichOne(item, service, options);
            outcomes[idx] = outcome;

            const label = `[${idx + 1}/${total}]`;
            if (outcome.kind === "enriched") {
                logger.info(`   ${label} ✓ ${item.title.slice(0, 40)} (score: ${outcome.item.score})`);
            } else {
                logger.warn(`   ${label} ✗ ${item.title.slice(0, 40)}: ${outcome.reason}`, { url: item.url });
            }
        }
    }

    const workers = Math.max(1, Math.min(options.concurrency ?? 1, total));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const report: EnrichReport = { enriched: [], skipped: [], cancelled };
    items.forEach((item, idx) => {
        const outcome = outcomes[idx];
        if (!outcome) report.skipped.push({ item, reason: "cancelled" });
        else if (outcome.kind === "enriched") report.enriched.push(outcome.item);
        else report.skipped.push({ item: outcome.item, reason: outcome.reason });
    });
    return report;
}
