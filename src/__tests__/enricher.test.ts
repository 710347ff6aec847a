import { describe, expect, it } from "vitest";
import {
    FALLBACK_SCORE,
    buildAnalysisRequest,
    enrichItems,
    enrichOne,
    normalizeScore,
    parseAnalysis,
} from "../enricher";
import type { EnrichOptions } from "../enricher";
import { FakeAnalysis, analysisJson, makeItem } from "./helpers";

const options: EnrichOptions = {
    profile: "ai",
    maxBodyChars: 2000,
    annotationFields: ["related_companies", "market_impact"],
};

describe("normalizeScore", () => {
    it.each([
        [7, 7],
        [1, 1],
        [10, 10],
        [7.9, 7],
        ["8", 8],
        [" 3 ", 3],
    ])("keeps %j as %d", (raw, expected) => {
        expect(normalizeScore(raw)).toEqual({ score: expected, corrected: false });
    });

    it.each([97, 0, -3, 10.5, "high", "", null, true, [7], { value: 7 }, Number.NaN])(
        "falls back for %j",
        (raw) => {
            expect(normalizeScore(raw)).toEqual({ score: FALLBACK_SCORE, corrected: true });
        },
    );
});

describe("parseAnalysis", () => {
    it("replaces an out-of-range score and passes the category through", () => {
        const result = parseAnalysis('{"score": 97, "summary": "Chip maker beats estimates.", "category": "X"}');
        expect(result).toEqual({
            ok: true,
            scoreCorrected: true,
            analysis: { summary: "Chip maker beats estimates.", score: 5, category: "X", annotations: {} },
        });
    });

    it("unwraps a fenced JSON block", () => {
        const raw = "Here you go:\n```json\n" + analysisJson(6) + "\n```";
        const result = parseAnalysis(raw);
        expect(result.ok && result.analysis.score).toBe(6);
    });

    it("passes annotation fields through as strings", () => {
        const raw = analysisJson(8, { related_companies: "NVDA, TSMC", market_impact: { short: "up" } });
        const result = parseAnalysis(raw, ["related_companies", "market_impact", "investment_insight"]);
        expect(result.ok && result.analysis.annotations).toEqual({
            related_companies: "NVDA, TSMC",
            market_impact: '{"short":"up"}',
            investment_insight: "",
        });
    });

    it("rejects text that is not JSON", () => {
        const result = parseAnalysis("I cannot help with that.");
        expect(result.ok).toBe(false);
        expect(!result.ok && result.reason.startsWith("invalid JSON")).toBe(true);
    });

    it("rejects a JSON value that is not an object", () => {
        expect(parseAnalysis("[1, 2, 3]")).toEqual({ ok: false, reason: "response is not a JSON object" });
    });

    it("rejects a response without a score", () => {
        expect(parseAnalysis('{"summary": "s", "category": "MARKET"}')).toEqual({ ok: false, reason: "score is required" });
    });

    it("rejects a response without a summary or category", () => {
        expect(parseAnalysis('{"score": 7, "category": "MARKET"}').ok).toBe(false);
        expect(parseAnalysis('{"score": 7, "summary": "s"}').ok).toBe(false);
    });

    it("keeps a null score as present and falls back", () => {
        const result = parseAnalysis('{"summary": "s", "score": null, "category": "MARKET"}');
        expect(result.ok && result.analysis.score).toBe(FALLBACK_SCORE);
    });
});

describe("buildAnalysisRequest", () => {
    it("renders source, title, url and a capped body", () => {
        const item = makeItem(1, { body: "abcdefghij", source: "Wire" });
        const { user } = buildAnalysisRequest(item, { profile: "ai", maxBodyChars: 5 });
        expect(user).toContain("Source: Wire\nTitle: AI story 1\nURL: https://example.com/1\n");
        expect(user.endsWith("Content:\nabcde")).toBe(true);
    });

    it("uses an unknown profile as free-text context", () => {
        const { user } = buildAnalysisRequest(makeItem(1), { profile: "semiconductors only", maxBodyChars: 10 });
        expect(user.startsWith("Context: semiconductors only\n")).toBe(true);
    });

    it("marks an empty body", () => {
        const { user } = buildAnalysisRequest(makeItem(1, { body: "" }), { profile: "ai", maxBodyChars: 10 });
        expect(user.endsWith("Content:\n(no content)")).toBe(true);
    });
});

describe("enrichOne", () => {
    it("merges the analysis onto the item", async () => {
        const service = new FakeAnalysis(() => analysisJson(9, { related_companies: "AAPL" }));
        const outcome = await enrichOne(makeItem(1), service, options);
        expect(outcome).toEqual({
            kind: "enriched",
            item: {
                ...makeItem(1),
                analysisSummary: "A summary.",
                score: 9,
                category: "RESEARCH",
                annotations: { related_companies: "AAPL", market_impact: "" },
            },
        });
    });

    it("turns a service error into a skip", async () => {
        const service = new FakeAnalysis(() => new Error("429 Too Many Requests"));
        const outcome = await enrichOne(makeItem(1), service, options);
        expect(outcome).toEqual({ kind: "skipped", item: makeItem(1), reason: "analysis failed: 429 Too Many Requests" });
    });
});

describe("enrichItems", () => {
    it("skips failed items and keeps going, preserving order", async () => {
        const service = new FakeAnalysis((url) => {
            if (url.endsWith("/2")) return new Error("timeout");
            if (url.endsWith("/3")) return "not json";
            return analysisJson(url.endsWith("/1") ? 4 : 8);
        });
        const items = [1, 2, 3, 4].map((n) => makeItem(n));

        const report = await enrichItems(items, service, options);

        expect(service.requests).toHaveLength(4);
        expect(report.enriched.map((i) => [i.url, i.score])).toEqual([
            ["https://example.com/1", 4],
            ["https://example.com/4", 8],
        ]);
        expect(report.skipped.map((s) => s.item.url)).toEqual(["https://example.com/2", "https://example.com/3"]);
        expect(report.skipped[0]?.reason).toBe("analysis failed: timeout");
        expect(report.cancelled).toBe(false);
    });

    it("stops starting calls once the signal is aborted", async () => {
        const controller = new AbortController();
        const service = new FakeAnalysis(() => {
            controller.abort();
            return analysisJson(7);
        });
        const items = [1, 2, 3].map((n) => makeItem(n));

        const report = await enrichItems(items, service, { ...options, signal: controller.signal });

        expect(service.requests).toHaveLength(1);
        expect(report.enriched.map((i) => i.url)).toEqual(["https://example.com/1"]);
        expect(report.skipped).toEqual([
            { item: items[1], reason: "cancelled" },
            { item: items[2], reason: "cancelled" },
        ]);
        expect(report.cancelled).toBe(true);
    });

    it("keeps input order with a worker pool", async () => {
        const delays: Record<string, number> = { "1": 30, "2": 5, "3": 15, "4": 1, "5": 10 };
        const service = {
            async analyze(request: { user: string }) {
                const n = request.user.match(/^URL: https:\/\/example\.com\/(\d+)$/m)?.[1] ?? "";
                await new Promise((r) => setTimeout(r, delays[n] ?? 0));
                return analysisJson(Number(n) + 1);
            },
        };
        const items = [1, 2, 3, 4, 5].map((n) => makeItem(n));

        const report = await enrichItems(items, service, { ...options, concurrency: 3 });

        expect(report.enriched.map((i) => i.score)).toEqual([2, 3, 4, 5, 6]);
    });

    it("returns an empty report for no items", async () => {
        const service = new FakeAnalysis(() => analysisJson(7));
        expect(await enrichItems([], service, options)).toEqual({ enriched: [], skipped: [], cancelled: false });
        expect(service.requests).toHaveLength(0);
    });
});
