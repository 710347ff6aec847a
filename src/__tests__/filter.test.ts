import { describe, expect, it } from "vitest";
import { filterItems } from "../filter";
import { makeItem } from "./helpers";

describe("filterItems", () => {
    const items = [
        makeItem(1, { title: "New LLM released", body: "" }),
        makeItem(2, { title: "Gardening tips", body: "Tomatoes in spring" }),
        makeItem(3, { title: "Quarterly earnings", body: "Machine Learning drove growth" }),
        makeItem(4, { title: "Sponsored: the best AI laptop", body: "" }),
    ];

    it("keeps items matching a required term, case-insensitively, in title or body", () => {
        const out = filterItems(items, { required: ["llm", "machine learning"], blocked: [] });
        expect(out.map((i) => i.url)).toEqual(["https://example.com/1", "https://example.com/3"]);
    });

    it("rejects blocked terms even when a required term also matches", () => {
        const out = filterItems(items, { required: ["AI", "LLM"], blocked: ["sponsored"] });
        expect(out.map((i) => i.url)).toEqual(["https://example.com/1"]);
    });

    it("lets blocking win when a term is both required and blocked", () => {
        const out = filterItems(items, { required: ["llm"], blocked: ["LLM"] });
        expect(out).toEqual([]);
    });

    it("accepts every unblocked item when no term is required", () => {
        const out = filterItems(items, { required: [], blocked: ["tomatoes"] });
        expect(out.map((i) => i.url)).toEqual([
            "https://example.com/1",
            "https://example.com/3",
            "https://example.com/4",
        ]);
    });

    it("ignores blank keywords", () => {
        const out = filterItems(items, { required: ["  "], blocked: [""] });
        expect(out).toHaveLength(4);
    });

    it("returns a subsequence of the input", () => {
        const out = filterItems(items, { required: ["a"], blocked: [] });
        const positions = out.map((i) => items.indexOf(i));
        expect(positions).toEqual([...positions].sort((a, b) => a - b));
        expect(new Set(positions).size).toBe(positions.length);
    });

    it("accepts sets as rule collections", () => {
        const out = filterItems(items, { required: new Set(["gardening"]), blocked: new Set<string>() });
        expect(out.map((i) => i.url)).toEqual(["https://example.com/2"]);
    });
});
