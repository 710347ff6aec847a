import type { Item } from "./types";

export interface KeywordRules {
    required: Iterable<string>;
    blocked: Iterable<string>;
}

function normalizeTerms(terms: Iterable<string>): string[] {
    const out: string[] = [];
    for (const t of terms) {
        const term = t.trim().toLowerCase();
        if (term) out.push(term);
    }
    return out;
}

/**
 * Keyword pre-filter, run before any paid analysis call.
 *
 * Blocked terms are checked first, so a term listed as both required and
 * blocked always rejects. An empty required list accepts everything that
 * was not blocked. Output is a subsequence of the input.
 */
export function filterItems<T extends Pick<Item, "title" | "body">>(items: readonly T[], rules: KeywordRules): T[] {
    const blocked = normalizeTerms(rules.blocked);
    const required = normalizeTerms(rules.required);

    return items.filter((item) => {
        const haystack = `${item.title ?? ""} ${item.body ?? ""}`.toLowerCase();
        if (blocked.some((term) => haystack.includes(term))) return false;
        if (required.length === 0) return true;
        return required.some((term) => haystack.includes(term));
    });
}
