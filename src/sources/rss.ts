import Parser from "rss-parser";
import { formatDateTime } from "../datetime";
import { errorMessage, silentLogger } from "../logger";
import type { Logger } from "../logger";
import type { FeedConfig, Item } from "../types";

export interface FeedEntry {
    title?: string;
    link?: string;
    summary?: string;
    content?: string;
    contentSnippet?: string;
    isoDate?: string;
    pubDate?: string;
}

/** What we need from rss-parser; tests pass a fake. */
export interface FeedReader {
    parseURL(url: string): Promise<{ items: FeedEntry[] }>;
}

export interface FetchFeedsOptions {
    articlesPerFeed: number;
    bodyLimit: number;
    timeout: number;
    userAgent: string;
    logger?: Logger;
    reader?: FeedReader;
}

const ENTITIES: Record<string, string> = {
    "&nbsp;": " ",
    "&amp;": "&",
    "&lt;": "<",
    "&gt;": ">",
    "&quot;": '"',
    "&#39;": "'",
};

export function cleanHTML(text: string): string {
    return text
        .replace(/<[^>]+>/g, "")
        .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, (m) => ENTITIES[m] ?? m)
        .replace(/\s+/g, " ")
        .trim();
}

/** `YYYY-MM-DD HH:mm` when parseable, else the raw string (max 19 chars), else "". */
export function formatPublished(entry: FeedEntry): string {
    for (const raw of [entry.isoDate, entry.pubDate]) {
        if (!raw) continue;
        const d = new Date(raw);
        if (!Number.isNaN(d.getTime())) return formatDateTime(d);
    }
    return (entry.pubDate ?? entry.isoDate ?? "").slice(0, 19);
}

export function normalizeEntry(entry: FeedEntry, feedName: string, bodyLimit: number): Item | null {
    const title = cleanHTML(entry.title ?? "");
    const url = (entry.link ?? "").trim();
    if (!title || !url) return null;

    const rawBody = entry.contentSnippet || entry.summary || entry.content || "";
    return {
        title,
        url,
        body: cleanHTML(rawBody).slice(0, bodyLimit),
        source: feedName,
        publishedAt: formatPublished(entry),
    };
}

/**
 * Fetch every enabled feed in order. A failing feed is logged and skipped;
 * duplicate URLs across feeds are kept once (first wins).
 */
export async function fetchFeeds(feeds: readonly FeedConfig[], options: FetchFeedsOptions): Promise<Item[]> {
    const logger = options.logger ?? silentLogger;
    const reader: FeedReader = options.reader ?? new Parser({
        timeout: options.timeout,
        headers: { "User-Agent": options.userAgent },
    });

    const enabled = feeds.filter((f) => f.enabled);
    const seen = new Set<string>();
    const items: Item[] = [];

    for (const feed of enabled) {
        try {
            const parsed = await reader.parseURL(feed.url);
            let count = 0;
            for (const entry of parsed.items.slice(0, options.articlesPerFeed)) {
                const item = normalizeEntry(entry, feed.name, options.bodyLimit);
                if (!item || seen.has(item.url)) continue;
                seen.add(item.url);
                items.push(item);
                count++;
            }
            logger.info(`   ✓ ${feed.name}: ${count} items`);
        } catch (err) {
            logger.warn(`   ⚠️ ${feed.name} failed: ${errorMessage(err)}`, { url: feed.url });
        }
    }

    return items;
}
