import { formatDateTime } from "./datetime";
import type { Batch, EnrichedItem } from "./types";

// ── Slack Block Kit shapes (the subset we emit) ──

export interface TextObject {
    type: "mrkdwn" | "plain_text";
    text: string;
    emoji?: boolean;
}

export type SlackBlock =
    | { type: "header"; text: TextObject }
    | { type: "section"; text: TextObject }
    | { type: "context"; elements: TextObject[] }
    | { type: "divider" };

export interface SlackMessage {
    /** Fallback text for notifications / clients without block support. */
    text: string;
    blocks: SlackBlock[];
}

export interface RenderOptions {
    title: string;
    showScore: boolean;
    showCategory: boolean;
    showSource: boolean;
    now: Date;
}

export const MAX_BLOCKS_PER_MESSAGE = 50;
const MAX_SECTION_CHARS = 3000;
const MAX_HEADER_CHARS = 150;

const HEADER_BLOCKS = 3;   // header, context, divider
const FOOTER_BLOCKS = 2;   // divider, context
const BLOCKS_PER_ITEM = 2; // section, context

/** Worst-case block count for a message carrying `n` items. */
export function blocksPerMessage(n: number): number {
    return HEADER_BLOCKS + n * BLOCKS_PER_ITEM + Math.max(0, n - 1) + FOOTER_BLOCKS;
}

const CATEGORY_EMOJI: Record<string, string> = {
    RESEARCH: "🔬",
    PRODUCT: "🚀",
    INDUSTRY: "🏢",
    MARKET: "📈",
    POLICY: "⚖️",
    OPINION: "💭",
    TUTORIAL: "📚",
};

export function scoreEmoji(score: number): string {
    if (score >= 8) return "🔥";
    if (score >= 6) return "⭐";
    return "📌";
}

export function categoryEmoji(category: string): string {
    return CATEGORY_EMOJI[category.toUpperCase()] ?? "📄";
}

/** Slack mrkdwn control characters. */
export function escapeMrkdwn(s: string): string {
    return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Link targets also drop `|`, which would end the URL inside `<url|label>`. */
export function escapeLinkUrl(url: string): string {
    return escapeMrkdwn(url).replace(/\|/g, "%7C");
}

function truncate(s: string, max: number): string {
    return s.length <= max ? s : `${s.slice(0, max - 1)}…`;
}

const mrkdwn = (text: string): TextObject => ({ type: "mrkdwn", text });

function itemBlocks(item: EnrichedItem, rank: number, options: RenderOptions): SlackBlock[] {
    const title = escapeMrkdwn(item.title || "Untitled");
    const summary = escapeMrkdwn(item.analysisSummary);
    const blocks: SlackBlock[] = [
        { type: "section", text: mrkdwn(truncate(`*${rank}. <${escapeLinkUrl(item.url)}|${title}>*\n${summary}`, MAX_SECTION_CHARS)) },
    ];

    const meta: TextObject[] = [];
    if (options.showScore) meta.push(mrkdwn(`${scoreEmoji(item.score)} *${item.score}/10*`));
    if (options.showCategory) meta.push(mrkdwn(`${categoryEmoji(item.category)} ${escapeMrkdwn(item.category)}`));
    if (options.showSource) meta.push(mrkdwn(`🔗 ${escapeMrkdwn(item.source || "Unknown")}`));
    if (meta.length > 0) blocks.push({ type: "context", elements: meta });

    return blocks;
}

/**
 * One Slack message per batch. Ranks continue across batches so a reader
 * can tell "item 16" in message 2 follows message 1.
 */
export function renderBatch(batch: Batch, options: RenderOptions): SlackMessage {
    const multi = batch.totalBatches > 1;
    const first = batch.startRank;
    const last = batch.startRank + batch.items.length - 1;
    const heading = multi ? `${options.title} (${batch.batchIndex + 1}/${batch.totalBatches})` : options.title;
    const range = multi
        ? `items ${first}–${last} of ${batch.totalItemCount}`
        : `${batch.totalItemCount} picks`;

    const blocks: SlackBlock[] = [
        { type: "header", text: { type: "plain_text", text: truncate(heading, MAX_HEADER_CHARS), emoji: true } },
        { type: "context", elements: [mrkdwn(`*${formatDateTime(options.now)}* • ${range}`)] },
        { type: "divider" },
    ];

    batch.items.forEach((item, i) => {
        blocks.push(...itemBlocks(item, first + i, options));
        if (i < batch.items.length - 1) blocks.push({ type: "divider" });
    });

    blocks.push({ type: "divider" });
    blocks.push({ type: "context", elements: [mrkdwn("🤖 Generated automatically by feed-digest")] });

    return { text: `${heading} - ${range}`, blocks };
}

export function renderErrorMessage(message: string, at: Date): SlackMessage {
    return {
        text: "⚠️ feed-digest run failed",
        blocks: [
            { type: "header", text: { type: "plain_text", text: "⚠️ Run failed", emoji: true } },
            { type: "section", text: mrkdwn(truncate(`\`\`\`${message}\`\`\``, MAX_SECTION_CHARS)) },
            { type: "context", elements: [mrkdwn(`Time: ${formatDateTime(at, true)}`)] },
        ],
    };
}
