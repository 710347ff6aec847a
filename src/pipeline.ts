import type { AnalysisService } from "./analyzer";
import type { ArchiveWriter } from "./archive";
import { dispatch } from "./dispatcher";
import type { DispatchOptions } from "./dispatcher";
import { enrichItems } from "./enricher";
import { filterItems } from "./filter";
import { errorMessage, silentLogger } from "./logger";
import type { Logger } from "./logger";
import type { NotificationChannel } from "./notifier";
import { rankItems } from "./ranker";
import { renderBatch } from "./renderer";
import type { AppConfig, ArchiveEntry, DispatchResult, EnrichedItem, Item } from "./types";

export interface PipelineDeps {
    config: AppConfig;
    /** Retrieval collaborator: raw items from every feed, unfiltered. */
    retrieve: () => Promise<Item[]>;
    analysis: AnalysisService;
    channel: NotificationChannel;
    /** Omitted when archival is disabled. */
    archive?: ArchiveWriter;
    logger?: Logger;
    signal?: AbortSignal;
    sleep?: DispatchOptions["sleep"];
    now?: () => Date;
}

/** The stage whose empty output ended the run, or "done". */
export type PipelineStage = "retrieve" | "filter" | "enrich" | "rank" | "done";

export type ArchiveStatus =
    | { kind: "written"; location: string; entries: number }
    | { kind: "failed"; error: string }
    | { kind: "disabled" };

export interface PipelineResult {
    ok: boolean;
    stoppedAt: PipelineStage;
    cancelled: boolean;
    counts: {
        fetched: number;
        filtered: number;
        processed: number;
        enriched: number;
        skipped: number;
        notified: number;
    };
    dispatch?: DispatchResult;
    archive?: ArchiveStatus;
}

/** The `processAll` knob: every filtered item, or only the first maxArticlesToProcess. */
export function selectForProcessing(items: readonly Item[], digest: Pick<AppConfig["digest"], "processAll" | "maxArticlesToProcess">): Item[] {
    return digest.processAll ? [...items] : items.slice(0, digest.maxArticlesToProcess);
}

/**
 * Archive rows: ranked enriched items first, then every other filtered item
 * with empty analysis fields. One row per url.
 */
export function mergeForArchive(archiveSet: readonly EnrichedItem[], filtered: readonly Item[]): ArchiveEntry[] {
    const seen = new Set<string>();
    const entries: ArchiveEntry[] = [];

    for (const item of archiveSet) {
        if (seen.has(item.url)) continue;
        seen.add(item.url);
        entries.push({ ...item, annotations: { ...item.annotations } });
    }
    for (const item of filtered) {
        if (seen.has(item.url)) continue;
        seen.add(item.url);
        entries.push({ ...item, analysisSummary: "", score: null, category: "", annotations: {} });
    }
    return entries;
}

export function exitCodeFor(result: PipelineResult): number {
    return result.ok ? 0 : 1;
}

export async function runPipeline(deps: PipelineDeps): Promise<PipelineResult> {
    const { config, signal } = deps;
    const logger = deps.logger ?? silentLogger;
    const now = deps.now ?? (() => new Date());
    const runAt = now();

    const counts = { fetched: 0, filtered: 0, processed: 0, enriched: 0, skipped: 0, notified: 0 };
    const stop = (stoppedAt: PipelineStage, message: string): PipelineResult => {
        logger.warn(message);
        return { ok: true, stoppedAt, cancelled: signal?.aborted ?? false, counts };
    };

    // 1. Retrieve
    logger.info("📡 Fetching feeds");
    const items = await deps.retrieve();
    counts.fetched = items.length;
    if (items.length === 0) return stop("retrieve", "⚠️  No items fetched, nothing to do");

    // 2. Filter
    const filtered = filterItems(items, {
        required: config.filters.requiredKeywords,
        blocked: config.filters.blockedKeywords,
    });
    counts.filtered = filtered.length;
    logger.info(`🔍 Keyword filter: ${items.length} → ${filtered.length}`);
    if (filtered.length === 0) return stop("filter", "⚠️  Every item was filtered out");

    // 3. Enrich
    const toProcess = selectForProcessing(filtered, config.digest);
    counts.processed = toProcess.length;
    logger.info(`🤖 Analysing ${toProcess.length} items (${config.llm.provider}/${config.llm.model}, profile: ${config.digest.profile})`);
    const report = await enrichItems(toProcess, deps.analysis, {
        profile: config.digest.profile,
        maxBodyChars: config.llm.maxBodyChars,
        annotationFields: config.llm.annotationFields,
        concurrency: config.llm.concurrency,
        signal,
        logger,
    });
    counts.enriched = report.enriched.length;
    counts.skipped = report.skipped.length;
    logger.info(`   ${report.enriched.length} enriched, ${report.skipped.length} skipped`);
    if (report.enriched.length === 0) return stop("enrich", "⚠️  No item survived analysis");

    // 4. Rank
    const { notifySet, archiveSet } = rankItems(report.enriched, config.digest.minScore, config.digest.maxArticles);
    counts.notified = notifySet.length;
    logger.info(`📊 ${notifySet.length} of ${archiveSet.length} scored >= ${config.digest.minScore}`);
    if (notifySet.length === 0) return stop("rank", `⚠️  No item reached score ${config.digest.minScore}`);

    // 5. Notify
    logger.info("📤 Sending to Slack");
    const { slack } = config;
    const dispatchResult = await dispatch(notifySet, deps.channel, {
        maxBatchSize: slack.maxBatchSize,
        maxRetries: slack.maxRetries,
        batchPauseMs: slack.batchPauseMs,
        backoffBaseMs: slack.backoffBaseMs,
        defaultRetryAfterSeconds: slack.defaultRetryAfterSeconds,
        maxRetryAfterSeconds: slack.maxRetryAfterSeconds,
        render: (batch) => renderBatch(batch, {
            title: slack.title,
            showScore: slack.showScore,
            showCategory: slack.showCategory,
            showSource: slack.showSource,
            now: runAt,
        }),
        sleep: deps.sleep,
        signal,
        logger,
    });
    if (!dispatchResult.allSucceeded) {
        const failed = dispatchResult.perBatchStatus.filter((ok) => !ok).length;
        logger.error(`❌ ${failed} of ${dispatchResult.perBatchStatus.length} batch(es) not delivered`);
    }

    // 6. Archive. Its failure is reported but never undoes or fails the delivery.
    let archive: ArchiveStatus = { kind: "disabled" };
    if (deps.archive) {
        const entries = mergeForArchive(archiveSet, filtered);
        try {
            const location = await deps.archive.write(entries, runAt, config.digest.profile);
            archive = { kind: "written", location, entries: entries.length };
            logger.info(`💾 Archived ${entries.length} entries → ${location}`);
        } catch (err) {
            archive = { kind: "failed", error: errorMessage(err) };
            logger.error(`⚠️  Archive failed, notifications already sent: ${errorMessage(err)}`);
        }
    }

    return {
        ok: dispatchResult.allSucceeded,
        stoppedAt: "done",
        cancelled: report.cancelled || dispatchResult.cancelled,
        counts,
        dispatch: dispatchResult,
        archive,
    };
}
