import { setTimeout as delay } from "node:timers/promises";
import { errorMessage, silentLogger } from "./logger";
import type { Logger } from "./logger";
import { ChannelError } from "./notifier";
import type { ChannelResponse, NotificationChannel } from "./notifier";
import type { SlackMessage } from "./renderer";
import type { Batch, BatchOutcome, DispatchResult, EnrichedItem } from "./types";

export interface DispatchOptions {
    maxBatchSize: number;
    /** Attempts per batch, rate-limited attempts included. */
    maxRetries: number;
    /** Pause between successive batches, independent of retry backoff. */
    batchPauseMs: number;
    /** Transport/timeout retries wait backoffBaseMs * 2^attempt. */
    backoffBaseMs: number;
    defaultRetryAfterSeconds: number;
    maxRetryAfterSeconds: number;
    render: (batch: Batch) => SlackMessage;
    sleep?: (ms: number) => Promise<void>;
    /** Once aborted, no new send is started; unsent batches count as failed. */
    signal?: AbortSignal;
    logger?: Logger;
}

const RATE_LIMITED = 429;

const defaultSleep = (ms: number) => delay(ms).then(() => undefined);

/** Consecutive slices of at most maxBatchSize items; concatenation gives back `items`. */
export function partition(items: readonly EnrichedItem[], maxBatchSize: number): Batch[] {
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
        throw new RangeError(`maxBatchSize must be a positive integer, got ${maxBatchSize}`);
    }
    const totalBatches = Math.ceil(items.length / maxBatchSize);
    const batches: Batch[] = [];
    for (let i = 0; i < totalBatches; i++) {
        const start = i * maxBatchSize;
        batches.push({
            batchIndex: i,
            totalBatches,
            totalItemCount: items.length,
            startRank: start + 1,
            items: items.slice(start, start + maxBatchSize),
        });
    }
    return batches;
}

/**
 * Send one rendered batch.
 *
 *   2xx                      → sent
 *   429                      → wait Retry-After (or the default, capped), try again
 *   timeout / transport      → wait backoffBaseMs * 2^n, try again
 *   any other status         → failed, not retried
 *   maxRetries attempts used → failed
 */
export async function sendBatch(
    batchIndex: number,
    message: SlackMessage,
    channel: NotificationChannel,
    options: DispatchOptions,
): Promise<BatchOutcome> {
    const logger = options.logger ?? silentLogger;
    const sleep = options.sleep ?? defaultSleep;
    const { maxRetries } = options;
    const ctx = { batch: batchIndex + 1 };
    let lastReason = "no attempt made";

    for (let n = 0; n < maxRetries; n++) {
        if (n > 0 && options.signal?.aborted) {
            return { kind: "failed", batchIndex, attempts: n, reason: `cancelled after ${n} attempt(s): ${lastReason}` };
        }
        const attempt = n + 1;
        const hasBudget = attempt < maxRetries;

        let resp: ChannelResponse;
        try {
            resp = await channel.send(message);
        } catch (err) {
            const kind = err instanceof ChannelError ? err.kind : "transport";
            lastReason = `${kind}: ${errorMessage(err)}`;
            if (!hasBudget) break;
            const waitMs = options.backoffBaseMs * 2 ** n;
            logger.warn(`⏳ Send ${kind} (attempt ${attempt}/${maxRetries}), retrying in ${waitMs}ms`, ctx);
            await sleep(waitMs);
            continue;
        }

        if (resp.status >= 200 && resp.status < 300) {
            return { kind: "sent", batchIndex, attempts: attempt };
        }

        if (resp.status === RATE_LIMITED) {
            lastReason = "rate limited";
            if (!hasBudget) break;
            const seconds = Math.min(resp.retryAfterSeconds ?? options.defaultRetryAfterSeconds, options.maxRetryAfterSeconds);
            logger.warn(`⏳ Rate limited (attempt ${attempt}/${maxRetries}), waiting ${seconds}s`, ctx);
            await sleep(seconds * 1000);
            continue;
        }

        return {
            kind: "failed",
            batchIndex,
            attempts: attempt,
            reason: `HTTP ${resp.status}: ${resp.body.slice(0, 200)}`,
        };
    }

    return { kind: "failed", batchIndex, attempts: maxRetries, reason: `gave up after ${maxRetries} attempt(s): ${lastReason}` };
}

/**
 * Partition, render and send. A failed batch does not stop later ones;
 * the call as a whole succeeds only if every batch was sent.
 */
export async function dispatch(
    notifySet: readonly EnrichedItem[],
    channel: NotificationChannel,
    options: DispatchOptions,
): Promise<DispatchResult> {
    const logger = options.logger ?? silentLogger;
    const sleep = options.sleep ?? defaultSleep;
    const batches = partition(notifySet, options.maxBatchSize);
    const outcomes: BatchOutcome[] = [];
    let cancelled = false;

    for (const batch of batches) {
        const label = `${batch.batchIndex + 1}/${batch.totalBatches}`;
        if (options.signal?.aborted) {
            cancelled = true;
            outcomes.push({ kind: "failed", batchIndex: batch.batchIndex, attempts: 0, reason: "cancelled" });
            continue;
        }
        if (batch.batchIndex > 0 && options.batchPauseMs > 0) await sleep(options.batchPauseMs);

        const outcome = await sendBatch(batch.batchIndex, options.render(batch), channel, options);
        outcomes.push(outcome);
        if (outcome.kind === "sent") {
            logger.info(`✓ Batch ${label} sent (${batch.items.length} items)`);
        } else {
            logger.error(`✗ Batch ${label} failed: ${outcome.reason}`, { batch: batch.batchIndex + 1, attempts: outcome.attempts });
        }
    }

    const perBatchStatus = outcomes.map((o) => o.kind === "sent");
    return {
        allSucceeded: perBatchStatus.every(Boolean),
        perBatchStatus,
        outcomes,
        cancelled,
    };
}
