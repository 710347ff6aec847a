#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import { resolve } from "node:path";
import { LlmAnalyzer } from "./analyzer";
import { JsonArchive } from "./archive";
import { ConfigError, ROOT_DIR, loadConfig, loadEnvFile } from "./config";
import { createLogger, errorMessage } from "./logger";
import type { Logger } from "./logger";
import { LogChannel, SlackWebhookChannel, sendErrorNotification } from "./notifier";
import { exitCodeFor, runPipeline } from "./pipeline";
import { fetchFeeds } from "./sources/rss";
import type { AppConfig } from "./types";

interface RunOptions {
    config?: string;
    profile?: string;
    processAll?: boolean;
    limit?: number;
    dryRun?: boolean;
}

function parsePositiveInt(raw: string): number {
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("must be a positive integer");
    return n;
}

function applyRunOptions(config: AppConfig, opts: RunOptions): AppConfig {
    const digest = { ...config.digest };
    if (opts.profile) digest.profile = opts.profile;
    if (opts.processAll) digest.processAll = true;
    if (opts.limit !== undefined) {
        digest.processAll = false;
        digest.maxArticlesToProcess = opts.limit;
    }
    return { ...config, digest };
}

const program = new Command();

program
    .name("feed-digest")
    .description("Feed digest — keyword filter, LLM scoring, Slack delivery")
    .version("0.1.0");

program
    .command("run")
    .description("Fetch, filter, analyse, rank, notify and archive (one run)")
    .option("-c, --config <path>", "config.yaml path")
    .option("-p, --profile <name>", "analysis profile: ai | tw_stock | us_stock | free text")
    .option("--process-all", "analyse every filtered item")
    .option("-l, --limit <number>", "analyse only the first N filtered items", parsePositiveInt)
    .option("--dry-run", "log Slack messages instead of sending; skip the archive")
    .action(async (opts: RunOptions) => {
        process.exitCode = await runCommand(opts);
    });

program
    .command("check-config")
    .description("Load and validate configuration, then exit")
    .option("-c, --config <path>", "config.yaml path")
    .action((opts: { config?: string }) => {
        loadEnvFile();
        try {
            const config = loadConfig({ configPath: opts.config && resolve(opts.config) });
            const feeds = config.feeds.filter((f) => f.enabled);
            console.log(`✅ Config OK — ${feeds.length} feed(s), ${config.llm.provider}/${config.llm.model}, min score ${config.digest.minScore}`);
        } catch (err) {
            console.error("❌", errorMessage(err));
            process.exitCode = 1;
        }
    });

await program.parseAsync();

// ── run ──────────────────────────────────────────────

async function runCommand(opts: RunOptions): Promise<number> {
    loadEnvFile();

    let config: AppConfig;
    try {
        config = applyRunOptions(
            loadConfig({ configPath: opts.config && resolve(opts.config), requireWebhook: !opts.dryRun }),
            opts,
        );
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error("❌", err.message);
            return 1;
        }
        throw err;
    }

    const logger = createLogger(config.logging.level);
    const controller = new AbortController();
    const onSignal = (sig: string) => {
        logger.warn(`⚠️  ${sig} received, finishing in-flight requests`);
        controller.abort();
    };
    process.once("SIGINT", () => onSignal("SIGINT"));
    process.once("SIGTERM", () => onSignal("SIGTERM"));

    const started = Date.now();
    logger.info(`🚀 feed-digest — ${new Date().toISOString()}${opts.dryRun ? " (dry run)" : ""}`);

    const slackChannel = new SlackWebhookChannel(config.slack.webhookUrl, config.slack.timeout);
    try {
        const result = await runPipeline({
            config,
            retrieve: () => fetchFeeds(config.feeds, {
                articlesPerFeed: config.digest.articlesPerFeed,
                bodyLimit: config.digest.bodyLimit,
                timeout: config.fetch.timeout,
                userAgent: config.fetch.userAgent,
                logger,
            }),
            analysis: new LlmAnalyzer({
                provider: config.llm.provider,
                apiKey: config.llm.apiKey,
                model: config.llm.model,
                baseUrl: config.llm.baseUrl || undefined,
                maxTokens: config.llm.maxTokens,
                temperature: config.llm.temperature,
                timeout: config.llm.timeout,
            }),
            channel: opts.dryRun ? new LogChannel(logger) : slackChannel,
            archive: config.archive.enabled && !opts.dryRun
                ? new JsonArchive(resolve(ROOT_DIR, config.archive.dir), config.llm.annotationFields)
                : undefined,
            logger,
            signal: controller.signal,
        });

        const { counts } = result;
        const seconds = ((Date.now() - started) / 1000).toFixed(1);
        logger.info(`📊 fetched ${counts.fetched} → filtered ${counts.filtered} → enriched ${counts.enriched} (skipped ${counts.skipped}) → notified ${counts.notified}`);
        logger.info(result.ok ? `✅ Done in ${seconds}s` : `❌ Finished with delivery failures in ${seconds}s`);
        return result.cancelled ? 1 : exitCodeFor(result);
    } catch (err) {
        return reportFatal(err, logger, opts.dryRun ? undefined : slackChannel);
    }
}

async function reportFatal(err: unknown, logger: Logger, channel?: SlackWebhookChannel): Promise<number> {
    logger.error(`❌ Run failed: ${errorMessage(err)}`, err instanceof Error && err.stack ? { stack: err.stack } : undefined);
    if (channel && !(await sendErrorNotification(channel, err))) {
        logger.warn("⚠️  Error notification could not be delivered");
    }
    return 1;
}
