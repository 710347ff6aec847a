import type { AnalysisRequest, AnalysisService } from "../analyzer";
import type { ArchiveWriter } from "../archive";
import { DEFAULTS } from "../config";
import type { ChannelResponse, NotificationChannel } from "../notifier";
import type { SlackMessage } from "../renderer";
import type { AppConfig, ArchiveEntry, EnrichedItem, Item } from "../types";

export function makeItem(n: number, overrides: Partial<Item> = {}): Item {
    return {
        title: `AI story ${n}`,
        url: `https://example.com/${n}`,
        body: `body ${n}`,
        source: "Test Feed",
        publishedAt: "2026-01-01 09:00",
        ...overrides,
    };
}

export function makeEnriched(n: number, score: number, overrides: Partial<EnrichedItem> = {}): EnrichedItem {
    return {
        ...makeItem(n),
        analysisSummary: `summary ${n}`,
        score,
        category: "PRODUCT",
        annotations: {},
        ...overrides,
    };
}

export function makeConfig(overrides: {
    filters?: Partial<AppConfig["filters"]>;
    digest?: Partial<AppConfig["digest"]>;
    slack?: Partial<AppConfig["slack"]>;
    llm?: Partial<AppConfig["llm"]>;
} = {}): AppConfig {
    return {
        ...DEFAULTS,
        feeds: [{ name: "Test Feed", url: "https://example.com/feed.xml", enabled: true }],
        filters: { ...DEFAULTS.filters, ...overrides.filters },
        digest: { ...DEFAULTS.digest, ...overrides.digest },
        llm: { ...DEFAULTS.llm, apiKey: "test-key", ...overrides.llm },
        slack: { ...DEFAULTS.slack, webhookUrl: "https://hooks.example.com/test", batchPauseMs: 0, ...overrides.slack },
    };
}

/** Answers with a canned payload per URL (found in the prompt), or throws. */
export class FakeAnalysis implements AnalysisService {
    readonly requests: AnalysisRequest[] = [];

    constructor(private answer: (url: string) => string | Error) {}

    async analyze(request: AnalysisRequest): Promise<string> {
        this.requests.push(request);
        const url = request.user.match(/^URL: (.*)$/m)?.[1] ?? "";
        const result = this.answer(url);
        if (result instanceof Error) throw result;
        return result;
    }
}

export const analysisJson = (score: unknown, extra: Record<string, unknown> = {}) =>
    JSON.stringify({ summary: "A summary.", score, category: "RESEARCH", ...extra });

/** Replays queued responses (or throws queued errors); 200 once the queue is empty. */
export class FakeChannel implements NotificationChannel {
    readonly sent: SlackMessage[] = [];
    readonly sentAt: number[] = [];

    constructor(private queue: (ChannelResponse | Error)[] = [], private clock?: { now: number }) {}

    async send(message: SlackMessage): Promise<ChannelResponse> {
        this.sent.push(message);
        this.sentAt.push(this.clock?.now ?? 0);
        const next = this.queue.shift();
        if (next instanceof Error) throw next;
        return next ?? { status: 200, body: "ok" };
    }
}

export class MemoryArchive implements ArchiveWriter {
    readonly writes: { entries: ArchiveEntry[]; runAt: Date; label: string }[] = [];

    constructor(private failWith?: Error) {}

    async write(entries: readonly ArchiveEntry[], runAt: Date, label: string): Promise<string> {
        if (this.failWith) throw this.failWith;
        this.writes.push({ entries: [...entries], runAt, label });
        return `memory://${label}`;
    }
}

/** Records requested sleeps and advances a virtual clock instead of waiting. */
export function virtualSleep(clock = { now: 0 }) {
    const sleeps: number[] = [];
    const sleep = async (ms: number) => {
        sleeps.push(ms);
        clock.now += ms;
    };
    return { sleep, sleeps, clock };
}
