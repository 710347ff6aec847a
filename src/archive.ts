import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { formatDateTime, formatStamp } from "./datetime";
import type { ArchiveEntry } from "./types";

/** Archival sink. Owns its own layout; the pipeline only hands over rows. */
export interface ArchiveWriter {
    /** Resolves with where the run was stored. */
    write(entries: readonly ArchiveEntry[], runAt: Date, label: string): Promise<string>;
}

export const BASE_COLUMNS = [
    "fetchedAt",
    "title",
    "url",
    "source",
    "analysisSummary",
    "score",
    "category",
    "body",
    "publishedAt",
] as const;

const BODY_CELL_LIMIT = 500;

interface ArchiveTable {
    label: string;
    runAt: string;
    columns: string[];
    rows: string[][];
}

export function toTable(entries: readonly ArchiveEntry[], runAt: Date, label: string, annotationColumns: readonly string[]): ArchiveTable {
    const fetchedAt = formatDateTime(runAt, true);
    const rows = entries.map((e) => [
        fetchedAt,
        e.title,
        e.url,
        e.source,
        e.analysisSummary,
        e.score === null ? "" : String(e.score),
        e.category,
        e.body.slice(0, BODY_CELL_LIMIT),
        e.publishedAt,
        ...annotationColumns.map((col) => e.annotations[col] ?? ""),
    ]);
    return {
        label,
        runAt: runAt.toISOString(),
        columns: [...BASE_COLUMNS, ...annotationColumns],
        rows,
    };
}

/** One JSON table per run: `<dir>/<label>-<YYYYMMDD-HHmmss>.json`. */
export class JsonArchive implements ArchiveWriter {
    constructor(private dir: string, private annotationColumns: readonly string[] = []) {}

    async write(entries: readonly ArchiveEntry[], runAt: Date, label: string): Promise<string> {
        if (entries.length === 0) throw new Error("nothing to archive");
        mkdirSync(this.dir, { recursive: true });
        const safeLabel = label.replace(/[^\w.-]+/g, "_");
        const path = join(this.dir, `${safeLabel}-${formatStamp(runAt)}.json`);
        const table = toTable(entries, runAt, label, this.annotationColumns);
        writeFileSync(path, JSON.stringify(table, null, 2), "utf-8");
        return path;
    }
}
