export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type Meta = Record<string, unknown>;

export interface Logger {
    debug(msg: string, meta?: Meta): void;
    info(msg: string, meta?: Meta): void;
    warn(msg: string, meta?: Meta): void;
    error(msg: string, meta?: Meta): void;
}

export function isLogLevel(raw: string): raw is LogLevel {
    return Object.hasOwn(LEVELS, raw);
}

function format(msg: string, meta?: Meta): string {
    if (!meta || Object.keys(meta).length === 0) return msg;
    return `${msg} ${JSON.stringify(meta)}`;
}

/**
 * Console logger. Messages carry their own emoji prefix; metadata is
 * appended as JSON so item titles / batch indexes can be grepped later.
 */
export function createLogger(level: LogLevel = "info"): Logger {
    const threshold = LEVELS[level];
    const enabled = (l: LogLevel) => LEVELS[l] >= threshold;

    return {
        debug: (msg, meta) => { if (enabled("debug")) console.log(format(msg, meta)); },
        info: (msg, meta) => { if (enabled("info")) console.log(format(msg, meta)); },
        warn: (msg, meta) => { if (enabled("warn")) console.warn(format(msg, meta)); },
        error: (msg, meta) => { if (enabled("error")) console.error(format(msg, meta)); },
    };
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
