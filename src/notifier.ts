import { errorMessage } from "./logger";
import type { Logger } from "./logger";
import { renderErrorMessage } from "./renderer";
import type { SlackMessage } from "./renderer";

export interface ChannelResponse {
    status: number;
    /** Parsed from Retry-After on rate-limited responses. */
    retryAfterSeconds?: number;
    body: string;
}

export type ChannelErrorKind = "timeout" | "transport";

/** The request never produced an HTTP response. */
export class ChannelError extends Error {
    constructor(readonly kind: ChannelErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ChannelError";
    }
}

export interface NotificationChannel {
    /** Resolves with any HTTP response; rejects only with ChannelError. */
    send(message: SlackMessage): Promise<ChannelResponse>;
}

export function parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;
    const seconds = Number(header.trim());
    if (Number.isFinite(seconds) && seconds >= 0) return seconds;
    // HTTP-date form
    const at = Date.parse(header);
    if (Number.isNaN(at)) return undefined;
    return Math.max(0, Math.ceil((at - Date.now()) / 1000));
}

export class SlackWebhookChannel implements NotificationChannel {
    constructor(private webhookUrl: string, private timeout: number) {}

    async send(message: SlackMessage): Promise<ChannelResponse> {
        let resp: Response;
        try {
            resp = await fetch(this.webhookUrl, {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify(message),
                signal: AbortSignal.timeout(this.timeout),
            });
        } catch (err) {
            if (err instanceof Error && err.name === "TimeoutError") {
                throw new ChannelError("timeout", `Slack request timed out after ${this.timeout}ms`, { cause: err });
            }
            throw new ChannelError("transport", `Slack request failed: ${errorMessage(err)}`, { cause: err });
        }

        let body = "";
        try {
            body = await resp.text();
        } catch (err) {
            body = `(unreadable body: ${errorMessage(err)})`;
        }
        return { status: resp.status, retryAfterSeconds: parseRetryAfter(resp.headers.get("retry-after")), body };
    }
}

/** Dry runs: log what would have been posted. */
export class LogChannel implements NotificationChannel {
    constructor(private logger: Logger) {}

    async send(message: SlackMessage): Promise<ChannelResponse> {
        this.logger.info(`📝 [dry-run] ${message.text}`, { blocks: message.blocks.length });
        this.logger.debug(JSON.stringify(message.blocks, null, 2));
        return { status: 200, body: "dry-run" };
    }
}

/** Best effort: a failure here must not mask the error being reported. */
export async function sendErrorNotification(channel: NotificationChannel, error: unknown, at = new Date()): Promise<boolean> {
    try {
        const resp = await channel.send(renderErrorMessage(errorMessage(error), at));
        return resp.status >= 200 && resp.status < 300;
    } catch {
        return false;
    }
}
