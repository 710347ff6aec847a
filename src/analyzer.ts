import OpenAI from "openai";
import { z } from "zod";

export interface AnalysisRequest {
    system: string;
    user: string;
}

/** Anything that turns a rendered prompt into raw (expected JSON) response text. */
export interface AnalysisService {
    analyze(request: AnalysisRequest): Promise<string>;
}

export class AnalysisError extends Error {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "AnalysisError";
    }
}

interface AnalyzerConfig {
    provider: "openai" | "anthropic";
    apiKey: string;
    model: string;
    baseUrl?: string;
    maxTokens: number;
    temperature: number;
    timeout: number;
}

const anthropicResponseSchema = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export class LlmAnalyzer implements AnalysisService {
    private client?: OpenAI;
    private config: AnalyzerConfig;

    constructor(config: AnalyzerConfig) {
        this.config = config;
        if (config.provider !== "anthropic") {
            this.client = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseUrl || "https://api.openai.com/v1",
                timeout: config.timeout,
                // Retry policy belongs to the pipeline: a failed item is skipped, not retried.
                maxRetries: 0,
            });
        }
    }

    async analyze(request: AnalysisRequest): Promise<string> {
        if (this.client) return this.chatOpenAI(this.client, request);
        return this.chatAnthropic(request);
    }

    private async chatOpenAI(client: OpenAI, { system, user }: AnalysisRequest): Promise<string> {
        try {
            const resp = await client.chat.completions.create({
                model: this.config.model,
                messages: [
                    { role: "system", content: system },
                    { role: "user", content: user },
                ],
                response_format: { type: "json_object" },
                max_tokens: this.config.maxTokens,
                temperature: this.config.temperature,
            });
            return resp.choices[0]?.message?.content?.trim() ?? "";
        } catch (err) {
            if (err instanceof OpenAI.APIError) {
                throw new AnalysisError(`OpenAI error ${err.status ?? "?"}: ${err.message}`, err.status, { cause: err });
            }
            throw new AnalysisError(`OpenAI request failed: ${err instanceof Error ? err.message : String(err)}`, undefined, { cause: err });
        }
    }

    private async chatAnthropic({ system, user }: AnalysisRequest): Promise<string> {
        const baseUrl = (this.config.baseUrl || "https://api.anthropic.com").replace(/\/+$/, "");
        let resp: Response;
        try {
            resp = await fetch(`${baseUrl}/v1/messages`, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "x-api-key": this.config.apiKey,
                    "anthropic-version": "2023-06-01",
                },
                body: JSON.stringify({
                    model: this.config.model,
                    max_tokens: this.config.maxTokens,
                    temperature: this.config.temperature,
                    system,
                    messages: [{ role: "user", content: user }],
                }),
                signal: AbortSignal.timeout(this.config.timeout),
            });
        } catch (err) {
            const timedOut = err instanceof Error && err.name === "TimeoutError";
            throw new AnalysisError(
                timedOut ? `Anthropic request timed out after ${this.config.timeout}ms` : `Anthropic request failed: ${err instanceof Error ? err.message : String(err)}`,
                undefined,
                { cause: err },
            );
        }
        if (!resp.ok) throw new AnalysisError(`Anthropic error ${resp.status}: ${await resp.text()}`, resp.status);

        const parsed = anthropicResponseSchema.safeParse(await resp.json());
        if (!parsed.success) throw new AnalysisError("Anthropic response has no content array");
        return parsed.data.content.find((c) => c.type === "text")?.text?.trim() ?? "";
    }
}
