import { createLogger, errorMessage } from "../utils/logging";
import type {
    ChatCompletionRequest,
    ChatCompletionResponse,
    ChatMessage,
    ChatProvider,
    ChatUsage,
} from "./types";

export interface OpenAICompatibleProviderOptions {
    name: string;
    baseUrl: string;
    apiKey: string;
    model: string;
}

interface OpenAICompletionUsage {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
}

interface OpenAICompletionChoice {
    message?: {
        role?: string;
        content?: string | null;
    };
}

interface OpenAICompletionResponse {
    model?: string;
    choices?: OpenAICompletionChoice[];
    usage?: OpenAICompletionUsage;
}

const logger = createLogger("Llm.OpenAICompatProvider");

function trimTrailingSlash(url: string): string {
    return url.endsWith("/") ? url.slice(0, -1) : url;
}

function withTimeoutSignal(timeoutMs: number): {
    signal: AbortSignal;
    cancel: () => void;
} {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    return {
        signal: controller.signal,
        cancel: () => clearTimeout(timer),
    };
}

function mapUsage(usage?: OpenAICompletionUsage): ChatUsage | undefined {
    if (!usage) return undefined;
    return {
        inputTokens: usage.prompt_tokens,
        outputTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
    };
}

function toOpenAIMessages(messages: ChatMessage[]) {
    return messages.map((m) => ({
        role: m.role,
        content: m.content,
    }));
}

/**
 * Pulls the human-readable part out of an error body. Groq reports quota
 * exhaustion here, e.g. "Rate limit reached … on tokens per day (TPD)".
 */
function getErrorMessageFromBody(raw: string): string | null {
    try {
        const parsed = JSON.parse(raw) as {
            error?: { message?: string };
            message?: string;
        };
        if (parsed.error?.message) return parsed.error.message;
        if (parsed.message) return parsed.message;
        return null;
    } catch {
        return raw.trim().length > 0 ? raw.trim().slice(0, 500) : null;
    }
}

export class OpenAICompatibleProvider implements ChatProvider {
    readonly name: string;
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly model: string;

    constructor(options: OpenAICompatibleProviderOptions) {
        this.name = options.name;
        this.baseUrl = trimTrailingSlash(options.baseUrl);
        this.apiKey = options.apiKey;
        this.model = options.model;
    }

    async complete(
        request: ChatCompletionRequest,
    ): Promise<ChatCompletionResponse> {
        const endpoint = `${this.baseUrl}/chat/completions`;
        const startedAt = Date.now();
        const { signal, cancel } = withTimeoutSignal(request.timeoutMs);

        try {
            const response = await fetch(endpoint, {
                method: "POST",
                signal,
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    "Content-Type": "application/json",
                },
                body: JSON.stringify({
                    model: this.model,
                    messages: toOpenAIMessages(request.messages),
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                }),
            });

            const raw = await response.text();
            if (!response.ok) {
                const bodyMessage = getErrorMessageFromBody(raw);
                throw new Error(
                    `${this.name} completion failed (${response.status})${bodyMessage ? `: ${bodyMessage}` : ""}`,
                );
            }

            let parsed: OpenAICompletionResponse;
            try {
                parsed = JSON.parse(raw) as OpenAICompletionResponse;
            } catch {
                throw new Error(`${this.name} completion returned invalid JSON`);
            }

            const text = parsed.choices?.[0]?.message?.content;
            if (!text || typeof text !== "string") {
                throw new Error(
                    `${this.name} completion has no assistant text content`,
                );
            }

            const latencyMs = Date.now() - startedAt;
            logger.debug("provider_complete", {
                provider: this.name,
                latencyMs,
            });

            return {
                text: text.trim(),
                provider: this.name,
                model: parsed.model ?? this.model,
                usage: mapUsage(parsed.usage),
                latencyMs,
            };
        } catch (error) {
            logger.warn("provider_complete_failed", {
                provider: this.name,
                error: errorMessage(error),
            });
            throw error;
        } finally {
            cancel();
        }
    }
}
