import { CredentialRotator } from "../credentials/rotator";
import {
    AllCredentialsExhaustedError,
    ConfigurationError,
    QuotaExhaustedError,
    TransientRequestError,
} from "../errors";
import {
    generationRefusalClassifier,
    type RefusalClassifier,
} from "../enforce/refusal";
import { reviewAnswerability } from "../enforce/enforcer";
import type { ChatProvider } from "../llm/types";
import { buildPrompt } from "../prompt/builder";
import type { ContextSet, Conversation } from "../task/types";
import { createLogger, errorMessage } from "../utils/logging";
import { defaultSleep, retryAsync, type Sleep } from "../utils/retry";
import {
    DEFAULT_RETRY_POLICY,
    toDispatchError,
    type CredentialRetryPolicy,
} from "./policy";

export const ANSWERABLE_TEMPERATURE = 0.3;
// Lower temperature keeps refusals close to the templated phrasing.
export const UNANSWERABLE_TEMPERATURE = 0.1;
export const MAX_RESPONSE_TOKENS = 512;

export const FALLBACK_REFUSAL =
    "I don't have the information needed to answer your question.";
export const FALLBACK_ANSWER =
    "Based on the available information, I can provide context on this topic.";

export interface ResponseDispatcherOptions {
    /** One provider per credential, in pool order. */
    providers: ChatProvider[];
    rotator?: CredentialRotator;
    policy?: CredentialRetryPolicy;
    classifier?: RefusalClassifier;
    sleep?: Sleep;
    maxTokens?: number;
    timeoutMs?: number;
}

const logger = createLogger("Dispatch");

export class ResponseDispatcher {
    readonly rotator: CredentialRotator;
    private readonly providers: ChatProvider[];
    private readonly policy: CredentialRetryPolicy;
    private readonly classifier: RefusalClassifier;
    private readonly sleep: Sleep;
    private readonly maxTokens: number;
    private readonly timeoutMs: number;

    constructor(options: ResponseDispatcherOptions) {
        if (options.providers.length === 0) {
            throw new ConfigurationError("at least one API key is required");
        }
        this.providers = [...options.providers];
        this.rotator =
            options.rotator ?? new CredentialRotator(this.providers.length);
        if (this.rotator.size !== this.providers.length) {
            throw new ConfigurationError(
                `rotator size ${this.rotator.size} does not match ${this.providers.length} providers`,
            );
        }
        this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
        this.classifier = options.classifier ?? generationRefusalClassifier;
        this.sleep = options.sleep ?? defaultSleep;
        this.maxTokens = options.maxTokens ?? MAX_RESPONSE_TOKENS;
        this.timeoutMs = options.timeoutMs ?? 60_000;
    }

    /**
     * Produces the final response for one task. Throws
     * `AllCredentialsExhaustedError` when no credential can be tried at all;
     * every other failure path ends in a fallback string.
     */
    async generate(
        conversation: Conversation,
        contexts: ContextSet,
        collection: string,
    ): Promise<string> {
        const prompt = buildPrompt(conversation, contexts, collection);
        const hasContexts = contexts.length > 0;
        const temperature = hasContexts
            ? ANSWERABLE_TEMPERATURE
            : UNANSWERABLE_TEMPERATURE;

        for (let switches = 0; switches < this.rotator.size; switches++) {
            const index = this.rotator.nextAvailable();
            if (index === null) {
                logger.error("all_credentials_exhausted", {
                    total: this.rotator.size,
                });
                throw new AllCredentialsExhaustedError(this.rotator.size);
            }

            const text = await this.tryCredential(index, prompt, temperature);
            if (text !== null) {
                const review = reviewAnswerability(
                    text,
                    hasContexts,
                    this.classifier,
                );
                if (review.outcome !== "unchanged") {
                    logger.info("answerability_corrected", {
                        credential: index + 1,
                        outcome: review.outcome,
                    });
                }
                return review.text;
            }

            this.rotator.advance();
        }

        logger.warn("dispatch_fallback", {
            hasContexts,
            exhausted: this.rotator.exhaustedCount,
            total: this.rotator.size,
        });
        return hasContexts ? FALLBACK_ANSWER : FALLBACK_REFUSAL;
    }

    /** Raw text from credential `index`, or null once it has been given up on. */
    private async tryCredential(
        index: number,
        prompt: string,
        temperature: number,
    ): Promise<string | null> {
        const provider = this.providers[index];
        if (!provider) {
            throw new RangeError(`No provider configured for credential ${index}`);
        }
        const credentialLogger = logger.child(`Key${index + 1}`);

        try {
            const response = await retryAsync(
                async () => {
                    try {
                        return await provider.complete({
                            messages: [{ role: "user", content: prompt }],
                            temperature,
                            maxTokens: this.maxTokens,
                            timeoutMs: this.timeoutMs,
                        });
                    } catch (error) {
                        throw toDispatchError(this.policy, index, error);
                    }
                },
                {
                    attempts: this.policy.attemptsPerCredential,
                    shouldRetry: (error) =>
                        error instanceof TransientRequestError,
                    delayFor: (error, attempt) =>
                        error instanceof TransientRequestError
                            ? this.policy.delayMs(error.reason, attempt)
                            : 0,
                    onRetry: ({ error, attempt, maxAttempts, nextDelayMs }) => {
                        credentialLogger.warn("retry_same_credential", {
                            attempt,
                            maxAttempts,
                            nextDelayMs,
                            error: errorMessage(error),
                        });
                    },
                    sleep: this.sleep,
                },
            );
            return response.text;
        } catch (error) {
            if (error instanceof QuotaExhaustedError) {
                this.rotator.markExhausted(index);
            } else if (
                error instanceof TransientRequestError &&
                error.reason === "rate_limit"
            ) {
                // Not re-queued within this call; see DESIGN.md open question.
                credentialLogger.warn("credential_rate_limited", {
                    error: error.message,
                });
            } else {
                credentialLogger.warn("credential_failed", {
                    error: errorMessage(error),
                });
            }
            return null;
        }
    }
}
