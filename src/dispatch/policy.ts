import { QuotaExhaustedError, TransientRequestError } from "../errors";
import { computeBackoffDelay } from "../utils/retry";
import { errorMessage } from "../utils/logging";

export type FailureKind = "quota" | "rate_limit" | "other";

/**
 * How a single credential is retried before the dispatcher rotates away
 * from it.
 */
export interface CredentialRetryPolicy {
    attemptsPerCredential: number;
    classify(error: unknown): FailureKind;
    /** Wait before the next attempt on the same credential; attempt is 1-based. */
    delayMs(kind: FailureKind, attempt: number): number;
}

export interface RetryPolicyOptions {
    attemptsPerCredential?: number;
    rateLimitBaseDelayMs?: number;
    rateLimitMaxDelayMs?: number;
    otherErrorDelayMs?: number;
}

/** Groq reports daily token quota as "tokens per day (TPD)". */
export function classifyProviderError(error: unknown): FailureKind {
    const message = errorMessage(error);
    const lower = message.toLowerCase();

    if (message.includes("TPD") || lower.includes("tokens per day")) {
        return "quota";
    }
    if (lower.includes("rate") || message.includes("429")) {
        return "rate_limit";
    }
    return "other";
}

export function createRetryPolicy(
    options: RetryPolicyOptions = {},
): CredentialRetryPolicy {
    const attemptsPerCredential = Math.max(1, options.attemptsPerCredential ?? 2);
    const rateLimitBaseDelayMs = options.rateLimitBaseDelayMs ?? 1_000;
    const rateLimitMaxDelayMs = options.rateLimitMaxDelayMs ?? 60_000;
    const otherErrorDelayMs = options.otherErrorDelayMs ?? 1_000;

    return {
        attemptsPerCredential,
        classify: classifyProviderError,
        delayMs: (kind, attempt) => {
            if (kind === "rate_limit") {
                // 1s, 2s, 4s… for attempts 1, 2, 3…
                return computeBackoffDelay(attempt, {
                    baseDelayMs: rateLimitBaseDelayMs,
                    maxDelayMs: rateLimitMaxDelayMs,
                    factor: 2,
                });
            }
            if (kind === "other") return otherErrorDelayMs;
            return 0;
        },
    };
}

export const DEFAULT_RETRY_POLICY = createRetryPolicy();

/** Lifts a raw provider failure into the error type the dispatcher acts on. */
export function toDispatchError(
    policy: CredentialRetryPolicy,
    credentialIndex: number,
    error: unknown,
): QuotaExhaustedError | TransientRequestError {
    const kind = policy.classify(error);
    const message = errorMessage(error);
    if (kind === "quota") {
        return new QuotaExhaustedError(credentialIndex, message, error);
    }
    return new TransientRequestError(kind, message, error);
}
