import { describe, expect, test } from "vitest";
import {
    classifyProviderError,
    createRetryPolicy,
    toDispatchError,
} from "../src/dispatch/policy";
import { QuotaExhaustedError, TransientRequestError } from "../src/errors";
import { QUOTA_ERROR, RATE_LIMIT_ERROR } from "./fixtures";

describe("classifyProviderError", () => {
    test("recognises daily token quota messages", () => {
        expect(classifyProviderError(new Error(QUOTA_ERROR))).toBe("quota");
        expect(
            classifyProviderError(new Error("Exceeded Tokens Per Day budget")),
        ).toBe("quota");
    });

    test("recognises rate limits by wording or status", () => {
        expect(classifyProviderError(new Error(RATE_LIMIT_ERROR))).toBe(
            "rate_limit",
        );
        expect(classifyProviderError("upstream said 429")).toBe("rate_limit");
    });

    test("everything else is a plain failure", () => {
        expect(classifyProviderError(new Error("socket hang up"))).toBe("other");
        expect(
            classifyProviderError(
                new Error("groq#1 completion failed (500): internal server error"),
            ),
        ).toBe("other");
    });
});

describe("createRetryPolicy", () => {
    test("defaults to two attempts per credential", () => {
        expect(createRetryPolicy().attemptsPerCredential).toBe(2);
    });

    test("backs off exponentially on rate limits and waits a second otherwise", () => {
        const policy = createRetryPolicy();
        expect(policy.delayMs("rate_limit", 1)).toBe(1_000);
        expect(policy.delayMs("rate_limit", 2)).toBe(2_000);
        expect(policy.delayMs("rate_limit", 3)).toBe(4_000);
        expect(policy.delayMs("other", 1)).toBe(1_000);
        expect(policy.delayMs("quota", 1)).toBe(0);
    });

    test("delays are configurable", () => {
        const policy = createRetryPolicy({
            attemptsPerCredential: 3,
            rateLimitBaseDelayMs: 10,
            rateLimitMaxDelayMs: 15,
            otherErrorDelayMs: 5,
        });
        expect(policy.attemptsPerCredential).toBe(3);
        expect(policy.delayMs("rate_limit", 2)).toBe(15);
        expect(policy.delayMs("other", 2)).toBe(5);
    });
});

describe("toDispatchError", () => {
    test("wraps quota failures with the credential index", () => {
        const error = toDispatchError(createRetryPolicy(), 2, new Error(QUOTA_ERROR));
        expect(error).toBeInstanceOf(QuotaExhaustedError);
        expect(error.message).toBe(`Credential #3 exhausted: ${QUOTA_ERROR}`);
    });

    test("wraps other failures as transient with a reason", () => {
        const error = toDispatchError(
            createRetryPolicy(),
            0,
            new Error(RATE_LIMIT_ERROR),
        );
        expect(error).toBeInstanceOf(TransientRequestError);
        expect(error instanceof TransientRequestError && error.reason).toBe(
            "rate_limit",
        );
    });
});
