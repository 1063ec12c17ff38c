import { describe, expect, test } from "vitest";
import { CredentialRotator } from "../src/credentials/rotator";
import {
    FALLBACK_ANSWER,
    FALLBACK_REFUSAL,
    ResponseDispatcher,
} from "../src/dispatch/dispatcher";
import { FORCED_ANSWER, FORCED_REFUSAL } from "../src/enforce/enforcer";
import {
    AllCredentialsExhaustedError,
    ConfigurationError,
    EmptyConversationError,
} from "../src/errors";
import {
    MockChatProvider,
    type MockProviderReply,
} from "../src/llm/mock-provider";
import type { ContextSet, Conversation } from "../src/task/types";
import { QUOTA_ERROR, RATE_LIMIT_ERROR, recordingSleep } from "./fixtures";

const QUESTION: Conversation = [
    { speaker: "user", text: "What is the capital of France?" },
];
const PASSAGES: ContextSet = [
    { documentId: "d1", text: "Paris is the capital of France.", score: 0.9 },
];
const REFUSAL = "I don't have the information needed to answer that question.";

function setup(replies: MockProviderReply[][]) {
    const providers = replies.map(
        (queue, index) => new MockChatProvider(queue, `mock#${index + 1}`),
    );
    const { sleep, delays } = recordingSleep();
    const dispatcher = new ResponseDispatcher({ providers, sleep });
    return { dispatcher, providers, delays };
}

describe("ResponseDispatcher", () => {
    test("answers on the first credential with the answerable settings", async () => {
        const { dispatcher, providers, delays } = setup([
            [{ text: "  Paris is the capital of France.  " }],
            [],
        ]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe("Paris is the capital of France.");

        const request = providers[0]?.calls[0];
        expect(request?.temperature).toBe(0.3);
        expect(request?.maxTokens).toBe(512);
        expect(request?.timeoutMs).toBe(60_000);
        expect(request?.messages[0]?.role).toBe("user");
        expect(request?.messages[0]?.content).toContain(
            "[Passage 1]\nParis is the capital of France.",
        );
        expect(providers[1]?.calls).toHaveLength(0);
        expect(delays).toEqual([]);
    });

    test("uses the low temperature when there are no passages", async () => {
        const { dispatcher, providers } = setup([[{ text: REFUSAL }]]);

        await expect(dispatcher.generate(QUESTION, [], "general")).resolves.toBe(
            REFUSAL,
        );
        expect(providers[0]?.calls[0]?.temperature).toBe(0.1);
        expect(providers[0]?.calls[0]?.messages[0]?.content).toContain(
            "YOUR REFUSAL:",
        );
    });

    test("turns a substantive answer into a refusal when there are no passages", async () => {
        const { dispatcher } = setup([
            [
                {
                    text: "The capital of France is Paris, which is also its largest city.",
                },
            ],
        ]);

        const text = await dispatcher.generate(QUESTION, [], "general");
        expect(text).toBe(FORCED_REFUSAL);
        expect(text).toContain("don't have");
    });

    test("turns a refusal into an answer when passages were supplied", async () => {
        const { dispatcher } = setup([[{ text: REFUSAL }]]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe(FORCED_ANSWER);
    });

    test("a quota failure exhausts the credential and rotates without waiting", async () => {
        const { dispatcher, providers, delays } = setup([
            [{ error: QUOTA_ERROR }],
            [{ text: "Paris." }],
        ]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe("Paris.");
        expect(providers[0]?.calls).toHaveLength(1);
        expect(dispatcher.rotator.isExhausted(0)).toBe(true);
        expect(dispatcher.rotator.current).toBe(1);
        expect(delays).toEqual([]);
    });

    test("a rate-limited credential is retried once, then left active", async () => {
        const { dispatcher, providers, delays } = setup([
            [{ error: RATE_LIMIT_ERROR }, { error: RATE_LIMIT_ERROR }],
            [{ text: "Paris." }],
        ]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe("Paris.");
        expect(providers[0]?.calls).toHaveLength(2);
        expect(delays).toEqual([1_000]);
        expect(dispatcher.rotator.isExhausted(0)).toBe(false);
    });

    test("a transient failure recovers on the same credential", async () => {
        const { dispatcher, providers, delays } = setup([
            [{ error: "socket hang up" }, { text: "Paris." }],
            [],
        ]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe("Paris.");
        expect(delays).toEqual([1_000]);
        expect(providers[1]?.calls).toHaveLength(0);
    });

    test("falls back once every credential hits its quota, then refuses further work", async () => {
        const { dispatcher } = setup([
            [{ error: QUOTA_ERROR }],
            [{ error: QUOTA_ERROR }],
            [{ error: QUOTA_ERROR }],
        ]);

        await expect(
            dispatcher.generate(QUESTION, PASSAGES, "general"),
        ).resolves.toBe(FALLBACK_ANSWER);
        expect(dispatcher.rotator.exhaustedCount).toBe(3);

        const next = dispatcher.generate(QUESTION, PASSAGES, "general");
        await expect(next).rejects.toBeInstanceOf(AllCredentialsExhaustedError);
        await expect(next).rejects.toThrow(
            "All API keys exhausted (3/3) - cannot continue",
        );
    });

    test("falls back to a refusal when every credential keeps failing", async () => {
        const { dispatcher, delays } = setup([
            [{ error: "socket hang up" }, { error: "socket hang up" }],
            [{ error: "socket hang up" }, { error: "socket hang up" }],
        ]);

        await expect(dispatcher.generate(QUESTION, [], "general")).resolves.toBe(
            FALLBACK_REFUSAL,
        );
        expect(delays).toEqual([1_000, 1_000]);
        expect(dispatcher.rotator.exhaustedCount).toBe(0);
    });

    test("rejects an empty conversation before calling any provider", async () => {
        const { dispatcher, providers } = setup([[{ text: "unused" }]]);

        await expect(
            dispatcher.generate([], PASSAGES, "general"),
        ).rejects.toBeInstanceOf(EmptyConversationError);
        expect(providers[0]?.calls).toHaveLength(0);
    });

    test("requires providers that match the rotator", () => {
        expect(() => new ResponseDispatcher({ providers: [] })).toThrow(
            ConfigurationError,
        );
        expect(
            () =>
                new ResponseDispatcher({
                    providers: [new MockChatProvider()],
                    rotator: new CredentialRotator(3),
                }),
        ).toThrow("Configuration error: rotator size 3 does not match 1 providers");
    });
});
