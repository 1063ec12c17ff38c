import { describe, expect, test } from "vitest";
import {
    DEFAULT_BASE_URL,
    DEFAULT_MODEL,
    loadConfig,
    parseApiKeys,
} from "../src/config";
import { ConfigurationError } from "../src/errors";
import { createCredentialProviders } from "../src/llm/factory";

describe("parseApiKeys", () => {
    test("splits on commas and newlines, trims and de-duplicates", () => {
        expect(
            parseApiKeys("key-a, key-b\nkey-c,,key-a", "key-d"),
        ).toEqual(["key-a", "key-b", "key-c", "key-d"]);
    });

    test("drops unfilled placeholders", () => {
        expect(parseApiKeys("YOUR_GROQ_API_KEY_1,test-key", undefined)).toEqual([
            "test-key",
        ]);
    });
});

describe("loadConfig", () => {
    test("applies defaults", () => {
        expect(loadConfig({ env: { GROQ_API_KEY: "test-key" } })).toEqual({
            apiKeys: ["test-key"],
            model: DEFAULT_MODEL,
            baseUrl: DEFAULT_BASE_URL,
            inputFile: undefined,
            outputFile: undefined,
            taskDelayMs: 100,
            requestTimeoutMs: 60_000,
        });
    });

    test("reads every supported variable", () => {
        const config = loadConfig({
            env: {
                GROQ_API_KEYS: "key-a,key-b",
                GROQ_MODEL: "  custom-model  ",
                GROQ_BASE_URL: "https://llm.example.test/v1",
                RAG_INPUT_FILE: "data/tasks.jsonl",
                RAG_OUTPUT_FILE: "data/predictions.jsonl",
                RAG_TASK_DELAY_MS: "0",
                RAG_REQUEST_TIMEOUT_MS: "15000",
            },
        });

        expect(config).toEqual({
            apiKeys: ["key-a", "key-b"],
            model: "custom-model",
            baseUrl: "https://llm.example.test/v1",
            inputFile: "data/tasks.jsonl",
            outputFile: "data/predictions.jsonl",
            taskDelayMs: 0,
            requestTimeoutMs: 15_000,
        });
    });

    test("requires at least one key", () => {
        expect(() =>
            loadConfig({ env: { GROQ_API_KEYS: "YOUR_KEY_HERE" } }),
        ).toThrow(
            "Configuration error: no API keys supplied; set GROQ_API_KEYS (comma separated) or GROQ_API_KEY",
        );
    });

    test("rejects malformed numbers", () => {
        expect(() =>
            loadConfig({
                env: { GROQ_API_KEY: "test-key", RAG_TASK_DELAY_MS: "soon" },
            }),
        ).toThrow("Configuration error: RAG_TASK_DELAY_MS must be an integer >= 0");
        expect(() =>
            loadConfig({
                env: { GROQ_API_KEY: "test-key", RAG_REQUEST_TIMEOUT_MS: "500" },
            }),
        ).toThrow(
            "Configuration error: RAG_REQUEST_TIMEOUT_MS must be an integer >= 1000",
        );
    });

    test("rejects a base URL that is not a URL", () => {
        expect(() =>
            loadConfig({
                env: { GROQ_API_KEY: "test-key", GROQ_BASE_URL: "not a url" },
            }),
        ).toThrow(ConfigurationError);
    });
});

describe("createCredentialProviders", () => {
    test("creates one named provider per key", () => {
        const providers = createCredentialProviders({
            apiKeys: ["key-a", "key-b"],
            baseUrl: DEFAULT_BASE_URL,
            model: DEFAULT_MODEL,
        });
        expect(providers.map((provider) => provider.name)).toEqual([
            "groq#1",
            "groq#2",
        ]);
    });

    test("refuses an empty key list", () => {
        expect(() =>
            createCredentialProviders({
                apiKeys: [],
                baseUrl: DEFAULT_BASE_URL,
                model: DEFAULT_MODEL,
            }),
        ).toThrow(ConfigurationError);
    });
});
