/**
 * Runtime configuration, read from the environment (and `.env`, when
 * `loadConfig` is asked to load it).
 */
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_MODEL = "meta-llama/llama-4-scout-17b-16e-instruct";
export const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";

export interface ConfigEnv {
    [key: string]: string | undefined;
}

/** Splits a comma/newline separated key list and drops unfilled placeholders. */
export function parseApiKeys(...sources: (string | undefined)[]): string[] {
    const keys: string[] = [];
    for (const source of sources) {
        if (!source) continue;
        for (const part of source.split(/[\n,]/)) {
            const key = part.trim();
            if (key.length === 0 || key.includes("YOUR_")) continue;
            if (!keys.includes(key)) keys.push(key);
        }
    }
    return keys;
}

const optionalText = z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional();

const integerWithDefault = (fallback: number, min: number) =>
    z
        .string()
        .trim()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.length === 0) return fallback;
            const parsed = Number(value);
            if (!Number.isInteger(parsed) || parsed < min) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `must be an integer >= ${min}`,
                });
                return z.NEVER;
            }
            return parsed;
        });

const EnvSchema = z.object({
    GROQ_API_KEYS: z.string().optional(),
    GROQ_API_KEY: z.string().optional(),
    GROQ_MODEL: optionalText,
    GROQ_BASE_URL: optionalText.pipe(z.string().url().optional()),
    RAG_INPUT_FILE: optionalText,
    RAG_OUTPUT_FILE: optionalText,
    RAG_TASK_DELAY_MS: integerWithDefault(100, 0),
    RAG_REQUEST_TIMEOUT_MS: integerWithDefault(60_000, 1_000),
});

export interface GeneratorConfig {
    apiKeys: string[];
    model: string;
    baseUrl: string;
    inputFile?: string;
    outputFile?: string;
    taskDelayMs: number;
    requestTimeoutMs: number;
}

export interface LoadConfigOptions {
    env?: ConfigEnv;
    /** Read `.env` from the working directory into `process.env` first. */
    dotenv?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}): GeneratorConfig {
    if (options.dotenv) {
        loadDotenv();
    }
    const env = options.env ?? process.env;

    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join(".")} ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(detail);
    }

    const values = parsed.data;
    const apiKeys = parseApiKeys(values.GROQ_API_KEYS, values.GROQ_API_KEY);
    if (apiKeys.length === 0) {
        throw new ConfigurationError(
            "no API keys supplied; set GROQ_API_KEYS (comma separated) or GROQ_API_KEY",
        );
    }

    return {
        apiKeys,
        model: values.GROQ_MODEL ?? DEFAULT_MODEL,
        baseUrl: values.GROQ_BASE_URL ?? DEFAULT_BASE_URL,
        inputFile: values.RAG_INPUT_FILE,
        outputFile: values.RAG_OUTPUT_FILE,
        taskDelayMs: values.RAG_TASK_DELAY_MS,
        requestTimeoutMs: values.RAG_REQUEST_TIMEOUT_MS,
    };
}
