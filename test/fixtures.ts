import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Sleep } from "../src/utils/retry";

export function makeTmpDir(prefix = "grounded-answer-"): string {
    return mkdtempSync(join(tmpdir(), prefix));
}

export function writeLines(path: string, lines: string[]): string {
    writeFileSync(path, lines.map((line) => `${line}\n`).join(""), "utf8");
    return path;
}

export function writeRecords(path: string, records: unknown[]): string {
    return writeLines(
        path,
        records.map((record) => JSON.stringify(record)),
    );
}

/** Sleep that records requested delays instead of waiting. */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms) => {
            delays.push(ms);
        },
    };
}

export const PARIS_TASK = {
    conversation_id: "conv-1",
    task_id: "t1",
    Collection: "general",
    input: [{ speaker: "user", text: "What is the capital of France?" }],
    contexts: [
        {
            document_id: "d1",
            text: "Paris is the capital of France.",
            score: 0.9,
        },
    ],
};

export const QUOTA_ERROR =
    "groq#1 completion failed (429): Rate limit reached for model on tokens per day (TPD): Limit 500000";
export const RATE_LIMIT_ERROR =
    "groq#1 completion failed (429): rate limit exceeded";
