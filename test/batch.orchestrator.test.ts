import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { runBatch, type BatchProgress } from "../src/batch/orchestrator";
import { FALLBACK_ANSWER, ResponseDispatcher } from "../src/dispatch/dispatcher";
import { InputFileNotFoundError } from "../src/errors";
import {
    MockChatProvider,
    type MockProviderReply,
} from "../src/llm/mock-provider";
import {
    PARIS_TASK,
    QUOTA_ERROR,
    makeTmpDir,
    recordingSleep,
    writeLines,
    writeRecords,
} from "./fixtures";

const REFUSAL = "I don't have the information needed to answer that question.";

const BONDS_TASK = {
    task_id: "t2",
    Collection: "fiqa",
    input: [{ speaker: "user", text: "Should I buy bonds?" }],
    contexts: [],
};

function dispatcherFor(replies: MockProviderReply[][]) {
    return new ResponseDispatcher({
        providers: replies.map((queue) => new MockChatProvider(queue)),
        sleep: recordingSleep().sleep,
    });
}

function readOutput(path: string): unknown[] {
    return readFileSync(path, "utf8")
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line): unknown => JSON.parse(line));
}

describe("runBatch", () => {
    test("processes every task, records failures and writes the results", async () => {
        const dir = makeTmpDir();
        const inputFile = writeLines(join(dir, "tasks.jsonl"), [
            JSON.stringify(PARIS_TASK),
            JSON.stringify({ conversation_id: "c2", input: PARIS_TASK.input }),
            "{not json",
            "",
            JSON.stringify(BONDS_TASK),
            JSON.stringify({ task_id: "t3", input: [] }),
        ]);
        const outputFile = join(dir, "out", "predictions.jsonl");
        const dispatcher = dispatcherFor([
            [{ text: "Paris is the capital of France." }, { text: REFUSAL }],
        ]);
        const { sleep, delays } = recordingSleep();
        const progress: BatchProgress[] = [];

        const summary = await runBatch({
            inputFile,
            outputFile,
            generator: dispatcher,
            rotator: dispatcher.rotator,
            delayMs: 25,
            sleep,
            onProgress: (event) => progress.push(event),
        });

        expect(summary).toEqual({
            totalTasks: 4,
            processed: 2,
            answerable: 1,
            unanswerable: 1,
            failures: [
                { index: 2, taskId: null, error: "No task_id found in task" },
                { index: 4, taskId: "t3", error: "Empty conversation" },
            ],
            skippedLines: 1,
            aborted: false,
            credentialsExhausted: 0,
            credentialsTotal: 1,
            outputFile,
        });
        expect(delays).toEqual([25, 25]);
        expect(progress.map((event) => [event.taskId, event.status])).toEqual([
            ["t1", "ok"],
            [null, "failed"],
            ["t2", "ok"],
            ["t3", "failed"],
        ]);
        expect(progress.map((event) => event.completed)).toEqual([1, 2, 3, 4]);

        expect(readOutput(outputFile)).toEqual([
            {
                conversation_id: "conv-1",
                task_id: "t1",
                Collection: "general",
                input: PARIS_TASK.input,
                contexts: PARIS_TASK.contexts,
                predictions: [{ text: "Paris is the capital of France." }],
            },
            {
                conversation_id: "",
                task_id: "t2",
                Collection: "fiqa",
                input: BONDS_TASK.input,
                contexts: [],
                predictions: [{ text: REFUSAL }],
            },
        ]);
    });

    test("keeps only the ten top-ranked passages in the output", async () => {
        const dir = makeTmpDir();
        const contexts = Array.from({ length: 12 }, (_, rank) => ({
            document_id: `d${rank}`,
            text: `Passage number ${rank}.`,
            score: 1 - rank / 100,
        }));
        const inputFile = writeRecords(join(dir, "tasks.jsonl"), [
            { ...PARIS_TASK, contexts },
        ]);
        const outputFile = join(dir, "predictions.jsonl");

        await runBatch({
            inputFile,
            outputFile,
            generator: dispatcherFor([[{ text: "Paris." }]]),
            sleep: recordingSleep().sleep,
        });

        const [record] = readOutput(outputFile);
        expect(record).toMatchObject({ contexts: contexts.slice(0, 10) });
    });

    test("stops once the key pool is exhausted and keeps earlier results", async () => {
        const dir = makeTmpDir();
        const inputFile = writeRecords(join(dir, "tasks.jsonl"), [
            PARIS_TASK,
            { ...PARIS_TASK, task_id: "t2" },
            { ...PARIS_TASK, task_id: "t3" },
        ]);
        const outputFile = join(dir, "predictions.jsonl");
        const dispatcher = dispatcherFor([
            [{ text: "Paris." }, { error: QUOTA_ERROR }],
            [{ error: QUOTA_ERROR }],
            [{ error: QUOTA_ERROR }],
        ]);
        const { sleep, delays } = recordingSleep();

        const summary = await runBatch({
            inputFile,
            outputFile,
            generator: dispatcher,
            rotator: dispatcher.rotator,
            delayMs: 25,
            sleep,
        });

        expect(summary.aborted).toBe(true);
        expect(summary.processed).toBe(2);
        expect(summary.failures).toEqual([]);
        expect(summary.credentialsExhausted).toBe(3);
        expect(summary.credentialsTotal).toBe(3);
        expect(delays).toEqual([25, 25]);

        const predictions = readOutput(outputFile);
        expect(predictions).toHaveLength(2);
        expect(predictions[0]).toMatchObject({
            task_id: "t1",
            predictions: [{ text: "Paris." }],
        });
        expect(predictions[1]).toMatchObject({
            task_id: "t2",
            predictions: [{ text: FALLBACK_ANSWER }],
        });
    });

    test("rejects a missing input file", async () => {
        const dir = makeTmpDir();

        await expect(
            runBatch({
                inputFile: join(dir, "missing.jsonl"),
                outputFile: join(dir, "predictions.jsonl"),
                generator: dispatcherFor([[]]),
            }),
        ).rejects.toBeInstanceOf(InputFileNotFoundError);
    });
});
