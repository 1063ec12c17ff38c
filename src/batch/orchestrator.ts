import type { CredentialRotator } from "../credentials/rotator";
import { AllCredentialsExhaustedError } from "../errors";
import { normalizeTask } from "../task/normalizer";
import {
    isAnswerable,
    type ContextSet,
    type Conversation,
    type GenerationResult,
    type Task,
} from "../task/types";
import { createLogger, errorMessage } from "../utils/logging";
import { defaultSleep, type Sleep } from "../utils/retry";
import { readJsonl, writeJsonl } from "./jsonl";
import { toGenerationResult, toPrediction } from "./result";

export interface AnswerGenerator {
    generate(
        conversation: Conversation,
        contexts: ContextSet,
        collection: string,
    ): Promise<string>;
}

export interface TaskFailure {
    /** 1-based position among the parsed tasks. */
    index: number;
    taskId: string | null;
    error: string;
}

export interface BatchProgress {
    completed: number;
    total: number;
    taskId: string | null;
    status: "ok" | "failed";
}

export interface BatchSummary {
    totalTasks: number;
    processed: number;
    answerable: number;
    unanswerable: number;
    failures: TaskFailure[];
    skippedLines: number;
    aborted: boolean;
    credentialsExhausted: number;
    credentialsTotal: number;
    outputFile: string;
}

export interface BatchOptions {
    inputFile: string;
    outputFile: string;
    generator: AnswerGenerator;
    /** Pool behind the generator, reported in the summary. */
    rotator?: CredentialRotator;
    delayMs?: number;
    sleep?: Sleep;
    onProgress?: (progress: BatchProgress) => void;
}

const logger = createLogger("Batch");

function peekTaskId(record: unknown): string | null {
    if (typeof record !== "object" || record === null) return null;
    for (const key of ["task_id", "example_id"]) {
        const value: unknown = Reflect.get(record, key);
        if (typeof value === "string" && value.length > 0) return value;
    }
    return null;
}

async function generateResult(
    generator: AnswerGenerator,
    task: Task,
): Promise<GenerationResult> {
    const text = await generator.generate(
        task.conversation,
        task.contexts,
        task.collection,
    );
    return toGenerationResult(task, toPrediction(task, text));
}

/**
 * Runs every task in the input file through the generator, one at a time,
 * and writes whatever was produced. Pool exhaustion stops the run early but
 * the results gathered until then are still written.
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
    const delayMs = options.delayMs ?? 100;
    const sleep = options.sleep ?? defaultSleep;

    logger.info("loading_tasks", { file: options.inputFile });
    const document = await readJsonl(options.inputFile);
    for (const lineError of document.errors) {
        logger.warn("skipping_invalid_json", {
            line: lineError.lineNumber,
            error: lineError.message,
        });
    }

    const total = document.records.length;
    logger.info("tasks_loaded", {
        tasks: total,
        skipped: document.errors.length,
    });

    const results: GenerationResult[] = [];
    const failures: TaskFailure[] = [];
    let answerable = 0;
    let aborted = false;

    for (let position = 0; position < total; position++) {
        const record = document.records[position]?.value;
        const index = position + 1;

        try {
            const task = normalizeTask(record);
            results.push(await generateResult(options.generator, task));
            if (isAnswerable(task)) answerable++;
            options.onProgress?.({
                completed: index,
                total,
                taskId: task.taskId,
                status: "ok",
            });
            await sleep(delayMs);
        } catch (error) {
            if (error instanceof AllCredentialsExhaustedError) {
                logger.error("batch_stopped", {
                    reason: error.message,
                    processed: results.length,
                    total,
                });
                aborted = true;
                break;
            }

            const taskId = peekTaskId(record);
            logger.error("task_failed", {
                index,
                task: taskId,
                error: errorMessage(error),
            });
            failures.push({ index, taskId, error: errorMessage(error) });
            options.onProgress?.({
                completed: index,
                total,
                taskId,
                status: "failed",
            });
        }
    }

    await writeJsonl(options.outputFile, results);
    logger.info("predictions_saved", {
        file: options.outputFile,
        count: results.length,
    });

    const summary: BatchSummary = {
        totalTasks: total,
        processed: results.length,
        answerable,
        unanswerable: results.length - answerable,
        failures,
        skippedLines: document.errors.length,
        aborted,
        credentialsExhausted: options.rotator?.exhaustedCount ?? 0,
        credentialsTotal: options.rotator?.size ?? 0,
        outputFile: options.outputFile,
    };

    logger.info("generation_statistics", {
        processed: summary.processed,
        total: summary.totalTasks,
        answerable: summary.answerable,
        unanswerable: summary.unanswerable,
        failed: summary.failures.length,
        aborted: summary.aborted,
        keys_exhausted: summary.credentialsExhausted,
        keys_total: summary.credentialsTotal,
    });

    return summary;
}
