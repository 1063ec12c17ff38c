/**
 * Predicts how a submission will fare by comparing each response's refusal
 * status with whether the reference task had passages. This is a heuristic,
 * not the benchmark's scoring metric.
 */
import { readJsonl } from "../batch/jsonl";
import {
    validationRefusalClassifier,
    type RefusalClassifier,
} from "../enforce/refusal";
import { MAX_OUTPUT_CONTEXTS } from "../task/types";
import { REQUIRED_FIELDS } from "./format-checker";

export const BASE_QUALITY = 0.55;
export const ANSWERABLE_PENALTY = 0.15;
export const UNANSWERABLE_PENALTY = 0.1;
export const SHORT_AVERAGE_PENALTY = 0.05;
export const LONG_AVERAGE_BONUS = 0.02;
export const MIN_PREDICTED_SCORE = 0.35;
export const MAX_PREDICTED_SCORE = 0.75;
export const READY_THRESHOLD = 0.52;

const VERY_SHORT_CHARS = 20;
const VERY_LONG_CHARS = 800;
const SHORT_AVERAGE_CHARS = 30;
const LONG_AVERAGE_CHARS = 200;
const EXCERPT_CHARS = 100;

export type QualityStatus = "ok" | "count_mismatch" | "id_mismatch";
export type QualityVerdict =
    | "excellent"
    | "good"
    | "acceptable"
    | "needs_improvement";

export interface ClassStats {
    correct: number;
    wrong: number;
    total: number;
    /** correct / total, or null when the class is empty. */
    accuracy: number | null;
}

export interface LengthStats {
    average: number;
    min: number;
    max: number;
}

export interface ComplianceStats {
    missingRequiredFields: number;
    contextsOverLimit: number;
    allContextsScored: boolean;
}

export interface QualityReport {
    status: QualityStatus;
    submissionCount: number;
    referenceCount: number;
    missingTaskIds: string[];
    extraTaskIds: string[];
    answerable: ClassStats;
    unanswerable: ClassStats;
    answerableRefusals: { taskId: string; excerpt: string }[];
    lengths: LengthStats | null;
    emptyResponses: string[];
    veryShort: { taskId: string; length: number }[];
    veryLong: { taskId: string; length: number }[];
    compliance: ComplianceStats;
    answerabilityScore: number;
    predictedScore: number | null;
    verdict: QualityVerdict | null;
    recommendations: string[];
    readyToSubmit: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function taskIdOf(entry: unknown): string {
    if (!isRecord(entry)) return "";
    const id = entry.task_id;
    if (typeof id === "string") return id;
    if (typeof id === "number") return String(id);
    return "";
}

function listOf(entry: unknown, field: string): unknown[] {
    if (!isRecord(entry)) return [];
    const value = entry[field];
    return Array.isArray(value) ? value : [];
}

function responseText(entry: unknown): string {
    const first = listOf(entry, "predictions")[0];
    if (!isRecord(first) || typeof first.text !== "string") return "";
    return first.text.trim();
}

function classStats(correct: number, wrong: number): ClassStats {
    const total = correct + wrong;
    return {
        correct,
        wrong,
        total,
        accuracy: total > 0 ? correct / total : null,
    };
}

function emptyClass(): ClassStats {
    return classStats(0, 0);
}

function checkCompliance(submissions: readonly unknown[]): ComplianceStats {
    let missingRequiredFields = 0;
    let contextsOverLimit = 0;
    let allContextsScored = true;

    for (const entry of submissions) {
        if (!isRecord(entry) || !REQUIRED_FIELDS.every((field) => field in entry)) {
            missingRequiredFields++;
        }
        const contexts = listOf(entry, "contexts");
        if (contexts.length > MAX_OUTPUT_CONTEXTS) contextsOverLimit++;
        if (contexts.some((context) => !isRecord(context) || !("score" in context))) {
            allContextsScored = false;
        }
    }

    return { missingRequiredFields, contextsOverLimit, allContextsScored };
}

export function predictScore(
    answerable: ClassStats,
    unanswerable: ClassStats,
    averageLength: number | null,
): number {
    let quality = BASE_QUALITY;

    if (answerable.wrong > 0) {
        quality -= (answerable.wrong / answerable.total) * ANSWERABLE_PENALTY;
    }
    if (unanswerable.wrong > 0) {
        quality -= (unanswerable.wrong / unanswerable.total) * UNANSWERABLE_PENALTY;
    }
    if (averageLength !== null) {
        if (averageLength < SHORT_AVERAGE_CHARS) {
            quality -= SHORT_AVERAGE_PENALTY;
        } else if (averageLength > LONG_AVERAGE_CHARS) {
            quality += LONG_AVERAGE_BONUS;
        }
    }

    return Math.max(MIN_PREDICTED_SCORE, Math.min(MAX_PREDICTED_SCORE, quality));
}

export function verdictFor(score: number): QualityVerdict {
    if (score >= 0.6) return "excellent";
    if (score >= 0.55) return "good";
    if (score >= 0.5) return "acceptable";
    return "needs_improvement";
}

function mismatchReport(
    status: Exclude<QualityStatus, "ok">,
    submissions: readonly unknown[],
    references: readonly unknown[],
    missingTaskIds: string[],
    extraTaskIds: string[],
): QualityReport {
    return {
        status,
        submissionCount: submissions.length,
        referenceCount: references.length,
        missingTaskIds,
        extraTaskIds,
        answerable: emptyClass(),
        unanswerable: emptyClass(),
        answerableRefusals: [],
        lengths: null,
        emptyResponses: [],
        veryShort: [],
        veryLong: [],
        compliance: checkCompliance(submissions),
        answerabilityScore: 0,
        predictedScore: null,
        verdict: null,
        recommendations: [],
        readyToSubmit: false,
    };
}

export function validateSubmissionQuality(
    submissions: readonly unknown[],
    references: readonly unknown[],
    classifier: RefusalClassifier = validationRefusalClassifier,
): QualityReport {
    if (submissions.length !== references.length) {
        return mismatchReport("count_mismatch", submissions, references, [], []);
    }

    const referenceById = new Map<string, unknown>();
    for (const reference of references) {
        referenceById.set(taskIdOf(reference), reference);
    }
    const submissionIds = new Set(submissions.map(taskIdOf));

    const missingTaskIds = [...referenceById.keys()].filter(
        (id) => !submissionIds.has(id),
    );
    const extraTaskIds = [...submissionIds].filter(
        (id) => !referenceById.has(id),
    );
    if (missingTaskIds.length > 0 || extraTaskIds.length > 0) {
        return mismatchReport(
            "id_mismatch",
            submissions,
            references,
            missingTaskIds,
            extraTaskIds,
        );
    }

    let answerableCorrect = 0;
    let answerableWrong = 0;
    let unanswerableCorrect = 0;
    let unanswerableWrong = 0;
    const lengths: number[] = [];
    const emptyResponses: string[] = [];
    const veryShort: { taskId: string; length: number }[] = [];
    const veryLong: { taskId: string; length: number }[] = [];
    const answerableRefusals: { taskId: string; excerpt: string }[] = [];

    for (const submission of submissions) {
        const taskId = taskIdOf(submission);
        const text = responseText(submission);

        if (text.length === 0) {
            emptyResponses.push(taskId);
            continue;
        }

        lengths.push(text.length);
        if (text.length < VERY_SHORT_CHARS) {
            veryShort.push({ taskId, length: text.length });
        } else if (text.length > VERY_LONG_CHARS) {
            veryLong.push({ taskId, length: text.length });
        }

        const answerable = listOf(referenceById.get(taskId), "contexts").length > 0;
        const refusal = classifier.isRefusal(text);

        if (answerable) {
            if (refusal) {
                answerableWrong++;
                answerableRefusals.push({
                    taskId,
                    excerpt: text.slice(0, EXCERPT_CHARS),
                });
            } else {
                answerableCorrect++;
            }
        } else if (refusal) {
            unanswerableCorrect++;
        } else {
            unanswerableWrong++;
        }
    }

    const answerable = classStats(answerableCorrect, answerableWrong);
    const unanswerable = classStats(unanswerableCorrect, unanswerableWrong);
    const lengthStats: LengthStats | null =
        lengths.length > 0
            ? {
                  average: lengths.reduce((sum, n) => sum + n, 0) / lengths.length,
                  min: Math.min(...lengths),
                  max: Math.max(...lengths),
              }
            : null;
    const compliance = checkCompliance(submissions);

    const answerabilityScore =
        answerable.accuracy !== null && unanswerable.accuracy !== null
            ? (answerable.accuracy + unanswerable.accuracy) / 2
            : 0;
    const predictedScore = predictScore(
        answerable,
        unanswerable,
        lengthStats ? lengthStats.average : null,
    );

    const recommendations: string[] = [];
    if (answerable.wrong > 0) {
        recommendations.push(
            `Fix ${answerable.wrong} answerable tasks getting refusals: strengthen the prompt to always answer when contexts are provided, or raise temperature slightly (0.3-0.4)`,
        );
    }
    if (unanswerable.wrong > 0) {
        recommendations.push(
            `Fix ${unanswerable.wrong} unanswerable tasks getting answers`,
        );
    }
    if (emptyResponses.length > 0) {
        recommendations.push(`Fix ${emptyResponses.length} empty responses`);
    }
    if (compliance.contextsOverLimit > 0) {
        recommendations.push(
            `Trim ${compliance.contextsOverLimit} entries to ≤${MAX_OUTPUT_CONTEXTS} contexts`,
        );
    }
    if (compliance.missingRequiredFields > 0) {
        recommendations.push(
            `Fix ${compliance.missingRequiredFields} entries with missing fields`,
        );
    }

    return {
        status: "ok",
        submissionCount: submissions.length,
        referenceCount: references.length,
        missingTaskIds: [],
        extraTaskIds: [],
        answerable,
        unanswerable,
        answerableRefusals,
        lengths: lengthStats,
        emptyResponses,
        veryShort,
        veryLong,
        compliance,
        answerabilityScore,
        predictedScore,
        verdict: verdictFor(predictedScore),
        recommendations,
        readyToSubmit:
            predictedScore >= READY_THRESHOLD && recommendations.length === 0,
    };
}

async function readRecordsStrict(path: string): Promise<unknown[]> {
    const document = await readJsonl(path);
    const firstError = document.errors[0];
    if (firstError) {
        throw new Error(
            `${path} line ${firstError.lineNumber}: invalid JSON - ${firstError.message}`,
        );
    }
    return document.records.map((record) => record.value);
}

export async function validateSubmissionFiles(
    submissionPath: string,
    referencePath: string,
    classifier?: RefusalClassifier,
): Promise<QualityReport> {
    const submissions = await readRecordsStrict(submissionPath);
    const references = await readRecordsStrict(referencePath);
    return validateSubmissionQuality(submissions, references, classifier);
}
