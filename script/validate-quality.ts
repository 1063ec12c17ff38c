/**
 * validate-quality: compares a prediction file against the labelled
 * reference file and prints a predicted score.
 *
 * Usage:
 *   npm run validate-quality -- --submission data/predictions.jsonl --reference data/reference.jsonl
 *
 * Exit code 1 when the task ids do not line up or fixes are recommended.
 */

import { config as loadDotenv } from "dotenv";
import {
    validateSubmissionFiles,
    type ClassStats,
    type QualityReport,
} from "../src/validate/quality-validator";
import { createLogger } from "../src/utils/logging";

interface Options {
    submission: string | null;
    reference: string | null;
}

const EXAMPLES_SHOWN = 3;

const VERDICT_LABELS = {
    excellent: "EXCELLENT - above the 0.60 baseline",
    good: "GOOD - competitive baseline",
    acceptable: "ACCEPTABLE but below target",
    needs_improvement: "NEEDS IMPROVEMENT",
} as const;

const logger = createLogger("Script.ValidateQuality");

function parseArgs(argv: string[]): Options {
    const options: Options = { submission: null, reference: null };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];

        switch (arg) {
            case "--submission":
                if (!next) throw new Error("--submission requires a path");
                options.submission = next;
                i++;
                break;
            case "--reference":
                if (!next) throw new Error("--reference requires a path");
                options.reference = next;
                i++;
                break;
            case "--help":
                printHelp();
                process.exit(0);
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    return options;
}

function printHelp() {
    console.log(`Usage:
  tsx script/validate-quality.ts [options]

Options:
  --submission <path>  Prediction file (default: RAG_OUTPUT_FILE)
  --reference <path>   Labelled reference file (default: RAG_INPUT_FILE)
  --help               Show this help`);
}

function percent(stats: ClassStats): string {
    return stats.accuracy === null ? "n/a" : `${(stats.accuracy * 100).toFixed(1)}%`;
}

function printReport(report: QualityReport) {
    const rule = "=".repeat(80);
    console.log(`${rule}\nSUBMISSION QUALITY VALIDATION\n${rule}`);
    console.log(`Submissions: ${report.submissionCount}`);
    console.log(`References: ${report.referenceCount}`);

    if (report.status === "count_mismatch") {
        console.log("FAIL: count mismatch");
        return;
    }
    if (report.status === "id_mismatch") {
        if (report.missingTaskIds.length > 0) {
            console.log(`FAIL: missing ${report.missingTaskIds.length} task IDs`);
        }
        if (report.extraTaskIds.length > 0) {
            console.log(`FAIL: extra ${report.extraTaskIds.length} task IDs`);
        }
        return;
    }

    const { answerable, unanswerable } = report;
    console.log(`\nANSWERABLE TASKS (${answerable.total})`);
    console.log(`   correct (answered): ${answerable.correct}`);
    console.log(`   wrong (refusal):    ${answerable.wrong}`);
    console.log(`   accuracy:           ${percent(answerable)}`);
    console.log(`\nUNANSWERABLE TASKS (${unanswerable.total})`);
    console.log(`   correct (refusal):  ${unanswerable.correct}`);
    console.log(`   wrong (answered):   ${unanswerable.wrong}`);
    console.log(`   accuracy:           ${percent(unanswerable)}`);

    for (const example of report.answerableRefusals.slice(0, EXAMPLES_SHOWN)) {
        console.log(`\n   Task: ${example.taskId}\n   Response: ${example.excerpt}...`);
    }

    if (report.lengths) {
        console.log(`\nRESPONSE LENGTH`);
        console.log(`   average: ${report.lengths.average.toFixed(0)} chars`);
        console.log(`   range:   ${report.lengths.min} - ${report.lengths.max} chars`);
    }
    console.log(`   empty: ${report.emptyResponses.length}`);
    console.log(`   very short (<20): ${report.veryShort.length}`);
    console.log(`   very long (>800): ${report.veryLong.length}`);

    const { compliance } = report;
    console.log(`\nFORMAT COMPLIANCE`);
    console.log(`   entries missing fields: ${compliance.missingRequiredFields}`);
    console.log(`   entries over 10 contexts: ${compliance.contextsOverLimit}`);
    console.log(`   all contexts scored: ${compliance.allContextsScored ? "yes" : "no"}`);

    const score = report.predictedScore ?? 0;
    console.log(`\n${rule}\nPREDICTED SCORE: ${score.toFixed(3)}`);
    console.log(`   answerability: ${report.answerabilityScore.toFixed(3)}`);
    if (report.verdict) console.log(`   ${VERDICT_LABELS[report.verdict]}`);

    if (report.recommendations.length > 0) {
        console.log(`\nIssues to fix:`);
        report.recommendations.forEach((item, index) => {
            console.log(`   ${index + 1}. ${item}`);
        });
    }

    console.log(rule);
    console.log(
        report.readyToSubmit
            ? `READY TO SUBMIT (expected ${score.toFixed(3)})`
            : `RECOMMEND FIXES BEFORE SUBMISSION (current ${score.toFixed(3)}, potential ${Math.min(0.65, score + 0.05).toFixed(3)})`,
    );
}

async function main() {
    const options = parseArgs(process.argv.slice(2));
    loadDotenv();
    const submission = options.submission ?? process.env.RAG_OUTPUT_FILE;
    const reference = options.reference ?? process.env.RAG_INPUT_FILE;
    if (!submission || !reference) {
        printHelp();
        process.exit(1);
    }

    const report = await validateSubmissionFiles(submission, reference);
    printReport(report);
    process.exitCode = report.status === "ok" && report.readyToSubmit ? 0 : 1;
}

main().catch((error) => {
    const message =
        error instanceof Error ? (error.stack ?? error.message) : String(error);
    logger.error("fatal", { error: message });
    process.exit(1);
});
