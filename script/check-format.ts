/**
 * check-format: validates a prediction file before submission.
 *
 * Usage:
 *   npm run check-format -- data/predictions.jsonl
 *
 * Exit code 0 when the file is valid, 1 otherwise.
 */

import { config as loadDotenv } from "dotenv";
import {
    checkSubmissionFormat,
    type FormatReport,
} from "../src/validate/format-checker";
import { createLogger } from "../src/utils/logging";

const MAX_ISSUES_SHOWN = 10;
const MAX_WARNINGS_SHOWN = 5;

const logger = createLogger("Script.CheckFormat");

function parseArgs(argv: string[]): { file: string | null } {
    let file: string | null = null;
    for (const arg of argv) {
        if (arg === "--help") {
            printHelp();
            process.exit(0);
        }
        if (arg.startsWith("--")) throw new Error(`Unknown argument: ${arg}`);
        if (file) throw new Error("Only one prediction file can be checked");
        file = arg;
    }
    return { file };
}

function printHelp() {
    console.log(`Usage:
  tsx script/check-format.ts <predictions.jsonl>

Without a path, RAG_OUTPUT_FILE is checked.`);
}

function defaultFile(): string | null {
    loadDotenv();
    const value = process.env.RAG_OUTPUT_FILE?.trim();
    return value ? value : null;
}

function printList(title: string, items: string[], limit: number) {
    console.log(`\n${title}`);
    for (const item of items.slice(0, limit)) {
        console.log(`   ${item}`);
    }
    if (items.length > limit) {
        console.log(`   ... and ${items.length - limit} more`);
    }
}

function printReport(file: string, report: FormatReport) {
    const rule = "=".repeat(80);
    console.log(`${rule}\nSUBMISSION FORMAT VALIDATION\n${rule}`);
    console.log(`File: ${file}`);
    console.log(`File size: ${(report.fileSizeBytes / (1024 * 1024)).toFixed(2)} MB`);
    console.log(`Total lines checked: ${report.lineCount}`);
    console.log(`Empty contexts: ${report.emptyContexts} (OK for unanswerable tasks)`);

    if (report.warnings.length > 0) {
        printList(
            `Found ${report.warnings.length} warning(s):`,
            report.warnings,
            MAX_WARNINGS_SHOWN,
        );
    }
    if (report.issues.length > 0) {
        printList(
            `Found ${report.issues.length} issue(s):`,
            report.issues,
            MAX_ISSUES_SHOWN,
        );
    }

    console.log(`\n${report.valid ? "FORMAT IS VALID" : "FORMAT IS INVALID"}`);
}

async function main() {
    const { file: argFile } = parseArgs(process.argv.slice(2));
    const file = argFile ?? defaultFile();
    if (!file) {
        printHelp();
        process.exit(1);
    }

    const report = await checkSubmissionFormat(file);
    printReport(file, report);
    process.exitCode = report.valid ? 0 : 1;
}

main().catch((error) => {
    const message =
        error instanceof Error ? (error.stack ?? error.message) : String(error);
    logger.error("fatal", { error: message });
    process.exit(1);
});
