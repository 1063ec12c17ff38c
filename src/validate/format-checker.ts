import { readFile } from "node:fs/promises";
import { fileSize, parseJsonl } from "../batch/jsonl";
import { MAX_OUTPUT_CONTEXTS } from "../task/types";

export const MAX_SUBMISSION_BYTES = 20 * 1024 * 1024;

export const REQUIRED_FIELDS = [
    "conversation_id",
    "task_id",
    "Collection",
    "input",
    "contexts",
    "predictions",
] as const;

export interface FormatReport {
    valid: boolean;
    fileSizeBytes: number;
    lineCount: number;
    emptyContexts: number;
    issues: string[];
    warnings: string[];
}

export interface FormatCheckOptions {
    maxBytes?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkContexts(
    line: number,
    contexts: unknown,
    issues: string[],
    warnings: string[],
): boolean {
    if (!Array.isArray(contexts)) {
        issues.push(`Line ${line}: 'contexts' must be a list`);
        return false;
    }

    if (contexts.length > MAX_OUTPUT_CONTEXTS) {
        warnings.push(
            `Line ${line}: 'contexts' has ${contexts.length} items (max recommended: ${MAX_OUTPUT_CONTEXTS})`,
        );
    }

    contexts.forEach((context: unknown, contextIndex) => {
        const where = `Line ${line}, context ${contextIndex}`;
        if (!isRecord(context)) {
            issues.push(`${where}: Must be a dict`);
            return;
        }
        if (!("document_id" in context)) {
            issues.push(`${where}: Missing 'document_id'`);
        }
        if (!("text" in context)) {
            issues.push(`${where}: Missing 'text'`);
        }
        if (!("score" in context)) {
            issues.push(`${where}: Missing 'score'`);
        } else if (typeof context.score !== "number") {
            issues.push(`${where}: 'score' must be numeric`);
        }
    });

    return contexts.length === 0;
}

function checkPredictions(line: number, predictions: unknown, issues: string[]) {
    if (!Array.isArray(predictions)) {
        issues.push(`Line ${line}: 'predictions' must be a list`);
        return;
    }
    const first: unknown = predictions[0];
    if (predictions.length === 0) {
        issues.push(`Line ${line}: 'predictions' is empty`);
    } else if (!isRecord(first)) {
        issues.push(`Line ${line}: prediction must be a dict`);
    } else if (!("text" in first)) {
        issues.push(`Line ${line}: prediction missing 'text' field`);
    } else if (typeof first.text !== "string" || first.text.trim().length === 0) {
        issues.push(`Line ${line}: prediction 'text' is empty`);
    }
}

/** Checks submission text line by line; size limits are the caller's concern. */
export function checkSubmissionContent(
    content: string,
): Omit<FormatReport, "fileSizeBytes"> {
    const issues: string[] = [];
    const warnings: string[] = [];
    let emptyContexts = 0;

    const document = parseJsonl(content, { allowBlankLines: false });
    for (const lineError of document.errors) {
        issues.push(
            `Line ${lineError.lineNumber}: Invalid JSON - ${lineError.message}`,
        );
    }

    for (const { lineNumber: line, value } of document.records) {
        if (!isRecord(value)) {
            issues.push(`Line ${line}: record must be a JSON object`);
            continue;
        }

        for (const field of REQUIRED_FIELDS) {
            if (!(field in value)) {
                issues.push(`Line ${line}: Missing required field '${field}'`);
            }
        }

        if ("task_id" in value && !value.task_id) {
            issues.push(`Line ${line}: 'task_id' is empty`);
        }

        if ("input" in value) {
            if (!Array.isArray(value.input)) {
                issues.push(`Line ${line}: 'input' must be a list`);
            } else if (value.input.length === 0) {
                warnings.push(`Line ${line}: 'input' is empty`);
            }
        }

        if ("contexts" in value) {
            if (checkContexts(line, value.contexts, issues, warnings)) {
                emptyContexts++;
            }
        }

        if ("predictions" in value) {
            checkPredictions(line, value.predictions, issues);
        }
    }

    issues.sort((a, b) => lineOf(a) - lineOf(b));

    return {
        valid: issues.length === 0,
        lineCount: document.records.length + document.errors.length,
        emptyContexts,
        issues,
        warnings,
    };
}

function lineOf(message: string): number {
    const match = /^Line (\d+)/.exec(message);
    return match ? Number(match[1]) : 0;
}

/**
 * Validates a prediction file against the submission layout. A file over the
 * size limit is rejected without being parsed.
 */
export async function checkSubmissionFormat(
    path: string,
    options: FormatCheckOptions = {},
): Promise<FormatReport> {
    const maxBytes = options.maxBytes ?? MAX_SUBMISSION_BYTES;
    const fileSizeBytes = await fileSize(path);

    if (fileSizeBytes > maxBytes) {
        return {
            valid: false,
            fileSizeBytes,
            lineCount: 0,
            emptyContexts: 0,
            issues: [
                `File exceeds ${maxBytes} byte limit (${fileSizeBytes} bytes)`,
            ],
            warnings: [],
        };
    }

    const content = await readFile(path, "utf8");
    return { fileSizeBytes, ...checkSubmissionContent(content) };
}
