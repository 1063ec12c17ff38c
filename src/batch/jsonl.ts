import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { InputFileNotFoundError } from "../errors";

export interface JsonlRecord {
    lineNumber: number;
    value: unknown;
}

export interface JsonlLineError {
    lineNumber: number;
    message: string;
}

export interface JsonlDocument {
    records: JsonlRecord[];
    errors: JsonlLineError[];
}

export interface ParseJsonlOptions {
    /** When false, a blank line is reported as an error. Defaults to true. */
    allowBlankLines?: boolean;
}

/**
 * Parses line-delimited JSON; bad lines are reported, not thrown. The
 * newline that ends the last record does not open another line.
 */
export function parseJsonl(
    content: string,
    options: ParseJsonlOptions = {},
): JsonlDocument {
    const allowBlankLines = options.allowBlankLines ?? true;
    const records: JsonlRecord[] = [];
    const errors: JsonlLineError[] = [];
    const lines = content.split(/\r?\n/);
    if (lines.at(-1) === "") lines.pop();

    lines.forEach((line, offset) => {
        const lineNumber = offset + 1;
        if (line.trim().length === 0) {
            if (!allowBlankLines) errors.push({ lineNumber, message: "empty line" });
            return;
        }
        try {
            records.push({ lineNumber, value: JSON.parse(line) });
        } catch (error) {
            errors.push({
                lineNumber,
                message: error instanceof Error ? error.message : String(error),
            });
        }
    });

    return { records, errors };
}

function isMissingFile(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
    );
}

export async function fileSize(path: string): Promise<number> {
    try {
        return (await stat(path)).size;
    } catch (error) {
        if (isMissingFile(error)) throw new InputFileNotFoundError(path);
        throw error;
    }
}

export async function readJsonl(path: string): Promise<JsonlDocument> {
    let content: string;
    try {
        content = await readFile(path, "utf8");
    } catch (error) {
        if (isMissingFile(error)) throw new InputFileNotFoundError(path);
        throw error;
    }
    return parseJsonl(content);
}

export function serializeJsonl(records: readonly unknown[]): string {
    return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

export async function writeJsonl(
    path: string,
    records: readonly unknown[],
): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeJsonl(records), "utf8");
}
