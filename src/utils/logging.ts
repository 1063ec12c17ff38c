export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogValue = string | number | boolean | null | undefined;
export type LogFields = Record<string, LogValue>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const SENSITIVE_KEY_RE =
    /(authorization|api[_-]?keys?|token|secret|password|credential_value)/i;
// Groq keys start with gsk_, OpenAI-style keys with sk-.
const SENSITIVE_VALUE_RE = /(bearer\s+[a-z0-9._-]+|\bgsk_[a-z0-9]+|\bsk-[a-z0-9_-]+)/i;
const PROMPTLIKE_KEY_RE =
    /(prompt|question|passage|response|answer|raw|input|output|text)/i;

export function normalizeLevel(value?: string): LogLevel {
    if (!value) return "info";
    const lower = value.trim().toLowerCase();
    if (
        lower === "debug" ||
        lower === "info" ||
        lower === "warn" ||
        lower === "error"
    ) {
        return lower;
    }
    return "info";
}

function stringifyValue(value: LogValue): string {
    if (value === null) return "null";
    if (value === undefined) return "undefined";
    if (typeof value === "string") {
        return /\s/.test(value) ? JSON.stringify(value) : value;
    }
    return String(value);
}

function redactField(key: string, value: LogValue): LogValue {
    if (value === null || value === undefined) return value;

    if (SENSITIVE_KEY_RE.test(key)) {
        return "[REDACTED]";
    }

    if (typeof value === "string") {
        if (SENSITIVE_VALUE_RE.test(value)) {
            return "[REDACTED]";
        }

        if (PROMPTLIKE_KEY_RE.test(key) && value.length > 0) {
            return `[REDACTED_TEXT len=${value.length}]`;
        }
    }

    return value;
}

function formatFields(fields?: LogFields): string {
    if (!fields) return "";
    return Object.entries(fields)
        .map(
            ([key, value]) =>
                `${key}=${stringifyValue(redactField(key, value))}`,
        )
        .join(" ");
}

export interface Logger {
    readonly scope: string;
    debug(event: string, fields?: LogFields): void;
    info(event: string, fields?: LogFields): void;
    warn(event: string, fields?: LogFields): void;
    error(event: string, fields?: LogFields): void;
    /** Logger for a sub-scope, e.g. `Dispatch` -> `Dispatch.Key2`. */
    child(suffix: string): Logger;
}

export function createLogger(scope: string, minLevel?: LogLevel): Logger {
    const configured = minLevel ?? normalizeLevel(process.env.LOG_LEVEL);

    const write = (level: LogLevel, event: string, fields?: LogFields) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[configured]) return;

        const timestamp = new Date().toISOString();
        const meta = formatFields(fields);
        const line = `[${timestamp}] [${scope}] [${level.toUpperCase()}] ${event}${meta ? ` ${meta}` : ""}`;

        if (level === "error") {
            console.error(line);
            return;
        }
        if (level === "warn") {
            console.warn(line);
            return;
        }
        console.log(line);
    };

    return {
        scope,
        debug: (event, fields) => write("debug", event, fields),
        info: (event, fields) => write("info", event, fields),
        warn: (event, fields) => write("warn", event, fields),
        error: (event, fields) => write("error", event, fields),
        child: (suffix) => createLogger(`${scope}.${suffix}`, configured),
    };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
