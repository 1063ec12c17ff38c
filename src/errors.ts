/**
 * Named error types raised by the generation pipeline and its checkers.
 */

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(`Configuration error: ${message}`);
        this.name = "ConfigurationError";
    }
}

export class InvalidTaskRecordError extends Error {
    constructor(message: string) {
        super(`Invalid task record: ${message}`);
        this.name = "InvalidTaskRecordError";
    }
}

export class MissingTaskIdError extends Error {
    constructor() {
        super("No task_id found in task");
        this.name = "MissingTaskIdError";
    }
}

export class EmptyConversationError extends Error {
    taskId: string | null;

    constructor(taskId: string | null = null) {
        super(
            taskId ? `Empty conversation for task ${taskId}` : "Empty conversation",
        );
        this.name = "EmptyConversationError";
        this.taskId = taskId;
    }
}

export type TransientReason = "rate_limit" | "other";

/** Failure worth another attempt on the same credential. */
export class TransientRequestError extends Error {
    reason: TransientReason;

    constructor(reason: TransientReason, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = "TransientRequestError";
        this.reason = reason;
    }
}

/** The credential has spent its quota; rotation recovers, retrying does not. */
export class QuotaExhaustedError extends Error {
    credentialIndex: number;

    constructor(credentialIndex: number, message: string, cause?: unknown) {
        super(`Credential #${credentialIndex + 1} exhausted: ${message}`, {
            cause,
        });
        this.name = "QuotaExhaustedError";
        this.credentialIndex = credentialIndex;
    }
}

export class AllCredentialsExhaustedError extends Error {
    poolSize: number;

    constructor(poolSize: number) {
        super(`All API keys exhausted (${poolSize}/${poolSize}) - cannot continue`);
        this.name = "AllCredentialsExhaustedError";
        this.poolSize = poolSize;
    }
}

export class InputFileNotFoundError extends Error {
    path: string;

    constructor(path: string) {
        super(`Input file not found: ${path}`);
        this.name = "InputFileNotFoundError";
        this.path = path;
    }
}
