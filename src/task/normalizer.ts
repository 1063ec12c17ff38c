import { z } from "zod";
import { InvalidTaskRecordError, MissingTaskIdError } from "../errors";
import type {
    ConversationTurn,
    ReferencePassage,
    Task,
} from "./types";

const DEFAULT_COLLECTION = "general";
const UNKNOWN = "unknown";
const DEFAULT_SCORE = 1.0;

const LooseObjectSchema = z.record(z.string(), z.unknown());
const LooseListSchema = z.array(LooseObjectSchema).nullish();

/**
 * Both accepted record layouts. Field-level values stay `unknown` so that the
 * alias resolution below decides which spelling wins.
 */
export const RawTaskRecordSchema = z
    .object({
        conversation_id: z.unknown(),
        task_id: z.unknown(),
        example_id: z.unknown(),
        Collection: z.unknown(),
        collection: z.unknown(),
        input: LooseListSchema,
        conversation: LooseListSchema,
        contexts: LooseListSchema,
        passages: LooseListSchema,
    })
    .passthrough();

export type RawTaskRecord = z.infer<typeof RawTaskRecordSchema>;

const TaskIdFieldsSchema = z
    .object({ task_id: z.unknown(), example_id: z.unknown() })
    .passthrough();
type LooseObject = z.infer<typeof LooseObjectSchema>;

function asText(value: unknown): string | undefined {
    if (typeof value === "string") {
        return value.length > 0 ? value : undefined;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    return undefined;
}

function firstText(...values: unknown[]): string | undefined {
    for (const value of values) {
        const text = asText(value);
        if (text !== undefined) return text;
    }
    return undefined;
}

function firstNonEmptyList(
    ...lists: (LooseObject[] | null | undefined)[]
): LooseObject[] {
    for (const list of lists) {
        if (list && list.length > 0) return list;
    }
    return [];
}

function toTurn(message: LooseObject): ConversationTurn {
    return {
        speaker: firstText(message.speaker, message.role) ?? UNKNOWN,
        text: firstText(message.text, message.content) ?? "",
    };
}

function toPassage(context: LooseObject): ReferencePassage {
    const score = context.score;
    return {
        documentId: firstText(context.document_id, context.id) ?? UNKNOWN,
        text: firstText(context.text, context.content) ?? "",
        score:
            typeof score === "number" && Number.isFinite(score)
                ? score
                : DEFAULT_SCORE,
    };
}

export function decodeTaskRecord(record: unknown): RawTaskRecord {
    const parsed = RawTaskRecordSchema.safeParse(record);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) =>
                issue.path.length > 0
                    ? `${issue.path.join(".")}: ${issue.message}`
                    : issue.message,
            )
            .join("; ");
        throw new InvalidTaskRecordError(detail);
    }
    return parsed.data;
}

/**
 * Turns a loosely shaped input record into a canonical task. Throws
 * `MissingTaskIdError` when neither `task_id` nor `example_id` is usable.
 */
export function normalizeTask(record: unknown): Task {
    // An absent id outranks malformed containers.
    const ids = TaskIdFieldsSchema.safeParse(record);
    if (ids.success && !firstText(ids.data.task_id, ids.data.example_id)) {
        throw new MissingTaskIdError();
    }

    const raw = decodeTaskRecord(record);

    const taskId = firstText(raw.task_id, raw.example_id);
    if (!taskId) {
        throw new MissingTaskIdError();
    }

    const rawInput = firstNonEmptyList(raw.input, raw.conversation);
    const rawContexts = firstNonEmptyList(raw.contexts, raw.passages);

    return {
        conversationId: firstText(raw.conversation_id) ?? "",
        taskId,
        collection: firstText(raw.Collection, raw.collection) ?? DEFAULT_COLLECTION,
        conversation: rawInput.map(toTurn),
        contexts: rawContexts.map(toPassage),
        rawInput,
    };
}
