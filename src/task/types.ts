export interface ConversationTurn {
    readonly speaker: string;
    readonly text: string;
}

/** Ordered turns; the last one is the question being answered. */
export type Conversation = readonly ConversationTurn[];

export interface ReferencePassage {
    readonly documentId: string;
    readonly text: string;
    readonly score: number;
}

/** Passages in retrieval-rank order. Empty means the task is unanswerable. */
export type ContextSet = readonly ReferencePassage[];

export interface Task {
    readonly conversationId: string;
    readonly taskId: string;
    readonly collection: string;
    readonly conversation: Conversation;
    readonly contexts: ContextSet;
    /** Conversation payload exactly as it appeared in the input record. */
    readonly rawInput: readonly Record<string, unknown>[];
}

export interface Prediction {
    readonly taskId: string;
    readonly text: string;
}

export const MAX_OUTPUT_CONTEXTS = 10;

export interface GenerationResultContext {
    document_id: string;
    text: string;
    score: number;
}

/** Output record, keyed the way the benchmark's evaluation script reads it. */
export interface GenerationResult {
    conversation_id: string;
    task_id: string;
    Collection: string;
    input: Record<string, unknown>[];
    contexts: GenerationResultContext[];
    predictions: { text: string }[];
}

export function isAnswerable(task: Pick<Task, "contexts">): boolean {
    return task.contexts.length > 0;
}
