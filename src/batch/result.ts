import {
    MAX_OUTPUT_CONTEXTS,
    type GenerationResult,
    type Prediction,
    type Task,
} from "../task/types";

export function toPrediction(task: Task, text: string): Prediction {
    return { taskId: task.taskId, text };
}

/** Echoes the task in the submission layout, keeping the top-ranked passages. */
export function toGenerationResult(
    task: Task,
    prediction: Prediction,
): GenerationResult {
    return {
        conversation_id: task.conversationId,
        task_id: task.taskId,
        Collection: task.collection,
        input: [...task.rawInput],
        contexts: task.contexts.slice(0, MAX_OUTPUT_CONTEXTS).map((passage) => ({
            document_id: passage.documentId,
            text: passage.text,
            score: passage.score,
        })),
        predictions: [{ text: prediction.text }],
    };
}
