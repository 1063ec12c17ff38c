import { EmptyConversationError } from "../errors";
import type { ContextSet, Conversation, ConversationTurn } from "../task/types";
import { selectDomainGuidance } from "./domains";

export type PromptVariant = "answerable" | "unanswerable";

export const NO_HISTORY = "No previous conversation.";

export const EXAMPLE_REFUSALS = [
    "I don't have the information needed to answer that question.",
    "I'm unable to answer that as I don't have access to the relevant information.",
    "Unfortunately, I don't have the information to help with that question.",
] as const;

function roleLabel(turn: ConversationTurn): "User" | "Assistant" {
    return turn.speaker === "user" || turn.speaker === "User"
        ? "User"
        : "Assistant";
}

/** Every turn except the current question, as `Role: text` blocks. */
export function formatHistory(conversation: Conversation): string {
    const parts = conversation
        .slice(0, -1)
        .map((turn) => `${roleLabel(turn)}: ${turn.text}`);
    return parts.length > 0 ? parts.join("\n\n") : NO_HISTORY;
}

export function formatPassages(contexts: ContextSet): string {
    return contexts
        .map((passage, index) => `[Passage ${index + 1}]\n${passage.text.trim()}`)
        .join("\n\n");
}

export function selectPromptVariant(contexts: ContextSet): PromptVariant {
    return contexts.length > 0 ? "answerable" : "unanswerable";
}

function buildUnanswerablePrompt(history: string, question: string): string {
    const examples = EXAMPLE_REFUSALS.map((line) => `- "${line}"`).join("\n");

    return `You are a helpful assistant. You do not have any information to answer the current question.

CONVERSATION HISTORY:
${history}

CURRENT QUESTION: ${question}

CRITICAL INSTRUCTION: You do NOT have any reference information or documents to answer this question. You MUST politely decline.

Your response MUST be a polite refusal that acknowledges you don't have the information.

Examples of good refusals:
${examples}

DO NOT attempt to answer the question. DO NOT provide general knowledge. ONLY politely decline.

YOUR REFUSAL:`;
}

function buildAnswerablePrompt(
    history: string,
    passages: string,
    question: string,
    guidance: string,
): string {
    return `You are a helpful assistant answering questions based on provided information.

CONVERSATION HISTORY:
${history}

REFERENCE INFORMATION:
${passages}

CURRENT QUESTION: ${question}

CONTEXT: ${guidance}

CRITICAL INSTRUCTIONS:
1. You MUST answer using the reference information above
2. The passages contain the answer - find and use it
3. Be direct and specific - synthesize from multiple passages if needed
4. Length: 2-4 sentences (concise but complete)
5. For follow-up questions, connect to previous discussion
6. DO NOT say "I don't have information" - you DO have the passages above
7. Answer confidently based on the provided references

ANSWER (be direct and specific):`;
}

export function buildPrompt(
    conversation: Conversation,
    contexts: ContextSet,
    collection: string,
): string {
    const current = conversation.at(-1);
    if (!current) {
        throw new EmptyConversationError();
    }

    const history = formatHistory(conversation);

    if (selectPromptVariant(contexts) === "unanswerable") {
        return buildUnanswerablePrompt(history, current.text);
    }

    return buildAnswerablePrompt(
        history,
        formatPassages(contexts),
        current.text,
        selectDomainGuidance(collection),
    );
}
