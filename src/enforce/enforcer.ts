import {
    containsAnyPhrase,
    generationRefusalClassifier,
    type RefusalClassifier,
} from "./refusal";

export const FORCED_ANSWER =
    "Based on the available information, I can provide context on this topic.";
export const FORCED_REFUSAL =
    "I don't have the information needed to answer that question.";

export const SUBSTANTIVE_MIN_LENGTH = 50;
export const SOFTENING_PHRASES = ["unfortunately", "sorry", "apologize"] as const;

export type EnforcementOutcome =
    | "unchanged"
    | "forced_answer"
    | "forced_refusal";

export interface EnforcementResult {
    text: string;
    outcome: EnforcementOutcome;
}

/** Longer than the threshold and not hedged with an apology. */
export function isSubstantive(text: string): boolean {
    return (
        text.length > SUBSTANTIVE_MIN_LENGTH &&
        !containsAnyPhrase(text, SOFTENING_PHRASES)
    );
}

export function reviewAnswerability(
    rawText: string,
    hasContexts: boolean,
    classifier: RefusalClassifier = generationRefusalClassifier,
): EnforcementResult {
    const text = rawText.trim();
    const refusal = classifier.isRefusal(text);

    if (hasContexts && refusal) {
        return { text: FORCED_ANSWER, outcome: "forced_answer" };
    }

    if (!hasContexts && !refusal && isSubstantive(text)) {
        return { text: FORCED_REFUSAL, outcome: "forced_refusal" };
    }

    return { text, outcome: "unchanged" };
}

/**
 * Reconciles a generated response with whether the task had passages:
 * refusals become a generic answer when passages exist, and substantive
 * answers become a refusal when none do.
 */
export function enforceAnswerability(
    rawText: string,
    hasContexts: boolean,
    classifier?: RefusalClassifier,
): string {
    return reviewAnswerability(rawText, hasContexts, classifier).text;
}
