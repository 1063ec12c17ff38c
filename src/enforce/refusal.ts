/**
 * Lexical refusal detection. A text counts as a refusal when it contains any
 * phrase of the vocabulary, compared case-insensitively as a substring.
 *
 * This misfires on answers that merely quote such a phrase ("many users are
 * unable to sign in"); swap in another `RefusalClassifier` rather than
 * patching the vocabulary for that.
 */

export interface RefusalClassifier {
    readonly phrases: readonly string[];
    isRefusal(text: string): boolean;
}

export const GENERATION_REFUSAL_PHRASES = [
    "don't have",
    "do not have",
    "don't know",
    "cannot answer",
    "can't answer",
    "no information",
    "not able",
    "unable to",
    "cannot provide",
    "can't provide",
    "don't possess",
] as const;

/** The submission validator also counts apologies and "not enough" as refusals. */
export const VALIDATION_REFUSAL_PHRASES = [
    "don't have",
    "do not have",
    "don't know",
    "cannot answer",
    "can't answer",
    "no information",
    "not able",
    "unable to",
    "apologize",
    "sorry",
    "insufficient",
    "not enough",
    "can't provide",
    "cannot provide",
    "don't possess",
    "do not possess",
] as const;

export function containsAnyPhrase(
    text: string,
    phrases: readonly string[],
): boolean {
    const lower = text.toLowerCase();
    return phrases.some((phrase) => lower.includes(phrase.toLowerCase()));
}

export function createPhraseClassifier(
    phrases: readonly string[],
): RefusalClassifier {
    const ordered = [...phrases];
    return {
        phrases: ordered,
        isRefusal: (text) => containsAnyPhrase(text, ordered),
    };
}

export const generationRefusalClassifier = createPhraseClassifier(
    GENERATION_REFUSAL_PHRASES,
);

export const validationRefusalClassifier = createPhraseClassifier(
    VALIDATION_REFUSAL_PHRASES,
);
