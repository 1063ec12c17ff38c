export interface DomainGuidance {
    keyword: string;
    guidance: string;
}

// Matched in order against the lowercased collection name.
export const DOMAIN_GUIDANCE: readonly DomainGuidance[] = [
    {
        keyword: "fiqa",
        guidance: "Financial question - be precise with numbers and terms.",
    },
    {
        keyword: "ibmcloud",
        guidance: "Technical question - be accurate with technical details.",
    },
    {
        keyword: "clapnq",
        guidance: "General knowledge - provide clear, direct answers.",
    },
    {
        keyword: "govt",
        guidance: "Government/policy - be authoritative and accurate.",
    },
];

export const DEFAULT_GUIDANCE = "Provide helpful information.";

export function selectDomainGuidance(
    collection: string,
    table: readonly DomainGuidance[] = DOMAIN_GUIDANCE,
): string {
    const lower = collection.toLowerCase();
    const match = table.find((entry) => lower.includes(entry.keyword));
    return match ? match.guidance : DEFAULT_GUIDANCE;
}
