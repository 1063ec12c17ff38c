import type { GeneratorConfig } from "../config";
import { ConfigurationError } from "../errors";
import { OpenAICompatibleProvider } from "./openai-compatible";
import type { ChatProvider } from "./types";

/** One provider per API key, in key order; index i serves credential i. */
export function createCredentialProviders(
    config: Pick<GeneratorConfig, "apiKeys" | "baseUrl" | "model">,
): ChatProvider[] {
    if (config.apiKeys.length === 0) {
        throw new ConfigurationError("at least one API key is required");
    }

    return config.apiKeys.map(
        (apiKey, index) =>
            new OpenAICompatibleProvider({
                name: `groq#${index + 1}`,
                baseUrl: config.baseUrl,
                apiKey,
                model: config.model,
            }),
    );
}
