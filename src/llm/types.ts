export type ChatMessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
    role: ChatMessageRole;
    content: string;
}

export interface ChatCompletionRequest {
    messages: ChatMessage[];
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

export interface ChatUsage {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
}

export interface ChatCompletionResponse {
    text: string;
    provider: string;
    model?: string;
    usage?: ChatUsage;
    latencyMs?: number;
}

/** One credential's view of a chat-completions endpoint. */
export interface ChatProvider {
    readonly name: string;
    complete(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
}
