import type {
    ChatCompletionRequest,
    ChatCompletionResponse,
    ChatProvider,
} from "./types";

export interface MockProviderReply {
    text?: string;
    error?: string;
    model?: string;
}

/** Replays queued replies in order; used in place of a real endpoint. */
export class MockChatProvider implements ChatProvider {
    readonly name: string;
    public calls: ChatCompletionRequest[] = [];
    private readonly queue: MockProviderReply[];

    constructor(replies: MockProviderReply[] = [], name = "mock") {
        this.queue = [...replies];
        this.name = name;
    }

    async complete(
        request: ChatCompletionRequest,
    ): Promise<ChatCompletionResponse> {
        this.calls.push(request);

        const next = this.queue.shift();
        if (!next) {
            throw new Error(`${this.name} has no queued reply`);
        }

        if (next.error) {
            throw new Error(next.error);
        }

        return {
            text: (next.text ?? "").trim(),
            provider: this.name,
            model: next.model ?? "mock-model",
            latencyMs: 0,
        };
    }
}
