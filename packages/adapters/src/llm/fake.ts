import {
    type LLMCompleteOptions,
    type LLMProvider,
    type LLMResponse
} from '@concierge/core';

/**
 * Replays scripted responses in order, wrapping around at the end.
 * Every request is kept in `calls` for assertions.
 */
export class FakeLLMProvider implements LLMProvider {
    private responses: LLMResponse[];
    private callCount = 0;
    public readonly calls: LLMCompleteOptions[] = [];

    public setResponses(responses: LLMResponse[]): void {
        this.responses = responses;
        this.callCount = 0;
    }

    public constructor(responses?: LLMResponse[]) {
        this.responses = responses ?? [
            {
                content: 'Fake response',
                toolCalls: [],
                tokensUsed: { promptTokens: 0, completionTokens: 0 },
                model: 'fake-model',
                latencyMs: 10
            }
        ];
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        this.calls.push({ ...options, messages: [...options.messages] });
        const response = this.responses[this.callCount % this.responses.length];
        if (!response) {
            throw new Error('FakeLLMProvider: No response available');
        }
        this.callCount++;
        return response;
    }
}
