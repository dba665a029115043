import OpenAI from 'openai';
import { type CallOptions, type EmbeddingProvider } from '@concierge/core';

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    private client: OpenAI;

    public constructor(private readonly opts: {
        baseUrl?: string | undefined;
        apiKey: string;
        model: string;
        client?: OpenAI;
    }) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey
        });
    }

    public async embedQuery(text: string, options: CallOptions = {}): Promise<number[]> {
        const [vector] = await this.embed([text], options.signal);
        if (!vector) {
            throw new Error('OpenAI returned no embedding for query');
        }
        return vector;
    }

    public async embedDocuments(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];
        return this.embed(texts);
    }

    private async embed(input: string[], signal?: AbortSignal): Promise<number[][]> {
        const response = await this.client.embeddings.create(
            { model: this.opts.model, input },
            signal ? { signal } : undefined
        );

        // the API documents `index` as the position in `input`
        return [...response.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }
}
