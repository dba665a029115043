import { type EmbeddingProvider } from '@concierge/core';

export interface FakeEmbeddingProviderOptions {
    dimensions?: number;
    /** Exact vectors for known texts; anything else is hashed. */
    fixed?: Record<string, number[]>;
}

function fnv1a(token: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < token.length; i += 1) {
        hash ^= token.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Deterministic bag-of-words embedder. Texts sharing words land close
 * together, which is enough to exercise similarity search offline.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
    private readonly dimensions: number;
    private readonly fixed: Record<string, number[]>;
    public readonly queries: string[] = [];

    public constructor(options: FakeEmbeddingProviderOptions = {}) {
        this.dimensions = options.dimensions ?? 32;
        this.fixed = options.fixed ?? {};
    }

    public async embedQuery(text: string): Promise<number[]> {
        this.queries.push(text);
        return this.vectorize(text);
    }

    public async embedDocuments(texts: string[]): Promise<number[][]> {
        return texts.map((text) => this.vectorize(text));
    }

    private vectorize(text: string): number[] {
        const known = this.fixed[text];
        if (known) {
            return [...known];
        }

        const vector = new Array<number>(this.dimensions).fill(0);
        const tokens = text.toLowerCase().split(/[^a-z0-9]+/g).filter(Boolean);
        for (const token of tokens) {
            const bucket = fnv1a(token) % this.dimensions;
            vector[bucket] = (vector[bucket] ?? 0) + 1;
        }

        const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
        return norm === 0 ? vector : vector.map((value) => value / norm);
    }
}
