import {
    type Amenity,
    type SimilarityMatch,
    type SimilarityQuery,
    type VectorStore
} from '@concierge/core';

function cosine(a: readonly number[], b: readonly number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / Math.sqrt(normA * normB);
}

type EmbeddedAmenity = Amenity & { embedding: number[] };

/**
 * Process-local vector store over amenity records. Records are keyed by id;
 * upserting an existing id replaces it.
 */
export class InMemoryVectorStore implements VectorStore {
    private readonly records = new Map<number, EmbeddedAmenity>();
    private dimensions: number | null = null;

    public constructor(records: Amenity[] = []) {
        this.upsert(records);
    }

    public get size(): number {
        return this.records.size;
    }

    public upsert(records: Amenity[]): void {
        for (const record of records) {
            const { embedding } = record;
            if (!embedding) {
                throw new Error(`Amenity ${record.id} has no embedding`);
            }
            if (this.dimensions === null) {
                this.dimensions = embedding.length;
            } else if (embedding.length !== this.dimensions) {
                throw new Error(`Amenity ${record.id} has ${embedding.length} dimensions, expected ${this.dimensions}`);
            }
            this.records.set(record.id, { ...record, embedding });
        }
    }

    public async semanticSimilaritySearch(query: SimilarityQuery): Promise<SimilarityMatch[]> {
        if (this.dimensions !== null && query.embedding.length !== this.dimensions) {
            throw new Error(`Query has ${query.embedding.length} dimensions, expected ${this.dimensions}`);
        }

        const matches: SimilarityMatch[] = [];
        for (const record of this.records.values()) {
            const similarity = cosine(query.embedding, record.embedding);
            if (similarity >= query.threshold) {
                matches.push({ similarity, record });
            }
        }

        return matches
            .sort((a, b) => b.similarity - a.similarity || a.record.id - b.record.id)
            .slice(0, query.limit);
    }
}
