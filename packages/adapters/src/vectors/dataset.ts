import { readFile } from 'node:fs/promises';

import { z } from 'zod';
import {
    AmenitySchema,
    ConfigurationError,
    type Amenity,
    type EmbeddingProvider
} from '@concierge/core';

const AmenityListSchema = z.array(AmenitySchema);

export async function loadAmenityDataset(path: string): Promise<Amenity[]> {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read amenity dataset at ${path}`, { cause: error });
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Amenity dataset at ${path} is not valid JSON`, { cause: error });
    }

    const parsed = AmenityListSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid amenity dataset at ${path}: ${issues.join('; ')}`);
    }
    return parsed.data;
}

/**
 * Fills in embeddings for records that were stored without one, embedding
 * their `content` in a single batch.
 */
export async function embedMissing(records: Amenity[], embeddings: EmbeddingProvider): Promise<Amenity[]> {
    const missing = records.filter((record) => !record.embedding);
    if (missing.length === 0) {
        return records;
    }

    const vectors = await embeddings.embedDocuments(missing.map((record) => record.content));
    if (vectors.length !== missing.length) {
        throw new Error(`Expected ${missing.length} embeddings, got ${vectors.length}`);
    }

    const byId = new Map<number, number[]>();
    missing.forEach((record, index) => {
        const vector = vectors[index];
        if (vector) byId.set(record.id, vector.map((value) => Math.fround(value)));
    });

    return records.map((record) => {
        const embedding = record.embedding ?? byId.get(record.id);
        return embedding ? { ...record, embedding } : record;
    });
}
