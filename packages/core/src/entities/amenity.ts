import { z } from 'zod';
import { decodeEmbedding } from '../utils/embedding';

/**
 * Embeddings arrive either as a JSON array or as the text form a database
 * column hands back. Anything else fails validation.
 */
export const EmbeddingSchema = z.unknown().transform((value, ctx) => {
  const decoded = decodeEmbedding(value);
  if (!decoded.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: decoded.error.message });
    return z.NEVER;
  }
  return decoded.value;
});

export const AmenitySchema = z.object({
  id          : z.number().int(),
  name        : z.string(),
  description : z.string(),
  location    : z.string(),
  terminal    : z.string(),
  category    : z.string(),
  hour        : z.string(),
  content     : z.string(),
  embedding   : EmbeddingSchema.optional()
});

export type Amenity = z.infer<typeof AmenitySchema>;

export const SimilarityMatchSchema = z.object({
  similarity : z.number(),
  record     : AmenitySchema
});

export type SimilarityMatch = z.infer<typeof SimilarityMatchSchema>;

/** Drops the embedding so matches stay small on the wire. */
export function withoutEmbedding(record: Amenity): Omit<Amenity, 'embedding'> {
  const { embedding: _embedding, ...rest } = record;
  return rest;
}
