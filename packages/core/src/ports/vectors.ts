import { type SimilarityMatch } from '../entities/amenity';
import { type CallOptions, type RuntimeResource } from '../lifecycle';

export interface SimilarityQuery {
  embedding: readonly number[];
  /** Matches scoring below this are excluded by the store. */
  threshold: number;
  limit: number;
}

/**
 * Ranks stored records against a query vector. Implementations return
 * matches in descending similarity order.
 */
export interface VectorStore extends RuntimeResource {
  semanticSimilaritySearch(query: SimilarityQuery, options?: CallOptions): Promise<SimilarityMatch[]>;
}
