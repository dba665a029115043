import {
  InvalidInputError,
  SIMILARITY_THRESHOLD,
  UpstreamError,
  err,
  ok,
  type CallOptions,
  type EmbeddingProvider,
  type Logger,
  type Result,
  type SimilarityMatch,
  type VectorStore
} from '@concierge/core';

export interface SimilaritySearchOptions {
  embeddings: EmbeddingProvider;
  vectors: VectorStore;
  logger: Logger;
}

export type SimilaritySearchError = InvalidInputError | UpstreamError;

/**
 * Turns free text into a bounded similarity search. Filtering by threshold
 * and ordering are left to the vector store.
 */
export class SimilaritySearch {
  public readonly threshold = SIMILARITY_THRESHOLD;
  private readonly embeddings: EmbeddingProvider;
  private readonly vectors: VectorStore;
  private readonly logger: Logger;

  public constructor(options: SimilaritySearchOptions) {
    this.embeddings = options.embeddings;
    this.vectors = options.vectors;
    this.logger = options.logger.child({ component: 'similarity_search' });
  }

  public async search(
    queryText: string,
    topK: number,
    options: CallOptions = {}
  ): Promise<Result<SimilarityMatch[], SimilaritySearchError>> {
    if (!Number.isInteger(topK) || topK <= 0) {
      return err(new InvalidInputError('top_k', 'top_k must be a positive integer'));
    }
    const query = queryText.trim();
    if (!query) {
      return err(new InvalidInputError('query', 'query must not be empty'));
    }

    let embedding: number[];
    try {
      embedding = await this.embeddings.embedQuery(query, options);
    } catch (error) {
      this.logger.error({ err: error }, 'Query embedding failed');
      return err(new UpstreamError('Query embedding', error));
    }

    let matches: SimilarityMatch[];
    try {
      matches = await this.vectors.semanticSimilaritySearch({
        embedding,
        threshold: this.threshold,
        limit: topK
      }, options);
    } catch (error) {
      this.logger.error({ err: error }, 'Vector search failed');
      return err(new UpstreamError('Vector search', error));
    }

    this.logger.debug({ topK, matches: matches.length }, 'Similarity search completed');
    return ok(matches);
  }
}
