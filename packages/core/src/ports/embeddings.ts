import { type CallOptions, type RuntimeResource } from '../lifecycle';

export interface EmbeddingProvider extends RuntimeResource {
  /** Fixed-length vector for a search query. */
  embedQuery(text: string, options?: CallOptions): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}
