import { describe, expect, it, vi } from 'vitest';
import { InvalidInputError, UpstreamError } from '@concierge/core';
import {
  FakeEmbeddingProvider,
  FakeLogger,
  InMemoryVectorStore,
  createTestAmenities
} from '@concierge/testing';
import { SimilaritySearch } from '../src/index';

function createSearch() {
  const embeddings = new FakeEmbeddingProvider({
    fixed: {
      coffee: [1, 0],
      'lounge coffee': [0.6, 0.8]
    }
  });
  const vectors = new InMemoryVectorStore(createTestAmenities());
  const search = new SimilaritySearch({ embeddings, vectors, logger: new FakeLogger() });
  return { embeddings, vectors, search };
}

describe('SimilaritySearch', () => {
  it('returns matches above the threshold, best first', async () => {
    const { search } = createSearch();

    const result = await search.search('coffee', 5);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((match) => match.record.id)).toEqual([1, 2]);
    expect(result.value[0]?.similarity).toBeCloseTo(1);
    expect(result.value[1]?.similarity).toBeCloseTo(0.8);
  });

  it('drops records below 0.7 similarity', async () => {
    const { search } = createSearch();

    const result = await search.search('lounge coffee', 5);

    expect(result.ok && result.value.map((match) => match.record.id)).toEqual([2, 3]);
  });

  it('sends the fixed threshold and the requested limit to the store', async () => {
    const { search, vectors } = createSearch();
    const spy = vi.spyOn(vectors, 'semanticSimilaritySearch');

    const result = await search.search('  coffee ', 1);

    expect(spy).toHaveBeenCalledWith({ embedding: [1, 0], threshold: 0.7, limit: 1 }, {});
    expect(result.ok && result.value.map((match) => match.record.id)).toEqual([1]);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects top_k %s without calling upstream', async (topK) => {
    const { embeddings, search, vectors } = createSearch();
    const spy = vi.spyOn(vectors, 'semanticSimilaritySearch');

    const result = await search.search('coffee', topK);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidInputError);
    expect(result.error.message).toBe('top_k must be a positive integer');
    expect(embeddings.queries).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });

  it('rejects a blank query', async () => {
    const { embeddings, search } = createSearch();

    const result = await search.search('   ', 3);

    expect(!result.ok && result.error).toBeInstanceOf(InvalidInputError);
    expect(!result.ok && result.error.message).toBe('query must not be empty');
    expect(embeddings.queries).toEqual([]);
  });

  it('reports embedding failures as upstream errors', async () => {
    const { embeddings, search } = createSearch();
    vi.spyOn(embeddings, 'embedQuery').mockRejectedValue(new Error('quota exceeded'));

    const result = await search.search('coffee', 3);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UpstreamError);
    expect(result.error.message).toBe('Query embedding failed: quota exceeded');
  });

  it('reports vector store failures as upstream errors', async () => {
    const { search, vectors } = createSearch();
    vi.spyOn(vectors, 'semanticSimilaritySearch').mockRejectedValue(new Error('connection reset'));

    const result = await search.search('coffee', 3);

    expect(!result.ok && result.error.message).toBe('Vector search failed: connection reset');
  });
});
