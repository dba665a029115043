import { z } from 'zod';
import { AGENT_DEFAULTS, defineTool, withoutEmbedding, type Tool } from '@concierge/core';

import { type SimilaritySearch } from '../search/similaritySearch';

const MAX_TOP_K = 10;

const RetrievalParameters = z.object({
  query: z.string().describe('What the traveller is looking for, e.g. "coffee near gate B"'),
  top_k: z.number().int().nullable().describe('How many results to return; null for the default')
});

/**
 * The agent's only tool: a similarity search over the amenity knowledge base.
 * Results are serialised as JSON for the model to read.
 */
export function createRetrievalTool(
  search: SimilaritySearch,
  defaultTopK: number = AGENT_DEFAULTS.RETRIEVAL_TOP_K
): Tool<typeof RetrievalParameters> {
  return defineTool({
    name: 'search_amenities',
    description: 'Search airport amenities (restaurants, shops, lounges, services) by semantic similarity to a description.',
    parameters: RetrievalParameters,
    handler: async (params, context) => {
      const topK = Math.min(Math.max(params.top_k ?? defaultTopK, 1), MAX_TOP_K);
      const result = await search.search(params.query, topK, { signal: context.signal });
      if (!result.ok) {
        return `Search failed: ${result.error.message}`;
      }
      if (result.value.length === 0) {
        return 'No matching amenities found.';
      }

      return JSON.stringify(result.value.map((match) => ({
        similarity: Math.round(match.similarity * 1000) / 1000,
        ...withoutEmbedding(match.record)
      })));
    }
  });
}
