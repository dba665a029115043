import nunjucks from 'nunjucks';
import {
  AGENT_DEFAULTS,
  ConfigurationError,
  describeCause,
  err,
  ok,
  withTimeout,
  type AgentFactory,
  type EmbeddingProvider,
  type IdentityToken,
  type LLMProvider,
  type Logger,
  type VectorStore
} from '@concierge/core';

import { SimilaritySearch } from '../search/similaritySearch';
import { createRetrievalTool } from '../tools/retrieval';
import { ToolCallingAgent } from './toolCallingAgent';

export interface AgentFactoryOptions {
  llm: LLMProvider;
  embeddings: EmbeddingProvider;
  /** Opens a vector store connection carrying the identity's credentials. */
  connect: (identity: IdentityToken | null) => VectorStore;
  logger: Logger;
  systemPrompt?: string;
  maxToolIterations?: number;
  llmTimeoutMs?: number;
  toolTimeoutMs?: number;
  connectTimeoutMs?: number;
  retrievalTopK?: number;
}

async function closeQuietly(store: VectorStore, logger: Logger): Promise<void> {
  try {
    await store.close?.();
  } catch (error) {
    logger.warn({ err: error }, 'Failed to close vector store connection');
  }
}

export function createAgentFactory(options: AgentFactoryOptions): AgentFactory {
  const logger = options.logger.child({ component: 'agent_factory' });
  const template = options.systemPrompt ?? AGENT_DEFAULTS.SYSTEM_PROMPT;
  const connectTimeoutMs = options.connectTimeoutMs ?? AGENT_DEFAULTS.CONNECT_TIMEOUT_MS;

  return {
    async create(identity, createOptions = {}) {
      const { signal } = createOptions;
      if (signal?.aborted) {
        return err(new ConfigurationError('Agent creation was cancelled'));
      }

      let store: VectorStore;
      try {
        store = options.connect(identity);
      } catch (error) {
        return err(new ConfigurationError(`Cannot open vector store: ${describeCause(error)}`, { cause: error }));
      }

      try {
        await withTimeout({
          timeoutMs: connectTimeoutMs,
          label: 'Vector store connection',
          signal,
          run: async (connectSignal) => {
            await store.start?.({ signal: connectSignal });
          }
        });
      } catch (error) {
        logger.error({ err: error, provider: identity?.provider ?? null }, 'Vector store unreachable');
        await closeQuietly(store, logger);
        return err(new ConfigurationError(`Vector store unreachable: ${describeCause(error)}`, { cause: error }));
      }

      if (signal?.aborted) {
        await closeQuietly(store, logger);
        return err(new ConfigurationError('Agent creation was cancelled'));
      }

      const search = new SimilaritySearch({
        embeddings: options.embeddings,
        vectors: store,
        logger
      });

      return ok(new ToolCallingAgent({
        llm: options.llm,
        systemPrompt: nunjucks.renderString(template, { identity }),
        tools: [createRetrievalTool(search, options.retrievalTopK)],
        identity,
        connection: store,
        logger,
        maxToolIterations: options.maxToolIterations ?? AGENT_DEFAULTS.MAX_TOOL_ITERATIONS,
        llmTimeoutMs: options.llmTimeoutMs ?? AGENT_DEFAULTS.LLM_TIMEOUT_MS,
        toolTimeoutMs: options.toolTimeoutMs ?? AGENT_DEFAULTS.TOOL_TIMEOUT_MS
      }));
    }
  };
}
