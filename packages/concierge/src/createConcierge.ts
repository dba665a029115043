import express, { type Express } from 'express';
import {
  type EmbeddingProvider,
  type IdentityToken,
  type IdentityVerifier,
  type LLMProvider,
  type Logger,
  type VectorStore
} from '@concierge/core';
import {
  HttpVectorStore,
  InMemoryVectorStore,
  OpenAIEmbeddingProvider,
  OpenAILLMProvider,
  PassthroughIdentityVerifier,
  PinoLogger,
  embedMissing,
  loadAmenityDataset
} from '@concierge/adapters';
import {
  ChatPipeline,
  SessionRegistry,
  SimilaritySearch,
  closeResources,
  collectLifecycleResources,
  createAgentFactory,
  startResources
} from '@concierge/runtime';
import { createConciergeApi } from '@concierge/api';

import { type ConciergeConfig } from './config';

export interface ConciergeProviders {
  llm?        : LLMProvider;
  embeddings? : EmbeddingProvider;
  /** Local knowledge base; seeded from the amenity dataset on start. */
  vectors?    : InMemoryVectorStore;
  identity?   : IdentityVerifier;
  logger?     : Logger;
  /** Opens the per-agent vector store connection. */
  connect?    : (identity: IdentityToken | null) => VectorStore;
}

export interface Concierge {
  app      : Express;
  registry : SessionRegistry;
  pipeline : ChatPipeline;
  logger   : Logger;
  start(): Promise<void>;
  close(): Promise<void>;
}

/** Read-only view of the shared store; agents must not close it. */
function borrow(store: VectorStore): VectorStore {
  return {
    semanticSimilaritySearch: (query, options) => store.semanticSimilaritySearch(query, options)
  };
}

export function createConcierge(config: ConciergeConfig, providers: ConciergeProviders = {}): Concierge {
  const logger = providers.logger ?? new PinoLogger({
    level: config.logging.level,
    prettyPrint: config.logging.pretty,
    name: 'concierge'
  });

  const llm = providers.llm ?? new OpenAILLMProvider({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model
  });
  const embeddings = providers.embeddings ?? new OpenAIEmbeddingProvider({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.embeddingModel
  });
  const vectors = providers.vectors ?? new InMemoryVectorStore();
  const identity = providers.identity ?? new PassthroughIdentityVerifier(config.identityProviders);

  const remoteUrl = config.knowledgeServiceUrl;
  const connect = providers.connect ?? (remoteUrl
    ? (owner: IdentityToken | null) => new HttpVectorStore({ baseUrl: remoteUrl, identity: owner })
    : () => borrow(vectors));

  const factory = createAgentFactory({
    llm,
    embeddings,
    connect,
    logger,
    maxToolIterations: config.agent.maxToolIterations,
    llmTimeoutMs: config.agent.llmTimeoutMs,
    toolTimeoutMs: config.agent.toolTimeoutMs,
    connectTimeoutMs: config.agent.connectTimeoutMs
  });
  const registry = new SessionRegistry({ factory, logger });
  const pipeline = new ChatPipeline({ registry, logger });
  const search = new SimilaritySearch({ embeddings, vectors, logger });

  const app = express();
  app.disable('x-powered-by');
  app.use('/', createConciergeApi({
    registry,
    pipeline,
    search,
    vectors,
    identity,
    logger,
    sessionSecret: config.sessionSecret,
    clientId: config.clientId,
    secureCookies: config.secureCookies
  }));

  const resources = collectLifecycleResources({ llm, embeddings, vectors });
  let started = false;

  return {
    app,
    registry,
    pipeline,
    logger,

    async start(): Promise<void> {
      if (started) return;
      await startResources(resources);

      const records = await loadAmenityDataset(config.amenityDataset);
      vectors.upsert(await embedMissing(records, embeddings));
      started = true;

      logger.info({
        amenities: vectors.size,
        knowledgeService: remoteUrl ?? 'local'
      }, 'Concierge started');
    },

    async close(): Promise<void> {
      await registry.disposeAll({ timeoutMs: config.shutdownGraceMs });
      await closeResources(resources, logger);
      started = false;
      logger.info('Concierge stopped');
    }
  };
}
