import {
  type EmbeddingProvider,
  type LLMProvider,
  type Logger,
  type RuntimeResource,
  type VectorStore
} from '@concierge/core';

export interface SharedResources {
  llm: LLMProvider;
  embeddings: EmbeddingProvider;
  vectors?: VectorStore | undefined;
}

export function collectLifecycleResources(resources: SharedResources): RuntimeResource[] {
  const ordered: Array<RuntimeResource | undefined> = [
    resources.vectors,
    resources.embeddings,
    resources.llm
  ];

  const unique = new Set<RuntimeResource>();
  for (const candidate of ordered) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

/** Closes in reverse start order; a failure is logged and the rest still close. */
export async function closeResources(resources: RuntimeResource[], logger: Logger): Promise<void> {
  for (const resource of [...resources].reverse()) {
    try {
      await resource.close?.();
    } catch (error) {
      logger.warn({ err: error }, 'Failed to close resource');
    }
  }
}
