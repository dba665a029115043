export * from './logger';
export * from './llm';
export * from './embeddings';
export * from './vectors';
export * from './identity';
