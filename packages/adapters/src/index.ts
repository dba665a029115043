export * from './logger/pino';
export * from './logger/fake';
export * from './openai/llm';
export * from './openai/embeddings';
export * from './llm/fake';
export * from './embeddings/fake';
export * from './vectors/memory';
export * from './vectors/http';
export * from './vectors/dataset';
export * from './identity/passthrough';
