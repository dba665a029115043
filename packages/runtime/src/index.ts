export * from './tools/dispatch';
export * from './tools/retrieval';
export * from './search/similaritySearch';
export * from './agent/toolCallingAgent';
export * from './agent/factory';
export * from './session/chatSession';
export * from './session/registry';
export * from './chat/formatReply';
export * from './chat/pipeline';
export * from './resources/lifecycle';
