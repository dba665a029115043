export * from './config';
export * from './createConcierge';
