export * from './router';
export * from './errors';
export * from './sessionCookie';
