export * from './lifecycle';
export * from './result';
export * from './errors';
export * from './entities/session';
export * from './entities/identity';
export * from './entities/amenity';
export * from './ports';
export * from './contracts/tools';
export * from './contracts/agent';
export * from './config/defaults';
export * from './utils/embedding';
export * from './utils/async';
