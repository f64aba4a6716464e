export * from './logger/index.js';
export * from './env.js';

export * as VectorStorage from './vector_storage/index.js';
