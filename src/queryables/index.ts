// src/queryables/index.ts
export * from './schema.ts';
export * from './conditions.ts';
