export * from './types.js';
export * from './schema/config.schema.js';
