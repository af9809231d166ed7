/**
 * Registry exports barrel file.
 */
export * from './schema.js';
export * from './client.js';
