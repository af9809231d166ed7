/**
 * lic - create LICENSE files from registry templates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Registry
export * from './core/registry/index.js';
export * from './core/types.js';

// Rendering and output
export * from './core/render/placeholders.js';
export * from './core/output/license-file.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export type { Prompter, TextPromptOptions } from './cli/prompts.js';
