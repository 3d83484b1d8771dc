/**
 * pymodgraph - import graph analysis for Python source trees.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Module names
export * from './core/modules/index.js';

// Import extraction
export * from './core/imports/index.js';

// Graph construction
export * from './core/graph/index.js';

// Queries
export * from './core/query/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
