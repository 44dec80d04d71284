/**
 * @deckwright/core
 * Slide discovery, ordering, path rewriting and assembly
 */

// Types
export * from './types/index.js';

// Errors
export * from './error/deck-error.js';

// Logging
export * from './logging/logger.js';

// Utils
export * from './utils/paths.js';

// Pipeline
export * from './ordering/order-key.js';
export * from './discovery/discover.js';
export * from './discovery/resolve.js';
export * from './rewrite/link-scanner.js';
export * from './rewrite/path-rewriter.js';
export * from './assembly/assembler.js';
export * from './template/inject.js';
