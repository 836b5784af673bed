/**
 * @podlogs/core - Pod discovery and concurrent log streaming
 *
 * Consolidates types, config, the kubectl client, the pod resolver and the
 * log streamer.
 */

export * from './config/index.js';
export * from './kubectl/index.js';
export * from './pods/index.js';
export * from './run.js';
export * from './streaming/index.js';
// Re-export everything from submodules
export * from './types/index.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
