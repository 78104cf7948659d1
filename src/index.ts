/**
 * git-readout - typed interpretation of git command output
 *
 * Main entry point for the library exports.
 */

// Error taxonomy
export * from './errors/index.js';

// Porcelain status decoding
export * from './status/index.js';

// Progress decoding
export * from './progress/index.js';

// Diff selection and partial patches
export * from './diff/index.js';

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Version info
export { VERSION } from './version.js';
