/**
 * iesna: IESNA LM-63 photometric file toolkit
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Data model
export * from './photometry/index.js';

// Errors
export * from './errors/index.js';

// Byte collaborators
export * from './io/index.js';

// Parser, serializer, rescale transform
export * from './parser/index.js';
export * from './serializer/index.js';
export * from './transform/index.js';

// File pipeline
export * from './pipeline/index.js';

// Config
export * from './config/index.js';

// CLI
export * from './cli/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
