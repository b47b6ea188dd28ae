/**
 * Shared Types
 * Source locations, tokens and the error taxonomy
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
