/**
 * Vector codecs for the PostgreSQL binary transfer format.
 */

export * from './types.js';
export * from './byte-packing.js';
export * from './float-base64.js';
export * from './text-format.js';
export * from './dense-vector.js';
export * from './sparse-vector.js';
export * from './registry.js';
