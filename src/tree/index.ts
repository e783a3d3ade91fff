export * from './types.js';
export * from './tree-builder.js';
export * from './property-resolver.js';
export * from './reference-validator.js';
export * from './traversal.js';
