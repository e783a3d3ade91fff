export * from './types.js';
export * from './block-parser.js';
export * from './include-expander.js';
export { TASK_PROPERTIES, INCLUDE_PROPERTY } from './properties.js';
