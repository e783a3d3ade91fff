export { renderReport, loadTaskTree, STDIN_LABEL } from './pipeline.js';
export type { DocumentSource, LoadResult, RenderResult } from './pipeline.js';
export * from './diagnostics/index.js';
export * from './parser/index.js';
export * from './tree/index.js';
export * from './exporter/index.js';
export * from './model/task-id.js';
export * from './schema/index.js';
