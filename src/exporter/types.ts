import type { ExportOptions } from '../schema/index.js';
import type { ResolvedTaskTree } from '../tree/types.js';

export type Exporter = (tree: ResolvedTaskTree, options: ExportOptions) => string;
