import type { ExportOptions } from '../schema/index.js';
import type { ResolvedTaskTree } from '../tree/types.js';
import { renderCalendar } from './calendar.js';
import { joinLines } from './format.js';
import { renderTableOfContents } from './simple.js';
import { renderSummary } from './summary.js';

/**
 * Table of contents, then the calendar, then a single summary listing.
 */
export function exportFull(tree: ResolvedTaskTree, options: ExportOptions): string {
  const lines = [...renderTableOfContents(tree, options), '', ...renderCalendar(tree, options)];
  if (options.summary) {
    lines.push('', ...renderSummary(tree, options.color));
  }
  return joinLines(lines);
}
