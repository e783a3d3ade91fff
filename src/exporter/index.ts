import type { ExporterName } from '../schema/index.js';
import { exportCalendar } from './calendar.js';
import { exportFull } from './full.js';
import { exportPlain } from './plain.js';
import { exportSimple } from './simple.js';
import type { Exporter } from './types.js';

export const EXPORTERS: Record<ExporterName, Exporter> = {
  calendar: exportCalendar,
  simple: exportSimple,
  full: exportFull,
  plain: (tree) => exportPlain(tree),
};

export type { Exporter } from './types.js';
export { exportCalendar, buildCalendarView, renderCalendar } from './calendar.js';
export { exportSimple, renderTableOfContents, formatShortLine } from './simple.js';
export { exportFull } from './full.js';
export { exportPlain, serializeRecord } from './plain.js';
export { renderSummary } from './summary.js';
