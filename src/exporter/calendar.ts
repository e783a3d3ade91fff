import type { ExportOptions } from '../schema/index.js';
import type { ResolvedTaskNode, ResolvedTaskTree } from '../tree/types.js';
import { depthFirst } from '../tree/traversal.js';
import { formatMonth, monthKey, weekdayName } from '../utils/date.js';
import { formatStatus, formatTitle, joinLines } from './format.js';
import { renderSummary } from './summary.js';

export interface CalendarDay {
  date: string;
  tasks: ResolvedTaskNode[];
}

export interface CalendarMonth {
  month: string;
  days: CalendarDay[];
}

export interface CalendarView {
  months: CalendarMonth[];
  undated: ResolvedTaskNode[];
}

/**
 * Groups every task that is not DONE by month and day of its effective
 * deadline. Tasks sharing a date stay in identifier order.
 */
export function buildCalendarView(tree: ResolvedTaskTree): CalendarView {
  const active = depthFirst(tree).filter((node) => node.status !== 'DONE');
  const dated = active
    .filter((node) => node.effectiveDeadline !== null)
    .sort((a, b) => (a.effectiveDeadline ?? '').localeCompare(b.effectiveDeadline ?? ''));

  const months: CalendarMonth[] = [];
  for (const node of dated) {
    const date = node.effectiveDeadline ?? '';
    let month = months[months.length - 1];
    if (!month || month.month !== monthKey(date)) {
      month = { month: monthKey(date), days: [] };
      months.push(month);
    }
    let day = month.days[month.days.length - 1];
    if (!day || day.date !== date) {
      day = { date, tasks: [] };
      month.days.push(day);
    }
    day.tasks.push(node);
  }

  return {
    months,
    undated: active.filter((node) => node.effectiveDeadline === null),
  };
}

export function renderCalendar(tree: ResolvedTaskTree, options: ExportOptions): string[] {
  const { months, undated } = buildCalendarView(tree);
  const entry = (node: ResolvedTaskNode): string => `${formatTitle(node)}: ${formatStatus(node.status, options.color)}`;
  const lines: string[] = ['Calendar'];

  if (months.length === 0) {
    lines.push('', 'No active tasks have a deadline');
  }

  for (const month of months) {
    lines.push('', formatMonth(`${month.month}-01`));
    for (const day of month.days) {
      lines.push(`  ${day.date} ${weekdayName(day.date)}`);
      for (const node of day.tasks) {
        lines.push(`    ${entry(node)}`);
      }
    }
  }

  if (undated.length > 0) {
    lines.push('', 'No deadline');
    for (const node of undated) {
      lines.push(`  ${entry(node)}`);
    }
  }

  return lines;
}

export function exportCalendar(tree: ResolvedTaskTree, options: ExportOptions): string {
  const lines = renderCalendar(tree, options);
  if (options.summary) {
    lines.push('', ...renderSummary(tree, options.color));
  }
  return joinLines(lines);
}
