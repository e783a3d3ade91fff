import { describe, it, expect } from 'vitest';
import { exportSimple, renderTableOfContents } from '../../src/exporter/simple.js';
import { renderSummary } from '../../src/exporter/summary.js';
import { formatStatus } from '../../src/exporter/format.js';
import { loadTaskTree } from '../../src/pipeline.js';
import { ExportOptionsSchema, type ExportOptionsInput } from '../../src/schema/index.js';
import type { ResolvedTaskTree } from '../../src/tree/types.js';

function load(content: string): ResolvedTaskTree {
  const { tree } = loadTaskTree({ content, file: 'tasks.md', baseDir: '/' });
  if (!tree) throw new Error('document did not load');
  return tree;
}

function options(input: ExportOptionsInput = {}) {
  return ExportOptionsSchema.parse(input);
}

const PROJECT = `---
task 1
label Launch
priority 2
deadline 2020-03-01
---
---
task 1.1
label Draft
status done
---
---
task 1.2
label Review
status blocked
depends 1.1 2
---
---
task 1.10
label Publish
status in-progress
---
---
task 2
label Budget
deadline none
depends 1.1
---
`;

const FOLDING = `---
task 1
---
---
task 1.1
status done
---
---
task 1.2
status done
---
---
task 2
---
---
task 2.1
status done
---
---
task 2.2
status in-progress
---
---
task 2.2.1
status done
---
---
task 3
---
---
task 3.1
status done
---
---
task 3.1.1
---
`;

describe('renderTableOfContents', () => {
  it('lists tasks depth first with status and short summary', () => {
    expect(renderTableOfContents(load(PROJECT), options())).toEqual([
      'Table of Contents',
      '1 Launch: [ ] TODO by 2020-03-01 (priority 2)',
      '  1.1 Draft: [x] DONE',
      '  1.2 Review: [!] BLOCKED on 2 (priority 2)',
      '  1.10 Publish: [~] IN-PROGRESS due by 2020-03-01 (priority 2)',
      '2 Budget: [ ] TODO (1/1 dependencies done)',
    ]);
  });

  it('shows every task without fold', () => {
    expect(renderTableOfContents(load(FOLDING), options())).toHaveLength(11);
  });

  it('folds only where every direct child is done', () => {
    expect(renderTableOfContents(load(FOLDING), options({ fold: true }))).toEqual([
      'Table of Contents',
      '1: [ ] TODO',
      '2: [ ] TODO',
      '  2.1: [x] DONE',
      '  2.2: [~] IN-PROGRESS',
      '3: [ ] TODO',
    ]);
  });
});

describe('renderSummary', () => {
  it('lists resolved properties, subtasks and notes', () => {
    const tree = load(`---
task 1
label Launch
priority 2
---

Kick-off notes
  indented

---
task 1.1
depends 2
---
---
task 2
---
`);

    expect(renderSummary(tree, false)).toEqual([
      'Task Summary',
      '',
      '1 Launch',
      '  Status: [ ] TODO',
      '  Priority: 2',
      '  Deadline: Unassigned',
      '  Depends on: None',
      '  Subtasks: 1.1',
      '  Notes:',
      '    Kick-off notes',
      '      indented',
      '',
      '1.1',
      '  Status: [ ] TODO',
      '  Priority: 2',
      '  Deadline: Unassigned',
      '  Depends on: 2',
      '',
      '2',
      '  Status: [ ] TODO',
      '  Priority: Unassigned',
      '  Deadline: Unassigned',
      '  Depends on: None',
    ]);
  });
});

describe('exportSimple', () => {
  const document = '---\ntask 1\nlabel Only\nstatus done\n---\n';

  it('appends the summary by default', () => {
    expect(exportSimple(load(document), options())).toBe(
      [
        'Table of Contents',
        '1 Only: [x] DONE',
        '',
        'Task Summary',
        '',
        '1 Only',
        '  Status: [x] DONE',
        '  Priority: Unassigned',
        '  Deadline: Unassigned',
        '  Depends on: None',
        '',
      ].join('\n')
    );
  });

  it('omits the summary when disabled', () => {
    expect(exportSimple(load(document), options({ summary: false }))).toBe('Table of Contents\n1 Only: [x] DONE\n');
  });
});

describe('formatStatus', () => {
  it('colors the marker when asked', () => {
    expect(formatStatus('DONE', true)).toBe('\u001b[32m[x] DONE\u001b[39m');
    expect(formatStatus('TODO', false)).toBe('[ ] TODO');
  });
});
