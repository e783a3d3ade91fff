import { describe, it, expect } from 'vitest';
import { exportPlain } from '../../src/exporter/plain.js';
import { loadTaskTree } from '../../src/pipeline.js';

function plain(content: string): string {
  const { tree } = loadTaskTree({ content, file: 'tasks.md', baseDir: '/' });
  if (!tree) throw new Error('document did not load');
  return exportPlain(tree);
}

const DOCUMENT = `Preamble that belongs to no task
---
task 1.10
label Ten
---
ten notes
---
task 1.2
status done
priority none
deadline 2020-01-05
depends 3 1.10 3
---
---
task 3
---
---
task 1
label   Root
priority 2
---
Root notes
without newline`;

describe('exportPlain', () => {
  it('writes declared properties in identifier order', () => {
    expect(plain(DOCUMENT)).toBe(
      '---\ntask 1\nlabel Root\npriority 2\n---\nRoot notes\nwithout newline\n' +
        '---\ntask 1.2\nstatus DONE\npriority none\ndeadline 2020-01-05\ndepends 1.10 3\n---\n' +
        '---\ntask 1.10\nlabel Ten\n---\nten notes\n' +
        '---\ntask 3\n---\n'
    );
  });

  it('is idempotent', () => {
    const once = plain(DOCUMENT);
    expect(plain(once)).toBe(once);
  });

  it('never writes inherited values', () => {
    const output = plain('---\ntask 1\npriority 4\ndeadline 2022-12-01\n---\n---\ntask 1.1\n---\n');
    expect(output).toBe('---\ntask 1\npriority 4\ndeadline 2022-12-01\n---\n---\ntask 1.1\n---\n');
  });

  it('leaves implicit ancestors implicit', () => {
    expect(plain('---\ntask 2.1.1\nlabel Deep\n---\nbody\n')).toBe('---\ntask 2.1.1\nlabel Deep\n---\nbody\n');
  });

  it('normalizes identifiers and status spelling', () => {
    expect(plain('---\ntask 01.02\nstatus in-progress\n---\n')).toBe('---\ntask 1.2\nstatus IN-PROGRESS\n---\n');
  });
});
