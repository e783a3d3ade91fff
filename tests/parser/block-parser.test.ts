import { describe, it, expect } from 'vitest';
import { parseBlocks, splitBlocks } from '../../src/parser/block-parser.js';
import { TaskSyntaxError } from '../../src/diagnostics/errors.js';
import type { TaskRecord } from '../../src/parser/types.js';

function taskRecords(content: string): TaskRecord[] {
  return parseBlocks(content, 'tasks.md').records.filter((record): record is TaskRecord => record.kind === 'task');
}

describe('splitBlocks', () => {
  it('keeps notes byte-for-byte', () => {
    const content = `---
task 1
---
First line

Second line
---
task 2
---
`;
    const blocks = splitBlocks(content, 'tasks.md');

    expect(blocks).toHaveLength(2);
    expect(blocks[0]?.startLine).toBe(1);
    expect(blocks[0]?.notes).toBe('First line\n\nSecond line\n');
    expect(blocks[1]?.startLine).toBe(7);
    expect(blocks[1]?.notes).toBe('');
  });

  it('keeps a final line without newline', () => {
    const blocks = splitBlocks('---\ntask 1\n---\nno newline', 'tasks.md');
    expect(blocks[0]?.notes).toBe('no newline');
  });

  it('throws on unterminated front matter', () => {
    expect(() => splitBlocks('---\ntask 1\nlabel Never closed\n', 'tasks.md')).toThrow(TaskSyntaxError);
    expect(() => splitBlocks('---\ntask 1\n', 'tasks.md')).toThrow("tasks.md:1: Unterminated front matter: no closing '---' line");
  });
});

describe('parseBlocks', () => {
  it('parses every task property', () => {
    const [record] = taskRecords(`---
task 1.2
label  Write the report
status in-progress
priority 2
deadline 2020-02-01
depends 1.1 3
depends 1.1
---
Notes
`);

    expect(record).toMatchObject({
      kind: 'task',
      id: [1, 2],
      label: 'Write the report',
      status: 'IN-PROGRESS',
      priority: 2,
      deadline: '2020-02-01',
      depends: [[1, 1], [3]],
      notes: 'Notes\n',
      position: { file: 'tasks.md', line: 1 },
    });
  });

  it('keeps the none sentinel', () => {
    const [record] = taskRecords('---\ntask 1\npriority none\ndeadline none\n---\n');
    expect(record?.priority).toBe('none');
    expect(record?.deadline).toBe('none');
  });

  it('accepts the none sentinel only in lowercase', () => {
    const { records, diagnostics } = parseBlocks('---\ntask 1\npriority NONE\ndeadline None\n---\n', 'tasks.md');

    expect(records[0]).toMatchObject({ kind: 'task', priority: undefined, deadline: undefined });
    expect(diagnostics.map((d) => [d.code, d.line, d.message])).toEqual([
      ['InvalidValueError', 3, "Priority value 'NONE' must be an integer"],
      ['InvalidValueError', 4, "Deadline value 'None' not in format YYYY-MM-DD"],
    ]);
  });

  it('leaves undeclared properties unset', () => {
    const [record] = taskRecords('---\ntask 3\n---\n');
    expect(record?.label).toBeUndefined();
    expect(record?.status).toBeUndefined();
    expect(record?.priority).toBeUndefined();
    expect(record?.deadline).toBeUndefined();
    expect(record?.depends).toEqual([]);
  });

  it('classifies include-only blocks', () => {
    const { records, diagnostics } = parseBlocks('---\ninclude a.md\ninclude sub/b.md\n---\n', 'tasks.md');

    expect(diagnostics).toEqual([]);
    expect(records).toEqual([{ kind: 'include', paths: ['a.md', 'sub/b.md'], position: { file: 'tasks.md', line: 1 } }]);
  });

  it('reports invalid values and drops the property', () => {
    const { records, diagnostics } = parseBlocks(
      `---
task 1
status WAITING
priority 6
deadline 2020-02-30
---
`,
      'tasks.md'
    );

    expect(records).toHaveLength(1);
    expect(diagnostics.map((d) => [d.code, d.line, d.message])).toEqual([
      ['InvalidValueError', 3, "Invalid status value 'WAITING' (expected one of DONE, IN-PROGRESS, BLOCKED, TODO)"],
      ['InvalidValueError', 4, "Priority value '6' not in range 1..5"],
      ['InvalidValueError', 5, "Deadline value '2020-02-30' not in format YYYY-MM-DD"],
    ]);
  });

  it('reports unknown keys and malformed identifiers', () => {
    const { records, diagnostics } = parseBlocks(
      `---
task 1.x
owner sam
---
---
task 2
depends 1 two
---
`,
      'tasks.md'
    );

    expect(records).toHaveLength(1);
    expect(diagnostics.map((d) => [d.code, d.line])).toEqual([
      ['InvalidIdentifierError', 2],
      ['UnknownPropertyError', 3],
      ['InvalidIdentifierError', 7],
    ]);
    expect(diagnostics[1]?.message).toBe("Unknown task property 'owner'");
    expect(diagnostics[2]?.message).toBe("Issue with task ID two: Task ID part 'two' must be an integer");
  });

  it('requires a task key', () => {
    const { records, diagnostics } = parseBlocks('---\nlabel Orphan\n---\n', 'tasks.md');

    expect(records).toEqual([]);
    expect(diagnostics).toEqual([
      {
        severity: 'error',
        code: 'SyntaxError',
        message: "Task block must have a 'task' property",
        file: 'tasks.md',
        line: 1,
        taskId: undefined,
      },
    ]);
  });

  it('rejects include mixed with task keys', () => {
    const { diagnostics } = parseBlocks('---\ntask 1\ninclude other.md\n---\n', 'tasks.md');
    expect(diagnostics[0]?.code).toBe('UnknownPropertyError');
    expect(diagnostics[0]?.message).toBe("Property 'include' cannot be combined with task properties");
  });

  it('rejects repeated scalar keys but accumulates depends', () => {
    const { records, diagnostics } = parseBlocks('---\ntask 1\nlabel A\nlabel B\n---\n', 'tasks.md');
    expect(records[0]).toMatchObject({ kind: 'task', label: 'A' });
    expect(diagnostics.map((d) => d.message)).toEqual(["Duplicate property 'label' not allowed in task block"]);
  });

  it('warns about stray content and blank front matter lines', () => {
    const { diagnostics } = parseBlocks('Intro text\n---\ntask 1\n\n---\n', 'tasks.md');
    expect(diagnostics.map((d) => [d.severity, d.line, d.message])).toEqual([
      ['warning', 1, 'Ignoring content that does not belong to a task'],
      ['warning', 4, 'Blank lines are not recommended within task blocks'],
    ]);
  });
});
