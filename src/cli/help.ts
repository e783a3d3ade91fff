import { boldText, dimText, supportsAnsiColorOnStderr } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColorOnStderr
    ? `${boldText('burrito')} ${dimText('— task file reports')}`
    : 'burrito — task file reports';

  const lines = [
    title,
    '',
    'Usage: burrito [flags] <input> [exporter] [key=value]...',
    '',
    formatSection('Arguments', [
      ['<input>', 'Path to a task file, or - for standard input'],
      ['[exporter]', 'One of: calendar, simple, full, plain (default from config)'],
      ['key=value', 'Exporter option; booleans take 1 or 0'],
    ]),
    '',
    formatSection('Exporters', [
      ['calendar', 'Open tasks grouped by deadline'],
      ['simple', 'Table of contents'],
      ['full', 'Table of contents followed by the calendar'],
      ['plain', 'Canonical task file (takes no options)'],
    ]),
    '',
    formatSection('Options', [
      ['summary=1|0', 'Append every task with its properties and notes (default 1)'],
      ['fold=1|0', "Hide a task's subtree in the table of contents when all its direct children are DONE (default 0)"],
    ]),
    '',
    formatSection('Flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--color', 'Always color the report'],
      ['--no-color', 'Never color the report'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .burrito.json (walks up from cwd)'],
      ['Global config', '~/.config/task-burrito/config.json'],
      ['Key fields', 'exporter, options.summary, options.fold, color (auto|always|never)'],
    ]),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = boldText(title);
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${boldText(name.padEnd(maxLen))}  ${dimText(desc)}`);
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
