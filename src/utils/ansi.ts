export type AnsiColor = 'red' | 'green' | 'yellow' | 'magenta' | 'cyan' | 'bold' | 'dim';

const ANSI_CODES: Record<AnsiColor, [number, number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  magenta: [35, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function paint(color: AnsiColor, text: string, enabled = true): string {
  if (!enabled) return text;
  const [open, close] = ANSI_CODES[color];
  return `\u001b[${open}m${text}\u001b[${close}m`;
}
