import { paint } from '../utils/ansi.js';

export const supportsAnsiColor =
  Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== 'dumb';

export const supportsAnsiColorOnStderr =
  Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== 'dumb';

export function boldText(text: string): string {
  return paint('bold', text, supportsAnsiColorOnStderr);
}

export function dimText(text: string): string {
  return paint('dim', text, supportsAnsiColorOnStderr);
}

export function redText(text: string): string {
  return paint('red', text, supportsAnsiColorOnStderr);
}

export function yellowText(text: string): string {
  return paint('yellow', text, supportsAnsiColorOnStderr);
}
