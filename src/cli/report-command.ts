import fs from 'node:fs';
import { loadConfig, resolveColor } from '../config/loader.js';
import { formatDiagnostic, summarizeDiagnostics } from '../diagnostics/format.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { renderReport, type DocumentSource } from '../pipeline.js';
import { ExporterNameSchema, type ExporterName } from '../schema/index.js';
import { CliUsageError, FileNotFoundError } from './errors.js';
import { extractBooleanFlags, extractFlags, findUnknownFlag } from './flag-utils.js';
import { isOptionPair, parseOptionPairs } from './options.js';
import { redText, supportsAnsiColor, yellowText } from './terminal.js';

export const STDIN_INPUT = '-';

interface ReportArgs {
  input: string;
  exporter: ExporterName;
  options: { summary?: boolean; fold?: boolean };
  color: boolean;
}

export function handleReportCommand(args: string[]): void {
  process.exitCode = runReport(args);
}

/**
 * Renders the report for the given arguments and returns the exit code.
 */
export function runReport(args: string[]): number {
  const reportArgs = parseReportArgs(args);
  const source = readSource(reportArgs.input);
  const result = renderReport(source, reportArgs.exporter, { ...reportArgs.options, color: reportArgs.color });

  printDiagnostics(result.diagnostics);
  if (result.ok) {
    // The report already ends with a newline
    console.log(result.report.replace(/\n$/, ''));
  }
  return result.ok ? 0 : 1;
}

export function parseReportArgs(args: string[]): ReportArgs {
  const valueFlags = extractFlags(args, ['--config', '-c']);
  const boolFlags = extractBooleanFlags(args, ['--color', '--no-color']);

  const unknownFlag = findUnknownFlag(args);
  if (unknownFlag !== undefined) {
    throw new CliUsageError(`Unknown flag '${unknownFlag}'.`);
  }

  const config = loadConfig(valueFlags['--config'] ?? valueFlags['-c']);

  const [input, ...rest] = args;
  if (input === undefined) {
    throw new CliUsageError('Usage: burrito [flags] <input> [exporter] [key=value]...');
  }

  let exporterArg: string | undefined;
  if (rest[0] !== undefined && !isOptionPair(rest[0])) {
    exporterArg = rest.shift();
  }
  const exporterName = exporterArg ?? config.exporter;
  if (exporterName === undefined) {
    throw new CliUsageError('No exporter given and none configured.');
  }
  const exporter = ExporterNameSchema.safeParse(exporterName);
  if (!exporter.success) {
    throw new CliUsageError(`Unknown exporter: ${exporterName}`);
  }

  const cliOptions = parseOptionPairs(rest, exporter.data);
  let color = resolveColor(config.color, supportsAnsiColor);
  if (boolFlags.has('--color')) color = true;
  if (boolFlags.has('--no-color')) color = false;

  return {
    input,
    exporter: exporter.data,
    options: exporter.data === 'plain' ? {} : { ...config.options, ...cliOptions },
    color,
  };
}

export function readSource(input: string): DocumentSource {
  if (input === STDIN_INPUT) {
    return { content: fs.readFileSync(0, 'utf-8') };
  }
  if (!fs.existsSync(input)) {
    throw new FileNotFoundError(input);
  }
  return { content: fs.readFileSync(input, 'utf-8'), file: input };
}

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const line = formatDiagnostic(diagnostic);
    console.error(diagnostic.severity === 'error' ? redText(line) : yellowText(line));
  }

  const { errors, warnings } = summarizeDiagnostics(diagnostics);
  if (errors > 0) {
    const parts = [`${errors} error${errors === 1 ? '' : 's'}`];
    if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
    console.error(`Found ${parts.join(', ')}; no report written.`);
  }
}
