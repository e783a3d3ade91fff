import { BooleanOptionSchema, type ExporterName } from '../schema/index.js';
import { CliUsageError } from './errors.js';

export const OPTION_KEYS = ['summary', 'fold'] as const;
export type OptionKey = (typeof OPTION_KEYS)[number];

export type CliExportOptions = Partial<Record<OptionKey, boolean>>;

function isOptionKey(key: string): key is OptionKey {
  return OPTION_KEYS.some((candidate) => candidate === key);
}

export function isOptionPair(arg: string): boolean {
  return arg.includes('=');
}

/**
 * Parses `key=value` exporter options. Booleans take 1/0, true/false or
 * yes/no.
 */
export function parseOptionPairs(pairs: readonly string[], exporter: ExporterName): CliExportOptions {
  const options: CliExportOptions = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      throw new CliUsageError(`Invalid option '${pair}', not in KEY=VALUE format`);
    }

    const key = pair.slice(0, separator);
    const value = pair.slice(separator + 1);

    if (exporter === 'plain') {
      throw new CliUsageError(`The plain exporter takes no options (got '${key}')`);
    }
    if (!isOptionKey(key)) {
      throw new CliUsageError(`Unknown option '${key}' (expected one of: ${OPTION_KEYS.join(', ')})`);
    }

    const parsed = BooleanOptionSchema.safeParse(value.toLowerCase());
    if (!parsed.success) {
      throw new CliUsageError(`Invalid value '${value}' for ${key} option (expected 1 or 0)`);
    }
    options[key] = parsed.data;
  }

  return options;
}
