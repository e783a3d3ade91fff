import { describe, it, expect } from 'vitest';
import { parseOptionPairs } from '../../src/cli/options.js';
import { CliUsageError } from '../../src/cli/errors.js';

describe('parseOptionPairs', () => {
  it('parses boolean options', () => {
    expect(parseOptionPairs(['summary=0', 'fold=1'], 'simple')).toEqual({ summary: false, fold: true });
    expect(parseOptionPairs(['fold=TRUE'], 'full')).toEqual({ fold: true });
    expect(parseOptionPairs(['summary=no'], 'calendar')).toEqual({ summary: false });
  });

  it('lets later pairs win', () => {
    expect(parseOptionPairs(['fold=1', 'fold=0'], 'simple')).toEqual({ fold: false });
  });

  it('rejects malformed pairs', () => {
    expect(() => parseOptionPairs(['fold'], 'simple')).toThrow(CliUsageError);
    expect(() => parseOptionPairs(['fold'], 'simple')).toThrow("Invalid option 'fold', not in KEY=VALUE format");
  });

  it('rejects unknown keys and values', () => {
    expect(() => parseOptionPairs(['depth=2'], 'simple')).toThrow("Unknown option 'depth' (expected one of: summary, fold)");
    expect(() => parseOptionPairs(['fold=maybe'], 'simple')).toThrow(
      "Invalid value 'maybe' for fold option (expected 1 or 0)"
    );
  });

  it('rejects options for the plain exporter', () => {
    expect(() => parseOptionPairs(['summary=1'], 'plain')).toThrow("The plain exporter takes no options (got 'summary')");
  });
});
