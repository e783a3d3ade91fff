#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleReportCommand } from './cli/report-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(1);
    return;
  }

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  if (helpFlags.size > 0) {
    printHelp();
    return;
  }
  const versionFlags = extractBooleanFlags(args, ['--version', '-v']);
  if (versionFlags.size > 0) {
    printVersion(VERSION);
    return;
  }

  try {
    handleReportCommand(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main();
