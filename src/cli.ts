#!/usr/bin/env node
import { printVersion } from './cli/help.js';
import { handleReviewCommand, printReviewHelp } from './cli/review-command.js';
import { formatCliError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const flags = extractBooleanFlags(args, ['--help', '-h', '--version', '-v']);
  if (flags.has('--help') || flags.has('-h')) {
    printReviewHelp();
    return;
  }
  if (flags.has('--version') || flags.has('-v')) {
    printVersion(VERSION);
    return;
  }

  try {
    await handleReviewCommand(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(formatCliError(error));
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
