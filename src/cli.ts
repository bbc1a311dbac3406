#!/usr/bin/env node
import minimist from 'minimist';

import { formatBucketParams } from './quota/format';
import { parseQuota } from './quota/quotaParser';
import { QuotaParseError } from './quotaParseError';

const USAGE = `Usage: quota-phrase [--json] "<quota string>"

Examples:
  quota-phrase 20 messages per week
  quota-phrase "1 message every 3 hours"
  quota-phrase --json unlimited`;

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

/**
 * Run the command line against the given arguments (without the node and script paths).
 * @returns the process exit status
 */
export function runCli(argv: string[], output: CliOutput = console): number {
  const args = minimist(argv, {
    boolean: ['help', 'json'],
    string: ['_'],
    alias: { h: 'help' }
  });

  if (args.help) {
    output.log(USAGE);
    return 0;
  }

  const expression = args._.join(' ');
  if (!expression.trim()) {
    output.log(USAGE);
    return 1;
  }

  try {
    const params = parseQuota(expression);
    if (args.json) {
      output.log(JSON.stringify({ capacity: params.capacity, rate_per_sec: params.ratePerSec }));
    } else {
      output.log(formatBucketParams(params));
    }
  } catch (err) {
    if (err instanceof QuotaParseError) {
      output.error(`[quota-phrase] ${err.message}`);
      return 1;
    }
    throw err;
  }
  return 0;
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
