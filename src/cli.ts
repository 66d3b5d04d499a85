#!/usr/bin/env node
/**
 * CLI entry point for mockable.
 *   mockable list <recording.json>
 *   mockable compare [--ignore-headers <name|all> ...] [--ignore-body] <a.json> <b.json>
 */

import { compareRecordings, reportComparison } from './cli/compare';
import { formatTransactions } from './cli/list';
import { retrieve } from './store/recording-file';
import type { IgnoreHeaders } from './types/schema';

const args = process.argv.slice(2);
const command = args[0];
const HELP_COMMANDS = new Set(['help', '--help', '-h']);
const VERSION_COMMANDS = new Set(['version', '--version', '-v']);

function usage(): void {
  console.error('Usage: mockable list <recording.json>');
  console.error('       mockable compare [--ignore-headers <name|all> ...] [--ignore-body] <a.json> <b.json>');
  console.error('       mockable --help');
  console.error('       mockable --version');
  console.error('  list: prints one line per recorded transaction, in playback order.');
  console.error('  compare: checks two recordings hold the same requests and responses, in the same order.');
}

function printVersion(): void {
  // dist/cli.js -> ../package.json, src/cli.ts -> ../package.json
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const pkg = require('../package.json') as { version?: string };
  process.stdout.write(`mockable ${pkg.version ?? '0.0.0'}\n`);
}

function runList(file: string | undefined): number {
  if (!file) {
    usage();
    return 1;
  }
  for (const line of formatTransactions(retrieve(file))) process.stdout.write(line + '\n');
  return 0;
}

function runCompare(compareArgs: string[]): number {
  const ignored: string[] = [];
  let ignoreBody = false;
  const positional: string[] = [];
  for (let i = 0; i < compareArgs.length; i++) {
    const token = compareArgs[i];
    if (token === '--ignore-headers' && compareArgs[i + 1]) {
      ignored.push(compareArgs[++i]);
    } else if (token === '--ignore-body') {
      ignoreBody = true;
    } else if (token.startsWith('--')) {
      console.error(`Unknown or incomplete compare option: ${token}`);
      return 1;
    } else {
      positional.push(token);
    }
  }
  const [left, right] = positional;
  if (!left || !right || positional.length > 2) {
    usage();
    return 1;
  }
  const ignoreHeaders: IgnoreHeaders = ignored.includes('all') ? 'all' : ignored;
  const difference = compareRecordings(retrieve(left), retrieve(right), { ignoreHeaders, ignoreBody });
  return reportComparison(difference, { left, right }) ? 0 : 1;
}

function main(): number {
  if (!command || HELP_COMMANDS.has(command)) {
    usage();
    return command ? 0 : 1;
  }
  if (VERSION_COMMANDS.has(command)) {
    printVersion();
    return 0;
  }
  try {
    if (command === 'list') return runList(args[1]);
    if (command === 'compare') return runCompare(args.slice(1));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
  usage();
  return 1;
}

process.exit(main());
