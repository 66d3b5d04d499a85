/**
 * `mockable compare`: checks that two recordings describe the same call sequence.
 * Requests go through the playback comparator (default ignored headers included);
 * responses must have the same status and body. Reports the first difference only.
 */

import { RequestComparator } from '../core/compare/request-compare';
import { DEFAULT_IGNORED_HEADERS } from '../core/http/headers';
import type { IgnoreHeaders, Transaction } from '../types/schema';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export type CompareRecordingsOptions = {
  ignoreHeaders?: IgnoreHeaders;
  ignoreBody?: boolean;
};

export type RecordingDifference = {
  /** Index of the first differing transaction; equals the shorter length when only counts differ. */
  index: number;
  explanation: string;
};

export function compareRecordings(
  left: readonly Transaction[],
  right: readonly Transaction[],
  options: CompareRecordingsOptions = {}
): RecordingDifference | undefined {
  const comparator = new RequestComparator({
    ignoreHeaders:
      options.ignoreHeaders === 'all' ? 'all' : [...DEFAULT_IGNORED_HEADERS, ...(options.ignoreHeaders ?? [])],
    ignoreBody: options.ignoreBody,
  });
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const a = left[i];
    const b = right[i];
    const result = comparator.compare(a.request, b.request);
    if (!result.matched) return { index: i, explanation: `request: ${result.explanation}` };
    if (a.response.status !== b.response.status) {
      return { index: i, explanation: `response status: ${a.response.status} vs ${b.response.status}` };
    }
    if (!a.response.body.equals(b.response.body)) {
      return {
        index: i,
        explanation: `response body: ${a.response.body.length} bytes vs ${b.response.body.length} bytes`,
      };
    }
  }
  if (left.length !== right.length) {
    return { index: shared, explanation: `transaction count: ${left.length} vs ${right.length}` };
  }
  return undefined;
}

/** Prints a difference (or PASS) for two recordings; returns true when they match. */
export function reportComparison(
  difference: RecordingDifference | undefined,
  names: { left: string; right: string },
  opts: { write?: (s: string) => void } = {}
): boolean {
  const write = opts.write ?? ((s: string) => process.stderr.write(s));
  if (!difference) {
    write(`mockable compare: PASS (${names.left} and ${names.right} match)\n`);
    return true;
  }
  write('mockable compare: FAIL (recordings differ)\n\n');
  write(`  ${DIM}transaction #${difference.index}:${RESET}\n`);
  write(`    ${GREEN}left:  ${names.left}${RESET}\n`);
  write(`    ${RED}right: ${names.right}${RESET}\n`);
  write(`    ${difference.explanation}\n`);
  return false;
}
