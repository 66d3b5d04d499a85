/**
 * Request equivalence for playback. Two requests match when method, URL (query order
 * notwithstanding), body and non-ignored headers are the same. The first difference
 * found is reported; the rest are not examined.
 */
import type { ComparisonResult, HeaderMap, IgnoreHeaders, RecordedRequest } from '../../types/schema';

export type RequestComparatorOptions = {
  /** Header names to leave out (case-insensitive), or 'all' to skip headers entirely. */
  ignoreHeaders?: IgnoreHeaders;
  ignoreBody?: boolean;
};

const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
  'ws:': '80',
  'wss:': '443',
};

type Mismatch = Extract<ComparisonResult, { matched: false }>;

function mismatch(dimension: Mismatch['dimension'], explanation: string): Mismatch {
  return { matched: false, dimension, explanation };
}

function effectivePort(url: URL): string {
  return url.port || DEFAULT_PORTS[url.protocol] || '';
}

/** Query parameters as a sorted list of encoded key=value pairs (multiset form). */
function queryPairs(url: URL): string[] {
  const pairs: string[] = [];
  url.searchParams.forEach((value, key) => {
    pairs.push(`${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
  });
  return pairs.sort();
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function compareUrl(incoming: string, recorded: string): Mismatch | undefined {
  const got = new URL(incoming);
  const expected = new URL(recorded);
  const parts: Array<[string, string, string]> = [
    ['scheme', got.protocol.replace(/:$/, ''), expected.protocol.replace(/:$/, '')],
    ['userinfo', userinfo(got), userinfo(expected)],
    ['host', got.hostname, expected.hostname],
    ['port', effectivePort(got), effectivePort(expected)],
    ['path', got.pathname, expected.pathname],
  ];
  for (const [part, a, b] of parts) {
    if (a !== b) return mismatch('url', `URL ${part} mismatch: got '${a}', expected '${b}'`);
  }
  if (!sameList(queryPairs(got), queryPairs(expected))) {
    return mismatch(
      'url',
      `URL query mismatch: got '${got.search.replace(/^\?/, '')}', expected '${expected.search.replace(/^\?/, '')}'`
    );
  }
  return undefined;
}

function userinfo(url: URL): string {
  if (!url.username && !url.password) return '';
  return url.password ? `${url.username}:${url.password}` : url.username;
}

function compareBody(got: Buffer, expected: Buffer): Mismatch | undefined {
  if (got.equals(expected)) return undefined;
  if (got.length !== expected.length) {
    return mismatch('body', `Body mismatch: got ${got.length} bytes, expected ${expected.length} bytes`);
  }
  let at = 0;
  while (at < got.length && got[at] === expected[at]) at += 1;
  return mismatch('body', `Body mismatch: contents differ at byte ${at} of ${got.length}`);
}

function filterHeaders(headers: HeaderMap, ignored: ReadonlySet<string>): Map<string, readonly string[]> {
  const out = new Map<string, readonly string[]>();
  for (const [name, values] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (ignored.has(key)) continue;
    out.set(key, [...(out.get(key) ?? []), ...values]);
  }
  return out;
}

function compareHeaders(
  got: HeaderMap,
  expected: HeaderMap,
  ignored: ReadonlySet<string>
): Mismatch | undefined {
  const a = filterHeaders(got, ignored);
  const b = filterHeaders(expected, ignored);
  if (a.size !== b.size) {
    return mismatch('headers', `Header count mismatch: got ${a.size}, expected ${b.size}`);
  }
  for (const name of [...a.keys()].sort()) {
    const gotValues = a.get(name) ?? [];
    const expectedValues = b.get(name);
    if (expectedValues === undefined) {
      return mismatch('headers', `Header '${name}' mismatch: header not present in both requests`);
    }
    if (!sameList([...gotValues].sort(), [...expectedValues].sort())) {
      return mismatch(
        'headers',
        `Header '${name}' mismatch: got '${gotValues.join(', ')}', expected '${expectedValues.join(', ')}'`
      );
    }
  }
  return undefined;
}

export class RequestComparator {
  private readonly ignoreHeaders: 'all' | ReadonlySet<string>;
  private readonly ignoreBody: boolean;
  private last: ComparisonResult | undefined;

  constructor(options: RequestComparatorOptions = {}) {
    const ignore = options.ignoreHeaders ?? [];
    this.ignoreHeaders = ignore === 'all' ? 'all' : new Set(ignore.map((h) => h.toLowerCase()));
    this.ignoreBody = options.ignoreBody ?? false;
  }

  /** Result of the most recent compare(), for diagnostics. */
  get lastResult(): ComparisonResult | undefined {
    return this.last;
  }

  compare(incoming: RecordedRequest, recorded: RecordedRequest): ComparisonResult {
    this.last = this.evaluate(incoming, recorded) ?? { matched: true };
    return this.last;
  }

  private evaluate(incoming: RecordedRequest, recorded: RecordedRequest): Mismatch | undefined {
    const gotMethod = incoming.method.toUpperCase();
    const expectedMethod = recorded.method.toUpperCase();
    if (gotMethod !== expectedMethod) {
      return mismatch('method', `Method mismatch: got '${gotMethod}', expected '${expectedMethod}'`);
    }
    const url = compareUrl(incoming.url, recorded.url);
    if (url) return url;
    if (!this.ignoreBody) {
      const body = compareBody(incoming.body, recorded.body);
      if (body) return body;
    }
    if (this.ignoreHeaders === 'all') return undefined;
    return compareHeaders(incoming.headers, recorded.headers, this.ignoreHeaders);
  }
}
