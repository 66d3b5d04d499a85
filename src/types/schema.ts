/** Lower-case header name -> values in the order they were seen. */
export type HeaderMap = Readonly<Record<string, readonly string[]>>;

/** Captured outbound request. `url` is absolute; `method` is upper case. */
export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: HeaderMap;
  readonly body: Buffer;
}

export interface RecordedResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: HeaderMap;
  readonly body: Buffer;
}

/** One request/response pair. Never mutated once it is in a TransactionStore. */
export interface Transaction {
  readonly request: RecordedRequest;
  readonly response: RecordedResponse;
}

/** Request dimension a comparison failed on; `exhausted` when no recorded transaction was left to compare. */
export type ComparisonDimension = 'method' | 'url' | 'headers' | 'body' | 'exhausted';

export type ComparisonResult =
  | { matched: true }
  | { matched: false; dimension: ComparisonDimension; explanation: string };

/** Runtime mode of an agent; fixed at construction. */
export type MockableMode = 'passthrough' | 'record' | 'playback';

/** Mode names accepted by configuration. `env` resolves to a MockableMode from the environment. */
export type MockableModeName = MockableMode | 'env';

export const MODE_NAMES: readonly MockableModeName[] = ['passthrough', 'record', 'playback', 'env'];

/**
 * What playback does when a request does not match the next recorded one:
 * - exception: reject the call with UnrecognizedRequestError.
 * - null: answer locally with an empty body and diagnostic headers.
 * - fallback: send the request to its real destination.
 */
export type UnrecognizedPolicy = 'exception' | 'null' | 'fallback';

export const UNRECOGNIZED_POLICIES: readonly UnrecognizedPolicy[] = ['exception', 'null', 'fallback'];

/** Header names excluded from comparison, or 'all' to skip header comparison. */
export type IgnoreHeaders = 'all' | readonly string[];

/** Sends a request over the real network. Matches the global fetch for a Request argument. */
export type Transport = (request: Request) => Promise<Response>;

export interface Logger {
  warn(message: string): void;
}

export function isMode(value: unknown): value is MockableModeName {
  return MODE_NAMES.some((name) => name === value);
}

export function isUnrecognizedPolicy(value: unknown): value is UnrecognizedPolicy {
  return UNRECOGNIZED_POLICIES.some((policy) => policy === value);
}
