/**
 * Sequential playback. Every request is compared against the head of the store only;
 * requests must arrive in recorded order. A request matching a later transaction is
 * unmatched, and that transaction stays queued.
 *
 * play() is synchronous: pop, compare, push-back and the local responder call happen
 * without yielding, so interleaved requests on one agent cannot observe each other's
 * current transaction.
 */

import { UnrecognizedRequestError } from '../../errors';
import type {
  ComparisonResult,
  IgnoreHeaders,
  RecordedRequest,
  Transaction,
  UnrecognizedPolicy,
} from '../../types/schema';
import { RequestComparator } from '../compare/request-compare';
import type { TransactionStore } from '../store/transaction-store';
import {
  DEFAULT_IGNORED_HEADERS,
  HEADER_MATCH_EXCEPTION,
  HEADER_REQUEST_RECOGNIZED,
  toHeaderValue,
  toHeaders,
} from '../http/headers';
import { requestBody } from '../http/snapshot';
import { LocalResponder } from './local-responder';

export type PlaybackState = 'Idle' | 'Matching' | 'Served' | 'Unmatched';

export type PlaybackEngineOptions = {
  unrecognized?: UnrecognizedPolicy;
  /** Extra header names to ignore, merged with DEFAULT_IGNORED_HEADERS; 'all' skips headers. */
  ignoreHeaders?: IgnoreHeaders;
  ignoreBody?: boolean;
  responder?: LocalResponder;
};

/** Diagnostic headers describing a failed match. */
export type MatchDiagnostics = Record<string, string>;

/**
 * - served: matched; `request` is the rewritten request and `response` the stored one.
 * - null: unmatched under policy `null`; answered locally with an empty body.
 * - fallback: unmatched under policy `fallback`; caller sends the original request.
 */
export type PlaybackOutcome =
  | { kind: 'served'; transaction: Transaction; request: Request; response: Response }
  | { kind: 'null'; request: Request; response: Response; diagnostics: MatchDiagnostics }
  | { kind: 'fallback'; diagnostics: MatchDiagnostics };

type Unmatched = Extract<ComparisonResult, { matched: false }>;

const EXHAUSTED: Unmatched = {
  matched: false,
  dimension: 'exhausted',
  explanation: 'No recorded transactions remain',
};

function effectiveIgnoreHeaders(configured: IgnoreHeaders | undefined): IgnoreHeaders {
  if (configured === 'all') return 'all';
  return [...DEFAULT_IGNORED_HEADERS, ...(configured ?? [])];
}

export function diagnosticsFor(result: Unmatched): MatchDiagnostics {
  return {
    [HEADER_REQUEST_RECOGNIZED]: 'false',
    [HEADER_MATCH_EXCEPTION]: toHeaderValue(result.explanation),
  };
}

export class PlaybackEngine {
  private readonly store: TransactionStore;
  private readonly comparator: RequestComparator;
  private readonly unrecognized: UnrecognizedPolicy;
  readonly responder: LocalResponder;
  private current: Transaction | undefined;
  private _state: PlaybackState = 'Idle';
  private _lastOutcome: 'Served' | 'Unmatched' | undefined;
  private _lastResult: ComparisonResult | undefined;

  constructor(store: TransactionStore, options: PlaybackEngineOptions = {}) {
    this.store = store;
    this.comparator = new RequestComparator({
      ignoreHeaders: effectiveIgnoreHeaders(options.ignoreHeaders),
      ignoreBody: options.ignoreBody,
    });
    this.unrecognized = options.unrecognized ?? 'exception';
    this.responder = options.responder ?? new LocalResponder();
  }

  /**
   * Current state. play() runs synchronously, so outside it this is always 'Idle';
   * read lastOutcome for how the most recent request ended.
   */
  get state(): PlaybackState {
    return this._state;
  }

  /** Terminal state of the most recent request; undefined before the first one. */
  get lastOutcome(): 'Served' | 'Unmatched' | undefined {
    return this._lastOutcome;
  }

  /** Comparison behind the last outcome, for diagnostics. */
  get lastResult(): ComparisonResult | undefined {
    return this._lastResult;
  }

  /**
   * Plays one request, given as its snapshot (body already read).
   * @throws UnrecognizedRequestError when unmatched under policy `exception`.
   */
  play(incoming: RecordedRequest): PlaybackOutcome {
    this.transition('Matching');
    try {
      const recorded = this.store.popFront();
      if (!recorded) {
        this._lastResult = EXHAUSTED;
        this.transition('Unmatched');
        return this.unmatched(EXHAUSTED, incoming);
      }

      const result = this.comparator.compare(incoming, recorded.request);
      this._lastResult = result;
      if (!result.matched) {
        this.store.pushFront(recorded);
        this.transition('Unmatched');
        return this.unmatched(result, incoming);
      }

      this.transition('Served');
      const rewritten = this.rewrite(incoming, {});
      this.current = recorded;
      const response = this.responder.respond(rewritten, this.current);
      return { kind: 'served', transaction: recorded, request: rewritten, response };
    } finally {
      this.current = undefined;
      this.transition('Idle');
    }
  }

  /** Transaction being served; only set while the local responder runs. */
  currentTransaction(): Transaction | undefined {
    return this.current;
  }

  private transition(to: PlaybackState): void {
    this._state = to;
    if (to === 'Served' || to === 'Unmatched') this._lastOutcome = to;
  }

  private unmatched(result: Unmatched, incoming: RecordedRequest): PlaybackOutcome {
    const diagnostics = diagnosticsFor(result);
    switch (this.unrecognized) {
      case 'exception':
        throw new UnrecognizedRequestError(result);
      case 'null': {
        const rewritten = this.rewrite(incoming, diagnostics);
        const response = this.responder.respond(rewritten, this.current);
        return { kind: 'null', request: rewritten, response, diagnostics };
      }
      case 'fallback':
        return { kind: 'fallback', diagnostics };
    }
  }

  private rewrite(incoming: RecordedRequest, extraHeaders: MatchDiagnostics): Request {
    const headers = toHeaders(incoming.headers);
    for (const [name, value] of Object.entries(extraHeaders)) headers.set(name, value);
    return new Request(this.responder.rewrite(incoming.url), {
      method: incoming.method,
      headers,
      body: requestBody(incoming.method, incoming.body),
    });
  }
}
