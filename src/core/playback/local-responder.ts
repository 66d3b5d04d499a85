/**
 * In-process stand-in for the remote host during playback. Requests rewritten by the
 * PlaybackEngine land here: with a current transaction the stored response is returned,
 * without one an empty response echoes the request's diagnostic headers.
 */

import type { Transaction } from '../../types/schema';
import { DIAGNOSTIC_HEADER_PREFIX, FRAMING_RESPONSE_HEADERS, HEADER_REGENERATED, toHeaders } from '../http/headers';
import { responseBody } from '../http/snapshot';

export const LOCAL_RESPONDER_ORIGIN = 'http://mockable.localhost';

export class LocalResponder {
  readonly origin: string;

  constructor(origin: string = LOCAL_RESPONDER_ORIGIN) {
    this.origin = origin.replace(/\/$/, '');
  }

  /** Rewrites a URL to this responder, keeping path, query and fragment. */
  rewrite(url: string): string {
    const original = new URL(url);
    return `${this.origin}${original.pathname}${original.search}${original.hash}`;
  }

  respond(request: Request, current: Transaction | undefined): Response {
    if (current) {
      const { status, statusText, body } = current.response;
      const headers = toHeaders(current.response.headers, FRAMING_RESPONSE_HEADERS);
      headers.set(HEADER_REGENERATED, '1');
      return new Response(responseBody(status, body, request.method), { status, statusText, headers });
    }
    const headers = new Headers();
    request.headers.forEach((value, name) => {
      if (name.toLowerCase().startsWith(DIAGNOSTIC_HEADER_PREFIX)) headers.set(name, value);
    });
    return new Response(null, { status: 200, headers });
  }
}
