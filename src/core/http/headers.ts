/**
 * Header names used on requests and responses handled by playback. All share one
 * prefix so the local responder can echo them back without knowing each name.
 */

import type { HeaderMap } from '../../types/schema';

export const DIAGNOSTIC_HEADER_PREFIX = 'x-mockable-';
export const HEADER_REQUEST_RECOGNIZED = 'x-mockable-request-recognized';
export const HEADER_MATCH_EXCEPTION = 'x-mockable-request-match-exception';
export const HEADER_REGENERATED = 'x-mockable-regenerated';
export const HEADER_ERROR = 'x-mockable-error';

/** Headers that never take part in playback comparison unless ignoreHeaders is 'all'. */
export const DEFAULT_IGNORED_HEADERS: readonly string[] = ['connection', 'host', 'content-length', 'user-agent'];

/**
 * Response headers describing how the body was framed on the wire. Bodies handed out
 * here are already decoded, so these no longer apply.
 */
export const FRAMING_RESPONSE_HEADERS: readonly string[] = ['content-encoding', 'content-length', 'transfer-encoding'];

/** Request headers fetch either refuses to send or sets itself from the body and URL. */
export const HOP_BY_HOP_REQUEST_HEADERS: readonly string[] = [
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
  'expect',
  'host',
  'content-length',
];

/** Single-line printable ASCII, as header values require. */
export function toHeaderValue(text: string): string {
  return text.replace(/[\r\n]+/g, ' ').replace(/[^\x20-\x7e]/g, '?').trim();
}

/** Converts fetch Headers to a HeaderMap; repeated names (set-cookie) keep every value. */
export function toHeaderMap(headers: Headers): HeaderMap {
  const out: Record<string, string[]> = {};
  headers.forEach((value, name) => {
    const key = name.toLowerCase();
    (out[key] ??= []).push(value);
  });
  return out;
}

export function toHeaders(map: HeaderMap, omit: readonly string[] = []): Headers {
  const headers = new Headers();
  for (const [name, values] of Object.entries(map)) {
    if (omit.includes(name.toLowerCase())) continue;
    for (const value of values) headers.append(name, value);
  }
  return headers;
}

/** Returns a response without the named headers; status and body stream are kept. */
export function withoutHeaders(response: Response, names: readonly string[]): Response {
  const headers = new Headers(response.headers);
  for (const name of names) headers.delete(name);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

/** Returns a response with the given extra headers; status and body stream are kept. */
export function withHeaders(response: Response, extra: Record<string, string>): Response {
  const headers = new Headers(response.headers);
  for (const [name, value] of Object.entries(extra)) headers.set(name, value);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
