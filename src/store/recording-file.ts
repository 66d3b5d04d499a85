/**
 * Recording file: a JSON array with one { request, response } element per transaction,
 * in order. Bodies are stored as UTF-8 text, or base64 with bodyEncoding "base64" when
 * the bytes are not valid UTF-8, so every body round-trips byte for byte.
 *
 * Synchronous on purpose: playback loads the file while the agent is constructed.
 */

import fs from 'fs';

import { RecordingFormatError } from '../errors';
import type { HeaderMap, RecordedRequest, RecordedResponse, Transaction } from '../types/schema';

type BodyEncoding = 'utf8' | 'base64';

type StoredBody = { body: string; bodyEncoding?: 'base64' };

export type StoredRequest = StoredBody & { method: string; url: string; headers: Record<string, string[]> };
export type StoredResponse = StoredBody & {
  status: number;
  statusText?: string;
  headers: Record<string, string[]>;
};
export type StoredTransaction = { request: StoredRequest; response: StoredResponse };

function encodeBody(body: Buffer): StoredBody {
  const text = body.toString('utf8');
  if (Buffer.from(text, 'utf8').equals(body)) return { body: text };
  return { body: body.toString('base64'), bodyEncoding: 'base64' };
}

function decodeBody(body: string, encoding: BodyEncoding): Buffer {
  return Buffer.from(body, encoding);
}

function copyHeaders(headers: HeaderMap): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [name, values] of Object.entries(headers)) out[name] = [...values];
  return out;
}

export function toStored(transaction: Transaction): StoredTransaction {
  const { request, response } = transaction;
  return {
    request: {
      method: request.method,
      url: request.url,
      headers: copyHeaders(request.headers),
      ...encodeBody(request.body),
    },
    response: {
      status: response.status,
      statusText: response.statusText,
      headers: copyHeaders(response.headers),
      ...encodeBody(response.body),
    },
  };
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/** RFC 9110 token characters. */
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
/** Values fetch Headers reject: line breaks, NUL, or anything outside Latin-1. */
const INVALID_HEADER_VALUE = /[\r\n\0]|[^\u0000-\u00ff]/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads fields of one stored element; each failure names the element and field. */
class ElementReader {
  constructor(
    private readonly file: string,
    private readonly where: string
  ) {}

  error(detail: string): RecordingFormatError {
    return new RecordingFormatError(this.file, `${this.where}: ${detail}`);
  }

  object(parent: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = parent[key];
    if (!isRecord(value)) throw this.error(`"${key}" must be an object`);
    return value;
  }

  string(parent: Record<string, unknown>, key: string): string {
    const value = parent[key];
    if (typeof value !== 'string') throw this.error(`"${key}" must be a string`);
    return value;
  }

  headers(parent: Record<string, unknown>): HeaderMap {
    const raw = this.object(parent, 'headers');
    const out: Record<string, string[]> = {};
    for (const [name, values] of Object.entries(raw)) {
      if (!HEADER_NAME.test(name)) throw this.error(`header name "${name}" is not a valid token`);
      let list: string[];
      if (typeof values === 'string') {
        list = [values];
      } else if (Array.isArray(values) && values.every((v): v is string => typeof v === 'string')) {
        list = values;
      } else {
        throw this.error(`header "${name}" must be a string or a list of strings`);
      }
      if (list.some((v) => INVALID_HEADER_VALUE.test(v))) {
        throw this.error(`header "${name}" has a value that is not a legal header value`);
      }
      out[name.toLowerCase()] = list;
    }
    return out;
  }

  body(parent: Record<string, unknown>): Buffer {
    const encoding = parent.bodyEncoding ?? 'utf8';
    if (encoding !== 'utf8' && encoding !== 'base64') throw this.error(`unknown bodyEncoding "${String(encoding)}"`);
    return decodeBody(this.string(parent, 'body'), encoding);
  }
}

export function fromStored(value: unknown, file: string, index: number): Transaction {
  const reader = new ElementReader(file, `transaction #${index}`);
  if (!isRecord(value)) throw reader.error('must be an object');
  const req = reader.object(value, 'request');
  const res = reader.object(value, 'response');

  const url = reader.string(req, 'url');
  if (!isAbsoluteUrl(url)) throw reader.error(`request url "${url}" is not an absolute URL`);
  const status = res.status;
  if (typeof status !== 'number' || !Number.isInteger(status) || status < 200 || status > 599) {
    throw reader.error('response "status" must be an integer between 200 and 599');
  }

  const request: RecordedRequest = {
    method: reader.string(req, 'method').toUpperCase(),
    url,
    headers: reader.headers(req),
    body: reader.body(req),
  };
  const response: RecordedResponse = {
    status,
    statusText: typeof res.statusText === 'string' ? res.statusText : '',
    headers: reader.headers(res),
    body: reader.body(res),
  };
  return { request, response };
}

/** Writes the transactions to `file` as a pretty-printed JSON array, replacing it. */
export function store(file: string, transactions: readonly Transaction[]): void {
  const content = JSON.stringify(transactions.map(toStored), null, 2) + '\n';
  fs.writeFileSync(file, content, 'utf8');
}

/** Reads the transactions stored in `file`, in order. */
export function retrieve(file: string): Transaction[] {
  const raw = fs.readFileSync(file, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const details = err instanceof Error ? err.message : String(err);
    throw new RecordingFormatError(file, `not valid JSON (${details})`);
  }
  if (!Array.isArray(parsed)) {
    throw new RecordingFormatError(file, 'expected a JSON array of transactions');
  }
  return parsed.map((element: unknown, index) => fromStored(element, file, index));
}
