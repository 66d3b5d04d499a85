import type { RecordedRequest, RecordedResponse } from '../../types/schema';
import { toHeaderMap } from './headers';

/** Statuses whose responses never carry a body. */
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

/** Reads a clone of the request so the original stays usable for sending. */
export async function snapshotRequest(request: Request): Promise<RecordedRequest> {
  const body = Buffer.from(await request.clone().arrayBuffer());
  return {
    method: request.method.toUpperCase(),
    url: request.url,
    headers: toHeaderMap(request.headers),
    body,
  };
}

/** Reads the given response to the end. Pass a clone when the caller still needs the body. */
export async function snapshotResponse(response: Response): Promise<RecordedResponse> {
  const body = Buffer.from(await response.arrayBuffer());
  return {
    status: response.status,
    statusText: response.statusText,
    headers: toHeaderMap(response.headers),
    body,
  };
}

/** Copies the bytes into a fresh ArrayBuffer, which every fetch body type accepts. */
function toArrayBuffer(body: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(body.length);
  new Uint8Array(copy).set(body);
  return copy;
}

/**
 * Body argument for new Response(); null when the status or method forbids a body
 * or the body is empty.
 */
export function responseBody(status: number, body: Buffer, method = 'GET'): ArrayBuffer | null {
  if (NULL_BODY_STATUSES.has(status) || method.toUpperCase() === 'HEAD' || body.length === 0) {
    return null;
  }
  return toArrayBuffer(body);
}

/** Body argument for new Request(); GET and HEAD requests carry none. */
export function requestBody(method: string, body: Buffer): ArrayBuffer | undefined {
  const m = method.toUpperCase();
  if (m === 'GET' || m === 'HEAD' || body.length === 0) return undefined;
  return toArrayBuffer(body);
}
