/**
 * Process-wide interception: every outgoing http/https (ClientRequest) and fetch request
 * is handed to a dispatcher (a MockableAgent) and answered with whatever it returns.
 * The agent sends real requests through the fetch it captured before the interceptor
 * was applied, so those never come back here.
 */

import { BatchInterceptor } from '@mswjs/interceptors';
import { ClientRequestInterceptor } from '@mswjs/interceptors/ClientRequest';
import { FetchInterceptor } from '@mswjs/interceptors/fetch';

import { FRAMING_RESPONSE_HEADERS, HEADER_ERROR, withoutHeaders } from '../core/http/headers';

type RequestController = { respondWith: (response: Response) => void };
type RequestEvent = { request: Request; controller: RequestController };

export interface RequestDispatcher {
  dispatch(request: Request): Promise<Response>;
}

export interface MockableInterceptor {
  dispose(): void;
}

function jsonErrorResponse(message: string, details?: string): Response {
  const payload = details ? { error: message, details } : { error: message };
  return new Response(JSON.stringify(payload), {
    status: 500,
    headers: {
      [HEADER_ERROR]: 'true',
      'content-type': 'application/json',
    },
  });
}

/**
 * Answers one intercepted request. A dispatch failure (an unrecognized request under
 * policy `exception`, a failed real request) becomes a JSON 500 response carrying
 * x-mockable-error, since the interceptor cannot reject the caller's promise.
 *
 * Live responses from fetch arrive with their body already decoded, so the framing
 * headers are dropped before the caller sees them.
 */
export async function handleMockableRequest(event: RequestEvent, dispatcher: RequestDispatcher): Promise<void> {
  const { request, controller } = event;
  let response: Response;
  try {
    response = await dispatcher.dispatch(request);
  } catch (err) {
    const details = err instanceof Error ? err.message : String(err);
    response = jsonErrorResponse('Mockable request failed', details);
  }
  controller.respondWith(withoutHeaders(response, FRAMING_RESPONSE_HEADERS));
}

export function setupMockableInterceptor(dispatcher: RequestDispatcher): MockableInterceptor {
  const interceptor = new BatchInterceptor({
    name: 'mockable-http',
    interceptors: [new ClientRequestInterceptor(), new FetchInterceptor()],
  });

  interceptor.on('request', ({ request, controller }) => handleMockableRequest({ request, controller }, dispatcher));

  interceptor.apply();
  return {
    dispose: () => interceptor.dispose(),
  };
}
