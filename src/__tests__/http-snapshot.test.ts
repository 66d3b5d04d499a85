import { requestBody, responseBody } from '../core/http/snapshot';

function text(body: ArrayBuffer | null | undefined): string | undefined {
  return body ? Buffer.from(body).toString() : undefined;
}

describe('body arguments', () => {
  it('hands response bytes to new Response()', async () => {
    const body = responseBody(200, Buffer.from('abc'));
    expect(text(body)).toBe('abc');
    expect(await new Response(body).text()).toBe('abc');
  });

  it('omits the response body for null-body statuses, HEAD and empty bodies', () => {
    expect(responseBody(204, Buffer.from('abc'))).toBeNull();
    expect(responseBody(304, Buffer.from('abc'))).toBeNull();
    expect(responseBody(200, Buffer.from('abc'), 'head')).toBeNull();
    expect(responseBody(200, Buffer.alloc(0))).toBeNull();
  });

  it('copies request bytes so later changes to the source do not leak in', async () => {
    const source = Buffer.from('xyz');
    const body = requestBody('post', source);
    source[0] = 0x61;
    expect(text(body)).toBe('xyz');
    const request = new Request('https://api.example.test/submit', { method: 'POST', body });
    expect(await request.text()).toBe('xyz');
  });

  it('gives GET and HEAD requests no body', () => {
    expect(requestBody('get', Buffer.from('x'))).toBeUndefined();
    expect(requestBody('HEAD', Buffer.from('x'))).toBeUndefined();
    expect(requestBody('POST', Buffer.alloc(0))).toBeUndefined();
  });
});
