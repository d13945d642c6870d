import { describe, it, expect, vi } from 'vitest';
import {
  type FetchFunction,
  appendHeader,
  bodyFromChunks,
  createFetchTransport,
  createHeaderMap,
  decodeBody,
  drainBody,
  emptyBody,
  fromFetchHeaders,
  hasHeader,
  mergeHeaders,
  readWebStream,
  toFetchHeaders,
} from '../src/index.js';

const encoder = new TextEncoder();

function stubFetch(response: () => Response): {
  fetch: FetchFunction;
  calls: { url: string; init: RequestInit }[];
} {
  const calls: { url: string; init: RequestInit }[] = [];
  const fetch = vi.fn<FetchFunction>((url, init) => {
    calls.push({ url, init });
    return Promise.resolve(response());
  });
  return { fetch, calls };
}

describe('headers', () => {
  it('should accumulate values under a lower-cased name', () => {
    const headers = createHeaderMap();
    appendHeader(headers, 'Accept', 'text/plain');
    appendHeader(headers, 'ACCEPT', 'application/json');

    expect(headers).toEqual({ accept: ['text/plain', 'application/json'] });
  });

  it('should treat prototype member names as ordinary headers', () => {
    const headers = createHeaderMap();
    appendHeader(headers, 'constructor', 'x');

    expect(headers['constructor']).toEqual(['x']);
    expect(hasHeader(headers, 'toString')).toBe(false);
  });

  it('should merge maps in order without replacing', () => {
    const merged = mergeHeaders(
      { 'user-agent': ['base'] },
      undefined,
      { 'User-Agent': ['extra'], 'x-id': ['1'] }
    );

    expect(merged).toEqual({ 'user-agent': ['base', 'extra'], 'x-id': ['1'] });
  });

  it('should report presence case-insensitively', () => {
    expect(hasHeader({ 'content-type': ['text/plain'] }, 'Content-Type')).toBe(true);
    expect(hasHeader({ 'content-type': [] }, 'content-type')).toBe(false);
  });

  it('should append every value to fetch headers', () => {
    const headers = toFetchHeaders({ 'x-tag': ['a', 'b'] });
    expect(headers.get('x-tag')).toBe('a, b');
  });

  it('should keep set-cookie values separate when reading fetch headers', () => {
    const headers = new Headers();
    headers.append('Content-Type', 'text/plain');
    headers.append('Set-Cookie', 'a=1');
    headers.append('Set-Cookie', 'b=2');

    expect(fromFetchHeaders(headers)).toEqual({
      'content-type': ['text/plain'],
      'set-cookie': ['a=1', 'b=2'],
    });
  });
});

describe('bodies', () => {
  it('should concatenate chunks when draining', async () => {
    const bytes = await drainBody(bodyFromChunks(['he', encoder.encode('ll'), 'o']));
    expect(decodeBody(bytes)).toBe('hello');
  });

  it('should drain an empty body to zero bytes', async () => {
    const bytes = await drainBody(emptyBody());
    expect(bytes.byteLength).toBe(0);
  });

  it('should read a web stream to completion', async () => {
    const stream = new Response('streamed').body;
    expect(stream).not.toBeNull();
    if (!stream) return;

    const bytes = await drainBody(readWebStream(stream));
    expect(decodeBody(bytes)).toBe('streamed');
  });

  it('should propagate a stream error while draining', async () => {
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield encoder.encode('partial');
      throw new Error('connection reset');
    }

    await expect(drainBody(failing())).rejects.toThrow('connection reset');
  });
});

describe('createFetchTransport', () => {
  it('should pass method, url, headers and body to fetch', async () => {
    const { fetch, calls } = stubFetch(() => new Response('ok'));
    const transport = createFetchTransport({ fetch });
    const signal = new AbortController().signal;

    await transport.send(
      {
        method: 'POST',
        url: 'https://api.example.test/items?id=42',
        headers: { 'x-tag': ['a', 'b'] },
        body: encoder.encode('payload'),
        timeoutMs: 2000,
      },
      signal
    );

    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call?.url).toBe('https://api.example.test/items?id=42');
    expect(call?.init.method).toBe('POST');
    expect(call?.init.redirect).toBe('follow');
    expect(call?.init.signal).toBe(signal);
    expect(new Headers(call?.init.headers).get('x-tag')).toBe('a, b');
    expect(call?.init.body).toEqual(encoder.encode('payload'));
  });

  it('should omit an empty body', async () => {
    const { fetch, calls } = stubFetch(() => new Response('ok'));
    const transport = createFetchTransport({ fetch });

    await transport.send(
      { method: 'GET', url: 'https://api.example.test/', headers: {}, body: new Uint8Array(0), timeoutMs: 0 },
      new AbortController().signal
    );

    expect(calls[0]?.init.body).toBeUndefined();
  });

  it('should map status, headers and body of the response', async () => {
    const { fetch } = stubFetch(
      () => new Response('created', { status: 201, headers: { 'X-Request-Id': 'r-1' } })
    );
    const transport = createFetchTransport({ fetch });

    const response = await transport.send(
      { method: 'PUT', url: 'https://api.example.test/', headers: {}, body: undefined, timeoutMs: 0 },
      new AbortController().signal
    );

    expect(response.status).toBe(201);
    expect(response.headers['x-request-id']).toEqual(['r-1']);
    expect(decodeBody(await drainBody(response.body))).toBe('created');
  });

  it('should expose an empty body for responses without one', async () => {
    const { fetch } = stubFetch(() => new Response(null, { status: 204 }));
    const transport = createFetchTransport({ fetch });

    const response = await transport.send(
      { method: 'DELETE', url: 'https://api.example.test/', headers: {}, body: undefined, timeoutMs: 0 },
      new AbortController().signal
    );

    expect(response.status).toBe(204);
    expect((await drainBody(response.body)).byteLength).toBe(0);
  });

  it('should propagate fetch rejections', async () => {
    const fetch = vi.fn<FetchFunction>(() => Promise.reject(new TypeError('fetch failed')));
    const transport = createFetchTransport({ fetch });

    await expect(
      transport.send(
        { method: 'GET', url: 'https://api.example.test/', headers: {}, body: undefined, timeoutMs: 0 },
        new AbortController().signal
      )
    ).rejects.toThrow('fetch failed');
  });

  it('should normalise default headers', () => {
    const transport = createFetchTransport({ defaultHeaders: { 'User-Agent': ['chainrest-test'] } });
    expect(transport.defaultHeaders).toEqual({ 'user-agent': ['chainrest-test'] });
  });

  it('should have no default headers unless configured', () => {
    expect(createFetchTransport().defaultHeaders).toBeUndefined();
  });

  it('should pass a configured redirect mode', async () => {
    const { fetch, calls } = stubFetch(() => new Response('ok'));
    const transport = createFetchTransport({ fetch, redirect: 'manual' });

    await transport.send(
      { method: 'GET', url: 'https://api.example.test/', headers: {}, body: undefined, timeoutMs: 0 },
      new AbortController().signal
    );

    expect(calls[0]?.init.redirect).toBe('manual');
  });
});
