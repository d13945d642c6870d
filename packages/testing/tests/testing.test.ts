import { describe, it, expect } from 'vitest';
import { decodeBody, drainBody, type TransportRequest } from '@chainrest/transport';
import {
  createFailThenSucceedTransport,
  createFailingTransport,
  createMockTransport,
  createRespondingTransport,
  createSlowTransport,
  requestBodyText,
} from '../src/index.js';

const request = (body?: string): TransportRequest => ({
  method: 'GET',
  url: 'https://api.example.test/items',
  headers: {},
  body: body === undefined ? undefined : new TextEncoder().encode(body),
  timeoutMs: 0,
});

const signal = (): AbortSignal => new AbortController().signal;

describe('createMockTransport', () => {
  it('should replay replies in order, then the default', async () => {
    const transport = createMockTransport({
      replies: [{ status: 500, body: 'boom' }, new Error('connection refused')],
      defaultReply: { status: 200, body: ['o', 'k'] },
    });

    const first = await transport.send(request(), signal());
    expect(first.status).toBe(500);
    expect(decodeBody(await drainBody(first.body))).toBe('boom');

    await expect(transport.send(request(), signal())).rejects.toThrow('connection refused');

    const third = await transport.send(request(), signal());
    expect(third.status).toBe(200);
    expect(decodeBody(await drainBody(third.body))).toBe('ok');
    expect(transport.callCount).toBe(3);
  });

  it('should reject once replies run out without a default', async () => {
    const transport = createMockTransport({ replies: [{}] });
    await transport.send(request(), signal());

    await expect(transport.send(request(), signal())).rejects.toThrow(
      'No reply configured for mock transport call 2'
    );
  });

  it('should record requests and signals', async () => {
    const transport = createRespondingTransport({});
    const sent = request('payload');
    const abortSignal = signal();

    await transport.send(sent, abortSignal);

    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]?.request).toBe(sent);
    expect(transport.calls[0]?.signal).toBe(abortSignal);
    expect(requestBodyText(sent)).toBe('payload');
    expect(requestBodyText(request())).toBeUndefined();

    transport.reset();
    expect(transport.callCount).toBe(0);
  });

  it('should lower-case scripted headers', async () => {
    const transport = createRespondingTransport({
      headers: { 'Content-Type': 'text/plain', 'Set-Cookie': ['a=1', 'b=2'] },
    });

    const response = await transport.send(request(), signal());

    expect(response.headers).toEqual({
      'content-type': ['text/plain'],
      'set-cookie': ['a=1', 'b=2'],
    });
  });

  it('should fail the body stream after its chunks', async () => {
    const transport = createRespondingTransport({
      body: 'partial',
      bodyError: new Error('stream reset'),
    });

    const response = await transport.send(request(), signal());

    await expect(drainBody(response.body)).rejects.toThrow('stream reset');
  });

  it('should expose normalised default headers', () => {
    const transport = createMockTransport({ defaultHeaders: { 'User-Agent': ['mock'] } });
    expect(transport.defaultHeaders).toEqual({ 'user-agent': ['mock'] });
  });

  it('should invoke onCall with the call index', async () => {
    const seen: number[] = [];
    const transport = createMockTransport({
      defaultReply: {},
      onCall: (index) => {
        seen.push(index);
      },
    });

    await transport.send(request(), signal());
    await transport.send(request(), signal());

    expect(seen).toEqual([0, 1]);
  });
});

describe('transport helpers', () => {
  it('createFailThenSucceedTransport should fail the given number of times', async () => {
    const transport = createFailThenSucceedTransport(2, new Error('down'), { status: 204 });

    await expect(transport.send(request(), signal())).rejects.toThrow('down');
    await expect(transport.send(request(), signal())).rejects.toThrow('down');
    const response = await transport.send(request(), signal());

    expect(response.status).toBe(204);
  });

  it('createFailingTransport should always reject', async () => {
    const transport = createFailingTransport(new Error('unreachable'));

    await expect(transport.send(request(), signal())).rejects.toThrow('unreachable');
    await expect(transport.send(request(), signal())).rejects.toThrow('unreachable');
  });

  it('createSlowTransport should reject with the abort reason when aborted', async () => {
    const transport = createSlowTransport(10_000, { body: 'late' });
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('gave up')), 5);

    await expect(transport.send(request(), controller.signal)).rejects.toThrow('gave up');
  });

  it('createSlowTransport should answer after the delay', async () => {
    const transport = createSlowTransport(5, { status: 201 });
    const response = await transport.send(request(), signal());

    expect(response.status).toBe(201);
  });
});
