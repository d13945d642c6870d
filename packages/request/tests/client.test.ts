import { describe, it, expect } from 'vitest';
import { RetryConfigurationError } from '@chainrest/core';
import { retryOnError, retryWhenRetryable } from '@chainrest/retry';
import { createMockTransport, createRespondingTransport } from '@chainrest/testing';
import { RestClient } from '../src/index.js';

describe('RestClient', () => {
  it('should hand out builders with the client defaults', () => {
    const transport = createRespondingTransport({});
    const client = new RestClient({
      timeout: 1000,
      retryAttempts: 1,
      retryDelay: 25,
      retryPredicate: retryOnError,
      headers: { Accept: 'application/json' },
      transport,
    });

    const builder = client.get('https://api.example.test/items');

    expect(builder.getMethod()).toBe('GET');
    expect(builder.getTimeout()).toBe(1000);
    expect(builder.getRetry()).toEqual({ attempts: 1, delay: 25, predicate: retryOnError });
    expect(builder.getHeaders()).toEqual({ accept: ['application/json'] });
  });

  it('should apply defaults from the schema', () => {
    const config = new RestClient().getConfig();

    expect(config).toEqual({ timeout: 2000, retryAttempts: 0, retryDelay: 0 });
  });

  it('should give each builder its own state', () => {
    const client = new RestClient({ headers: { 'X-Client': 'one' } });

    const first = client.get('https://api.example.test/a').addHeader('X-Extra', '1');
    const second = client.get('https://api.example.test/b');

    expect(first.getHeaders()).toEqual({ 'x-client': ['one'], 'x-extra': ['1'] });
    expect(second.getHeaders()).toEqual({ 'x-client': ['one'] });
  });

  it('should use the method of each shortcut', async () => {
    const transport = createRespondingTransport({});
    const client = new RestClient({ transport });
    const url = 'https://api.example.test/items';

    await client.head(url).send();
    await client.post(url).send();
    await client.put(url).send();
    await client.patch(url).send();
    await client.delete(url).send();
    await client.request('OPTIONS', url).send();

    expect(transport.calls.map((call) => call.request.method)).toEqual([
      'HEAD',
      'POST',
      'PUT',
      'PATCH',
      'DELETE',
      'OPTIONS',
    ]);
  });

  it('should resolve relative URLs against the base URL', () => {
    const client = new RestClient({ baseUrl: 'https://api.example.test/v1/' });

    expect(client.get('items').getUrl()).toBe('https://api.example.test/v1/items');
    expect(client.get('/health').getUrl()).toBe('https://api.example.test/health');
    expect(client.get('https://other.example.test/x').getUrl()).toBe('https://other.example.test/x');
  });

  it('should pass URLs with control characters through unresolved', async () => {
    const transport = createRespondingTransport({});
    const client = new RestClient({ baseUrl: 'https://api.example.test/', transport });

    const builder = client.get('items\n');
    const { error } = await builder.send();

    expect(builder.getUrl()).toBe('items\n');
    expect(error?.name).toBe('UrlParseError');
    expect(transport.callCount).toBe(0);
  });

  it('should retry with the default predicate', async () => {
    const transport = createMockTransport({
      replies: [{ status: 503 }],
      defaultReply: { status: 200, body: 'ok' },
    });
    const client = new RestClient({
      retryAttempts: 2,
      retryPredicate: retryWhenRetryable,
      transport,
    });

    const { response } = await client.get('https://api.example.test/items').send();

    expect(response?.body).toBe('ok');
    expect(transport.callCount).toBe(2);
  });

  it('should reject retries without a predicate', () => {
    expect(() => new RestClient({ retryAttempts: 1 })).toThrow(RetryConfigurationError);
  });

  it('should reject invalid defaults', () => {
    expect(() => new RestClient({ timeout: -1 })).toThrow();
    expect(() => new RestClient({ retryAttempts: 1.5, retryPredicate: retryOnError })).toThrow();
    expect(() => new RestClient({ baseUrl: 'not a url' })).toThrow();
  });

  it('should accept long timeouts and many retries', () => {
    const client = new RestClient({
      timeout: 7_200_000,
      retryAttempts: 500,
      retryDelay: 0.5,
      retryPredicate: retryOnError,
    });

    expect(client.getConfig().timeout).toBe(7_200_000);
    expect(client.getConfig().retryAttempts).toBe(500);
    expect(client.getConfig().retryDelay).toBe(0.5);
  });
});
