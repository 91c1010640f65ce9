import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { FetchClient } from './client.js';

describe('FetchClient', () => {
  let mockedFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  const lastInit = (): RequestInit => {
    const call = mockedFetch.mock.calls.at(-1);
    return call?.[1] ?? {};
  };

  describe('GET', () => {
    it('prefixes the base url and sends default headers', async () => {
      const response = new Response('{"ok":true}', { status: 200 });
      mockedFetch.mockResolvedValueOnce(response);

      const client = new FetchClient('https://xivapi.com');
      const [err, res] = await client.get('/lodestone/worldstatus?private_key=test-key', {});

      expect(err).toBeNull();
      expect(res).toBe(response);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://xivapi.com/lodestone/worldstatus?private_key=test-key');

      const init = lastInit();
      expect(init.method).toBe('GET');
      expect(init.body).toBeUndefined();
      expect(new Headers(init.headers).get('accept')).toBe('application/json');
      expect(new Headers(init.headers).get('content-type')).toBeNull();
    });

    it('returns non-2xx responses without turning them into errors', async () => {
      const response = new Response(null, { status: 503 });
      mockedFetch.mockResolvedValueOnce(response);

      const client = new FetchClient('https://xivapi.com/');
      const [err, res] = await client.get('lodestone/worldstatus', {});

      expect(err).toBeNull();
      expect(res?.status).toBe(503);
    });

    it('returns network errors unwrapped', async () => {
      const networkError = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(networkError);

      const client = new FetchClient('https://xivapi.com/');
      const [err, res] = await client.get('lore?string=crystal', {});

      expect(res).toBeNull();
      expect(err).toBe(networkError);
    });
  });

  describe('POST', () => {
    it('sends the body as JSON', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient('https://xivapi.com/');
      const body = JSON.stringify({ indexes: 'Item' });
      const [err] = await client.post('search?language=en', { body });

      expect(err).toBeNull();
      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://xivapi.com/search?language=en');

      const init = lastInit();
      expect(init.method).toBe('POST');
      expect(init.body).toBe(body);
      expect(new Headers(init.headers).get('content-type')).toBe('application/json');
    });
  });

  describe('config', () => {
    it('merges headers and updates defaults', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient('https://xivapi.com/', { headers: { 'X-Base': '1' } });
      client.config({ headers: { 'X-Extra': '2' }, credentials: 'omit', mode: 'cors' });

      await client.get('lore', { headers: { 'X-Call': '3' } });

      const init = lastInit();
      const headers = new Headers(init.headers);
      expect(headers.get('x-base')).toBe('1');
      expect(headers.get('x-extra')).toBe('2');
      expect(headers.get('x-call')).toBe('3');
      expect(init.credentials).toBe('omit');
      expect(init.mode).toBe('cors');
    });
  });

  describe('signals', () => {
    it('forwards the caller signal merged with the client signal', async () => {
      const controller = new AbortController();
      mockedFetch.mockImplementationOnce(async (_input, init) => {
        expect(init?.signal).toBeInstanceOf(AbortSignal);
        expect(init?.signal?.aborted).toBe(false);
        controller.abort(new Error('caller cancelled'));
        throw init?.signal?.reason;
      });

      const client = new FetchClient('https://xivapi.com/');
      const [err, res] = await client.get('lore', { signal: controller.signal });

      expect(res).toBeNull();
      expect(err).toEqual(new Error('caller cancelled'));
      expect(lastInit().signal?.aborted).toBe(true);
    });

    it('detaches completed requests from the client signal', async () => {
      mockedFetch.mockImplementation(async () => new Response('{}', { status: 200 }));
      const client = new FetchClient('https://xivapi.com/');

      for (let i = 0; i < 50; i++) {
        await client.get('lore', { signal: new AbortController().signal });
      }
      client.dispose();

      const signals = mockedFetch.mock.calls.map(([, init]) => init?.signal);
      expect(signals).toHaveLength(50);
      expect(signals.filter((signal) => signal?.aborted)).toHaveLength(0);
    });

    it('aborts requests once disposed', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient('https://xivapi.com/');
      await client.get('lore', {});
      const signal = lastInit().signal;

      client.dispose();

      expect(signal?.aborted).toBe(true);
      expect(signal?.reason).toEqual(new Error('fetch client was disposed'));
    });
  });
});
