import net from 'net';
import { ProxyAgent } from 'undici';
import { ConfigError, TimeoutError } from '../lib/errors';
import { createHttpClient, FetchInit, redactUrl, tcpProbe } from '../lib/net/httpClient';
import { jsonResponse } from './helpers';

describe('createHttpClient', () => {
  test('sends GET with default headers merged with request headers', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(jsonResponse(200, { ok: true }));
    const client = await createHttpClient({ fetchImpl, userAgent: 'subsweep-test' });

    const res = await client.send({ url: 'https://api.test/x', headers: { APIKEY: 'test-key' } });

    expect(res).toEqual({ status: 200, ok: true, body: '{"ok":true}' });
    const [url, init] = fetchImpl.mock.calls[0] as [string, FetchInit];
    expect(url).toBe('https://api.test/x');
    expect(init.method).toBe('GET');
    expect(init.headers).toEqual({ 'User-Agent': 'subsweep-test', Accept: 'application/json', APIKEY: 'test-key' });
    expect(init.dispatcher).toBeUndefined();
    await client.close();
  });

  test('aborts a request that outlives the timeout', async () => {
    const fetchImpl = jest.fn(
      (_url: string, init: FetchInit) =>
        new Promise<never>((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const client = await createHttpClient({ fetchImpl, timeoutMs: 20 });

    await expect(client.send({ url: 'https://slow.test/' })).rejects.toBeInstanceOf(TimeoutError);
  });

  test('passes transport errors through unchanged', async () => {
    const boom = new Error('ECONNREFUSED');
    const client = await createHttpClient({ fetchImpl: jest.fn().mockRejectedValue(boom) });

    await expect(client.send({ url: 'https://down.test/' })).rejects.toBe(boom);
  });

  describe('proxy', () => {
    test('malformed proxy URL is a ConfigError and nothing is probed', async () => {
      const probe = jest.fn();
      const fetchImpl = jest.fn();

      await expect(createHttpClient({ proxyUrl: 'http://[not-a-host', probe, fetchImpl })).rejects.toBeInstanceOf(
        ConfigError,
      );
      expect(probe).not.toHaveBeenCalled();
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    test('unsupported proxy protocol is a ConfigError', async () => {
      const probe = jest.fn();
      await expect(createHttpClient({ proxyUrl: 'socks5://127.0.0.1:1080', probe })).rejects.toThrow(
        'unsupported proxy protocol "socks5:" (expected http: or https:)',
      );
      expect(probe).not.toHaveBeenCalled();
    });

    test('unreachable proxy is a ConfigError', async () => {
      const probe = jest.fn().mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(createHttpClient({ proxyUrl: 'http://127.0.0.1:3128', probe })).rejects.toThrow(
        'proxy 127.0.0.1:3128 is unreachable',
      );
    });

    test('probes host and port, defaulting the port from the scheme', async () => {
      const probe = jest.fn().mockResolvedValue(undefined);

      const a = await createHttpClient({ proxyUrl: 'http://127.0.0.1:3128', probe, timeoutMs: 1500 });
      const b = await createHttpClient({ proxyUrl: 'https://proxy.internal.test', probe, probeTimeoutMs: 250 });

      expect(probe.mock.calls).toEqual([
        ['127.0.0.1', 3128, 1500],
        ['proxy.internal.test', 443, 250],
      ]);
      await a.close();
      await b.close();
    });

    test('routes requests through a ProxyAgent once the probe passes', async () => {
      const fetchImpl = jest.fn().mockResolvedValue(jsonResponse(200, []));
      const client = await createHttpClient({
        proxyUrl: 'http://127.0.0.1:3128',
        probe: jest.fn().mockResolvedValue(undefined),
        fetchImpl,
      });

      await client.send({ url: 'https://crt.sh/?q=%25.example.com&output=json' });

      const init = fetchImpl.mock.calls[0][1] as FetchInit;
      expect(init.dispatcher).toBeInstanceOf(ProxyAgent);
      expect(client.proxyUrl).toBe('http://127.0.0.1:3128');
      await client.close();
    });
  });
});

describe('tcpProbe', () => {
  test('resolves against a listening socket and rejects on a closed port', async () => {
    const server = net.createServer((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

    await expect(tcpProbe('127.0.0.1', address.port, 1000)).resolves.toBeUndefined();

    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await expect(tcpProbe('127.0.0.1', address.port, 1000)).rejects.toThrow();
  });
});

describe('redactUrl', () => {
  test('masks key-like query parameters only', () => {
    expect(redactUrl('https://api.shodan.io/dns/domain/example.com?key=test-secret')).toBe(
      'https://api.shodan.io/dns/domain/example.com?key=***',
    );
    expect(redactUrl('https://x.test/?page=2&apikey=abc&q=1')).toBe('https://x.test/?page=2&apikey=***&q=1');
    expect(redactUrl('https://crt.sh/?q=%25.example.com')).toBe('https://crt.sh/?q=%25.example.com');
  });
});
