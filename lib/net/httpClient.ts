import net from 'net';
import { fetch as undiciFetch, ProxyAgent } from 'undici';
import type { Dispatcher } from 'undici';
import { CONFIG } from '../config';
import { ConfigError, TimeoutError } from '../errors';
import logger from '../logger';

export interface HttpRequest {
  url: string;
  headers?: Record<string, string>;
}

/** A response whose body has already been read within the request deadline. */
export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface RawResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<RawResponse>;

/** Resolves once a TCP connection to host:port succeeds, rejects otherwise. */
export type ProxyProbe = (host: string, port: number, timeoutMs: number) => Promise<void>;

export interface HttpClientOptions {
  timeoutMs?: number;
  proxyUrl?: string;
  probeTimeoutMs?: number;
  fetchImpl?: FetchLike;
  probe?: ProxyProbe;
  userAgent?: string;
}

export interface HttpClient {
  readonly timeoutMs: number;
  readonly proxyUrl?: string;
  send(req: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

const DEFAULT_PROXY_PORTS: Record<string, number> = { 'http:': 80, 'https:': 443 };

/**
 * Mask credentials passed as query parameters so URLs can be logged.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:key|apikey|api_key)=)[^&]*/gi, '$1***');
}

export const tcpProbe: ProxyProbe = (host, port, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = net.connect({ host, port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new TimeoutError(`connect to ${host}:${port}`, timeoutMs));
    });
    socket.once('error', (err) => {
      socket.destroy();
      reject(err);
    });
  });

function parseProxy(proxyUrl: string): { url: URL; host: string; port: number } {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch (err) {
    throw new ConfigError(`invalid proxy URL "${proxyUrl}"`, { cause: err });
  }
  const defaultPort = DEFAULT_PROXY_PORTS[url.protocol];
  if (defaultPort === undefined) {
    throw new ConfigError(`unsupported proxy protocol "${url.protocol}" (expected http: or https:)`);
  }
  const host = url.hostname.replace(/^\[|\]$/g, '');
  if (!host) throw new ConfigError(`proxy URL "${proxyUrl}" has no host`);
  const port = url.port ? Number(url.port) : defaultPort;
  return { url, host, port };
}

/**
 * Build the HTTP client used by every source in a run.
 *
 * When a proxy is given it must parse and answer a TCP connect before the client is
 * handed out; either failure is a ConfigError. Every request gets the same overall
 * deadline, with or without a proxy. No retries happen here.
 */
export async function createHttpClient(opts: HttpClientOptions = {}): Promise<HttpClient> {
  const timeoutMs = opts.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const fetchImpl = opts.fetchImpl ?? defaultFetch;
  const userAgent = opts.userAgent ?? CONFIG.USER_AGENT;
  let dispatcher: ProxyAgent | undefined;

  if (opts.proxyUrl) {
    const { url, host, port } = parseProxy(opts.proxyUrl);
    const probe = opts.probe ?? tcpProbe;
    try {
      await probe(host, port, opts.probeTimeoutMs ?? timeoutMs);
    } catch (err) {
      throw new ConfigError(`proxy ${host}:${port} is unreachable`, { cause: err });
    }
    dispatcher = new ProxyAgent(url.href);
    logger.info({ proxy: `${url.protocol}//${host}:${port}` }, 'proxy configured');
  }

  async function send(req: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetchImpl(req.url, {
        method: 'GET',
        headers: { 'User-Agent': userAgent, Accept: 'application/json', ...(req.headers ?? {}) },
        signal: controller.signal,
        dispatcher,
      });
      const body = await res.text();
      return { status: res.status, ok: res.ok, body };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`GET ${redactUrl(req.url)}`, timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(id);
    }
  }

  async function close(): Promise<void> {
    if (dispatcher) await dispatcher.close();
  }

  return { timeoutMs, proxyUrl: opts.proxyUrl, send, close };
}

export default createHttpClient;
