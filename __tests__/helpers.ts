import { Writable } from 'stream';
import type { FetchInit, FetchLike, RawResponse } from '../lib/net/httpClient';

export function jsonResponse(status: number, body: unknown): RawResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

export type Route = (url: string, init: FetchInit) => RawResponse | Promise<RawResponse>;

/** A fetch stand-in that answers by the first matching URL prefix, 404 otherwise. */
export function routedFetch(routes: Record<string, Route>): jest.MockedFunction<FetchLike> {
  return jest.fn(async (url: string, init: FetchInit) => {
    const prefix = Object.keys(routes).find((p) => url.startsWith(p));
    if (!prefix) return jsonResponse(404, { error: 'not found' });
    return routes[prefix](url, init);
  });
}

export function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      chunks.push(chunk.toString());
      cb();
    },
  });
  return { stream, text: () => chunks.join('') };
}
