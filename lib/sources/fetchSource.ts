import { fetchWithRetry, FetchRetryOptions } from '../net/fetchWithRetry';
import { HttpClient, HttpRequest } from '../net/httpClient';
import type { SourceDescriptor } from '../config';
import { toError } from '../errors';
import logger from '../logger';
import type { SourceName } from '../types';

/**
 * One upstream data source: how to ask it about a domain and how to read its answer.
 * `parse` must tolerate any JSON value and return the raw candidate names it finds.
 */
export interface SourceAdapter {
  readonly name: SourceName;
  readonly requiresCredential: boolean;
  buildRequest(domain: string, credential?: string): HttpRequest;
  parse(data: unknown, domain: string): string[];
}

export interface SourceContext {
  client: HttpClient;
  retry?: FetchRetryOptions;
}

export interface SourceFetchResult {
  findings: string[];
  error?: Error;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keep only the string members of a value that should be an array. */
export function stringsOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

/**
 * Common wrapper for source fetches: retrying request, JSON decoding and parsing.
 * Never throws; a failed or malformed source yields no findings and the error.
 */
export async function fetchSource(
  adapter: SourceAdapter,
  descriptor: SourceDescriptor,
  domain: string,
  ctx: SourceContext,
): Promise<SourceFetchResult> {
  if (!descriptor.enabled) return { findings: [] };

  try {
    const req = adapter.buildRequest(domain, descriptor.credential);
    const res = await fetchWithRetry(ctx.client, req, ctx.retry);
    let data: unknown;
    try {
      data = JSON.parse(res.body);
    } catch (err) {
      throw new Error(`${adapter.name} returned undecodable JSON`, { cause: err });
    }
    return { findings: adapter.parse(data, domain) };
  } catch (err) {
    const error = toError(err);
    logger.warn({ err: error, domain, source: adapter.name }, `${adapter.name} fetch error`);
    return { findings: [], error };
  }
}

export default fetchSource;
