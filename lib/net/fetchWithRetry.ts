import { CONFIG } from '../config';
import { SourceFetchError, toError } from '../errors';
import logger from '../logger';
import { incFetchAttempt } from '../metrics';
import { HttpClient, HttpRequest, HttpResponse, redactUrl } from './httpClient';

/**
 * How many attempts to make and how long to wait after a failed one.
 * `attempt` is 1-based: delayMs(1) is the pause between attempts 1 and 2.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  delayMs(attempt: number): number;
}

export type Sleep = (ms: number) => Promise<void>;

export interface FetchRetryOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
}

function assertAttempts(maxAttempts: number): void {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError('Expected `maxAttempts` to be an integer >= 1');
  }
}

export function fixedDelay(
  maxAttempts: number = CONFIG.RETRY.ATTEMPTS,
  delayMs: number = CONFIG.RETRY.DELAY_MS,
): RetryPolicy {
  assertAttempts(maxAttempts);
  return { maxAttempts, delayMs: () => delayMs };
}

export function exponentialBackoff(maxAttempts: number, baseMs: number, maxMs = Infinity): RetryPolicy {
  assertAttempts(maxAttempts);
  return { maxAttempts, delayMs: (attempt) => Math.min(maxMs, baseMs * Math.pow(2, attempt - 1)) };
}

export const delayMs: Sleep = (ms) =>
  new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));

/**
 * Execute one request until it answers 200 or the policy runs out.
 *
 * Transport errors and any non-200 status both count as a failed attempt. After
 * the last attempt the last transport error is rethrown, or a SourceFetchError
 * carrying the status when the last attempt got a response.
 */
export async function fetchWithRetry(
  client: HttpClient,
  request: HttpRequest,
  opts?: FetchRetryOptions,
): Promise<HttpResponse> {
  const policy = opts?.policy ?? fixedDelay();
  const sleep = opts?.sleep ?? delayMs;
  const url = redactUrl(request.url);

  let lastError: Error | undefined;
  let lastStatus = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const res = await client.send(request);
      if (res.status === 200) {
        incFetchAttempt('success');
        return res;
      }
      incFetchAttempt('bad_status');
      lastError = undefined;
      lastStatus = res.status;
      logger.debug({ url, attempt, status: res.status }, 'fetchWithRetry received non-200');
    } catch (err) {
      incFetchAttempt('error');
      lastError = toError(err);
      logger.debug({ url, attempt, err: lastError }, 'fetchWithRetry network error');
    }

    if (attempt < policy.maxAttempts) {
      await sleep(policy.delayMs(attempt));
    }
  }

  if (lastError) throw lastError;
  throw new SourceFetchError(url, lastStatus, policy.maxAttempts);
}

export default fetchWithRetry;
