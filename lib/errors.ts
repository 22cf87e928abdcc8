/**
 * Error taxonomy for an enumeration run.
 *
 * Only `ConfigError` is allowed to escape the coordinator; everything raised while
 * talking to a source is absorbed at the adapter boundary.
 */

export type ErrorCode = 'CONFIG' | 'SOURCE_FETCH' | 'AGGREGATOR_CLOSED' | 'TIMEOUT';

export class SubsweepError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or unusable configuration; the run must not start. */
export class ConfigError extends SubsweepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/** Retries exhausted against a source that kept answering with a non-200 status. */
export class SourceFetchError extends SubsweepError {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number, attempts: number) {
    super('SOURCE_FETCH', `HTTP ${status} from ${url} after ${attempts} attempt(s)`);
    this.status = status;
    this.url = url;
  }
}

export class AggregatorClosedError extends SubsweepError {
  constructor(value: string) {
    super('AGGREGATOR_CLOSED', `aggregator is closed, rejected write of "${value}"`);
  }
}

export class TimeoutError extends SubsweepError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
