import dns from 'dns/promises';
import pLimit from 'p-limit';
import { CONFIG } from './config';
import logger from './logger';
import { withTimeout } from './net/timeout';
import type { LivenessResult } from './types';

/** Resolve a host to its addresses; rejects when resolution fails. */
export type HostLookup = (host: string) => Promise<string[]>;

export const systemLookup: HostLookup = async (host) => {
  const records = await dns.lookup(host, { all: true });
  return records.map((r) => r.address);
};

export interface LivenessOptions {
  lookup?: HostLookup;
  timeoutMs?: number;
}

export interface ValidateOptions extends LivenessOptions {
  concurrency?: number;
  onActive?: (host: string) => void;
}

/**
 * A host is active when a single lookup returns at least one address.
 * Errors and timeouts mean inactive; nothing is thrown.
 */
export async function isActive(host: string, opts?: LivenessOptions): Promise<boolean> {
  const lookup = opts?.lookup ?? systemLookup;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  try {
    const addresses = await withTimeout(lookup(host), timeoutMs, `lookup ${host}`);
    return addresses.length > 0;
  } catch (err) {
    logger.debug({ err, host }, 'lookup failed, marking inactive');
    return false;
  }
}

/**
 * Check every host with at most `concurrency` lookups in flight.
 * Output lists keep the input order.
 */
export async function validateSubdomains(hosts: string[], opts?: ValidateOptions): Promise<LivenessResult> {
  const limit = pLimit(opts?.concurrency ?? CONFIG.CONCURRENCY.DEFAULT);
  const checks = hosts.map((host) =>
    limit(async () => {
      const alive = await isActive(host, opts);
      if (alive) opts?.onActive?.(host);
      return alive;
    }),
  );
  const results = await Promise.all(checks);

  const liveness: LivenessResult = { active: [], inactive: [] };
  hosts.forEach((host, i) => (results[i] ? liveness.active : liveness.inactive).push(host));
  logger.info({ active: liveness.active.length, inactive: liveness.inactive.length }, 'liveness check complete');
  return liveness;
}
