import { RunConfig, sourceDescriptors, SourceDescriptor } from './config';
import { SubdomainAggregator } from './aggregator';
import { HostLookup, validateSubdomains } from './dns';
import logger from './logger';
import { incSourceRequest, observeSourceDuration } from './metrics';
import { fixedDelay, FetchRetryOptions, RetryPolicy, Sleep } from './net/fetchWithRetry';
import { createHttpClient, FetchLike, HttpClient, ProxyProbe } from './net/httpClient';
import { guardReporter, noopReporter, ResultsReporter } from './reporter';
import { fetchSource, SOURCE_ADAPTERS, SourceAdapter } from './sources';
import type { RunResult, SourceName, SourceReport } from './types';

export interface EnumeratorDeps {
  reporter?: ResultsReporter;
  fetchImpl?: FetchLike;
  probe?: ProxyProbe;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  lookup?: HostLookup;
  adapters?: Partial<Record<SourceName, SourceAdapter>>;
  now?: () => Date;
}

async function runSource(
  adapter: SourceAdapter,
  descriptor: SourceDescriptor,
  domain: string,
  client: HttpClient,
  aggregator: SubdomainAggregator,
  reporter: ResultsReporter,
  retry: FetchRetryOptions,
): Promise<SourceReport> {
  if (!descriptor.enabled) {
    const reason = 'no API key configured';
    logger.info({ source: descriptor.name }, `${descriptor.name} not configured, skipping`);
    reporter.sourceSkipped(descriptor.name, reason);
    incSourceRequest(descriptor.name, 'skipped');
    return { source: descriptor.name, status: 'skipped', findings: 0, added: 0, durationMs: 0 };
  }

  const started = Date.now();
  const { findings, error } = await fetchSource(adapter, descriptor, domain, {
    client,
    retry,
  });
  const summary = await aggregator.recordAll(findings, descriptor.name);
  const durationMs = Date.now() - started;

  observeSourceDuration(descriptor.name, durationMs / 1000);
  if (error) {
    reporter.sourceFailed(descriptor.name, error);
    incSourceRequest(descriptor.name, 'failed');
    return { source: descriptor.name, status: 'failed', findings: 0, added: 0, durationMs, error: error.message };
  }
  incSourceRequest(descriptor.name, 'ok');
  logger.debug({ source: descriptor.name, findings: findings.length, added: summary.added, durationMs }, 'source finished');
  return { source: descriptor.name, status: 'ok', findings: findings.length, added: summary.added, durationMs };
}

/**
 * Run every enabled source concurrently against one domain and collect the results.
 *
 * Building the HTTP client happens first, so a bad or unreachable proxy rejects
 * with ConfigError before any source is queried. Past that point the returned
 * promise always resolves: source failures only show up in `sources[].status`.
 */
export async function enumerateSubdomains(config: Readonly<RunConfig>, deps: EnumeratorDeps = {}): Promise<RunResult> {
  const reporter = guardReporter(deps.reporter ?? noopReporter);
  const retry: FetchRetryOptions = { policy: deps.retryPolicy ?? fixedDelay(), sleep: deps.sleep };
  const client = await createHttpClient({
    timeoutMs: config.timeoutMs,
    proxyUrl: config.proxyUrl,
    fetchImpl: deps.fetchImpl,
    probe: deps.probe,
  });

  try {
    const aggregator = new SubdomainAggregator(reporter, deps.now);
    const adapterFor = (name: SourceName): SourceAdapter => deps.adapters?.[name] ?? SOURCE_ADAPTERS[name];
    const descriptors = sourceDescriptors(config.credentials);

    logger.info(
      { domain: config.domain, sources: descriptors.filter((d) => d.enabled).map((d) => d.name) },
      'starting enumeration',
    );

    const sources = await Promise.all(
      descriptors.map((d) => runSource(adapterFor(d.name), d, config.domain, client, aggregator, reporter, retry)),
    );
    await aggregator.close();

    const result: RunResult = {
      domain: config.domain,
      subdomains: aggregator.list(),
      entries: aggregator.entries(),
      sources,
    };

    if (config.validate) {
      result.liveness = await validateSubdomains(result.subdomains, {
        concurrency: config.concurrency,
        lookup: deps.lookup,
        onActive: (host) => reporter.active(host),
      });
    }

    logger.info({ domain: config.domain, total: result.subdomains.length }, 'enumeration complete');
    reporter.completed(result);
    return result;
  } finally {
    await client.close();
  }
}

export default enumerateSubdomains;
