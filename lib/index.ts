export { enumerateSubdomains } from './enumerator';
export type { EnumeratorDeps } from './enumerator';
export { SubdomainAggregator } from './aggregator';
export type { RecordSummary } from './aggregator';
export { CONFIG, credentialsFromEnv, loadRunConfig, sourceDescriptors } from './config';
export type { Credentials, RunConfig, RunConfigInput, SourceDescriptor } from './config';
export { isActive, systemLookup, validateSubdomains } from './dns';
export type { HostLookup, LivenessOptions, ValidateOptions } from './dns';
export * from './errors';
export { register } from './metrics';
export { createHttpClient, redactUrl, tcpProbe } from './net/httpClient';
export type { FetchLike, HttpClient, HttpRequest, HttpResponse, ProxyProbe } from './net/httpClient';
export { delayMs, exponentialBackoff, fetchWithRetry, fixedDelay } from './net/fetchWithRetry';
export type { RetryPolicy, Sleep } from './net/fetchWithRetry';
export { ConsoleReporter, guardReporter, noopReporter } from './reporter';
export type { ResultsReporter } from './reporter';
export { SOURCE_ADAPTERS, fetchSource } from './sources';
export type { SourceAdapter, SourceContext, SourceFetchResult } from './sources';
export * from './types';
