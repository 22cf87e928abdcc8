export type SourceName = 'crtsh' | 'securitytrails' | 'shodan' | 'virustotal';

export interface SubdomainEntry {
  host: string; // full host, e.g. "api.example.com"
  sources: SourceName[]; // every source that reported it, first reporter first
  firstSeen: string; // ISO timestamp
}

export type RecordOutcome = 'added' | 'duplicate' | 'wildcard' | 'empty';

export type SourceStatus = 'ok' | 'failed' | 'skipped';

export interface SourceReport {
  source: SourceName;
  status: SourceStatus;
  findings: number; // raw findings parsed from the response
  added: number; // findings that were new to the run
  durationMs: number;
  error?: string;
}

export interface LivenessResult {
  active: string[];
  inactive: string[];
}

export interface RunResult {
  domain: string;
  subdomains: string[]; // unique, wildcard-free, first-seen order
  entries: SubdomainEntry[];
  sources: SourceReport[];
  liveness?: LivenessResult;
}
