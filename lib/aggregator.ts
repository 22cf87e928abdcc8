import { AggregatorClosedError } from './errors';
import logger from './logger';
import { incDiscovered } from './metrics';
import { guardReporter, noopReporter, ResultsReporter } from './reporter';
import { isWildcard, normalizeFinding } from './subdomain';
import type { RecordOutcome, SourceName, SubdomainEntry } from './types';

export interface RecordSummary {
  added: number;
  duplicate: number;
  wildcard: number;
  empty: number;
}

/**
 * Deduplicating set of subdomains shared by every source task of one run.
 *
 * All check-and-insert steps are serialized through a promise-chain lock; nothing
 * inside the critical section awaits I/O. Insertion order is kept for reporting.
 */
export class SubdomainAggregator {
  private readonly seen = new Map<string, SubdomainEntry>();
  private tail: Promise<unknown> = Promise.resolve();
  private closed = false;
  private readonly reporter: ResultsReporter;

  constructor(
    reporter: ResultsReporter = noopReporter,
    private readonly now: () => Date = () => new Date(),
  ) {
    // a throwing sink must not lose the write or abort the rest of the batch
    this.reporter = guardReporter(reporter);
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const op = this.tail.then(fn);
    // keep the chain alive even if one critical section throws
    this.tail = op.catch(() => undefined);
    return op;
  }

  private insert(raw: string, source: SourceName): RecordOutcome {
    if (this.closed) throw new AggregatorClosedError(raw);

    const value = normalizeFinding(raw);
    if (!value) return 'empty';

    if (isWildcard(value)) {
      logger.info({ value, source }, 'ignoring subdomain with wildcard');
      this.reporter.wildcardIgnored(value, source);
      return 'wildcard';
    }

    const existing = this.seen.get(value);
    if (existing) {
      if (!existing.sources.includes(source)) existing.sources.push(source);
      return 'duplicate';
    }

    this.seen.set(value, { host: value, sources: [source], firstSeen: this.now().toISOString() });
    incDiscovered(source);
    logger.info({ host: value, source }, 'subdomain found');
    this.reporter.discovered(value, source);
    return 'added';
  }

  record(raw: string, source: SourceName): Promise<RecordOutcome> {
    return this.exclusive(() => this.insert(raw, source));
  }

  /**
   * Record a batch from one source. Each finding takes the lock separately so
   * writers from other sources interleave.
   */
  async recordAll(raws: Iterable<string>, source: SourceName): Promise<RecordSummary> {
    const summary: RecordSummary = { added: 0, duplicate: 0, wildcard: 0, empty: 0 };
    for (const raw of raws) {
      const outcome = await this.record(raw, source);
      summary[outcome]++;
    }
    return summary;
  }

  /** Reject further writes once every write queued before this call has landed. */
  close(): Promise<void> {
    return this.exclusive(() => {
      this.closed = true;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.seen.size;
  }

  has(host: string): boolean {
    return this.seen.has(normalizeFinding(host));
  }

  list(): string[] {
    return Array.from(this.seen.keys());
  }

  entries(): SubdomainEntry[] {
    return Array.from(this.seen.values(), (e) => ({ ...e, sources: [...e.sources] }));
  }
}

export default SubdomainAggregator;
