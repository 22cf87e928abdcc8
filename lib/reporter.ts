import { toError } from './errors';
import logger from './logger';
import type { RunResult, SourceName } from './types';

/**
 * Append-only sink for run events. Calls arrive while sources are still running,
 * with `completed` last.
 */
export interface ResultsReporter {
  discovered(host: string, source: SourceName): void;
  wildcardIgnored(value: string, source: SourceName): void;
  sourceSkipped(source: SourceName, reason: string): void;
  sourceFailed(source: SourceName, error: Error): void;
  active(host: string): void;
  completed(result: RunResult): void;
}

export const noopReporter: ResultsReporter = {
  discovered() {},
  wildcardIgnored() {},
  sourceSkipped() {},
  sourceFailed() {},
  active() {},
  completed() {},
};

function shielded(event: keyof ResultsReporter, call: () => void): void {
  try {
    call();
  } catch (err) {
    logger.warn({ err: toError(err), event }, 'reporter failed, continuing');
  }
}

/**
 * Wrap a sink so a throwing callback is logged instead of aborting the run.
 */
export function guardReporter(reporter: ResultsReporter): ResultsReporter {
  return {
    discovered: (host, source) => shielded('discovered', () => reporter.discovered(host, source)),
    wildcardIgnored: (value, source) => shielded('wildcardIgnored', () => reporter.wildcardIgnored(value, source)),
    sourceSkipped: (source, reason) => shielded('sourceSkipped', () => reporter.sourceSkipped(source, reason)),
    sourceFailed: (source, error) => shielded('sourceFailed', () => reporter.sourceFailed(source, error)),
    active: (host) => shielded('active', () => reporter.active(host)),
    completed: (result) => shielded('completed', () => reporter.completed(result)),
  };
}

/**
 * Plain-text reporter for terminals: one line per event, then the final listing.
 */
export class ConsoleReporter implements ResultsReporter {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  private line(text: string): void {
    this.out.write(`${text}\n`);
  }

  discovered(host: string, source: SourceName): void {
    this.line(`[${source}] ${host}`);
  }

  wildcardIgnored(): void {
    // logged by the aggregator; too noisy for the terminal
  }

  sourceSkipped(source: SourceName, reason: string): void {
    this.line(`${source} skipped: ${reason}`);
  }

  sourceFailed(source: SourceName, error: Error): void {
    this.line(`${source} failed: ${error.message}`);
  }

  active(host: string): void {
    this.line(`[alive] ${host}`);
  }

  completed(result: RunResult): void {
    const title = `=== Unique Subdomains Found for ${result.domain} (${result.subdomains.length}) ===`;
    const alive = result.liveness ? new Set(result.liveness.active) : undefined;
    this.line('');
    this.line(title);
    for (const host of result.subdomains) {
      if (!alive) this.line(host);
      else this.line(`${host}${alive.has(host) ? ' [active]' : ' [inactive]'}`);
    }
    this.line('='.repeat(title.length));
  }
}

export default ConsoleReporter;
