import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { CONFIG, credentialsFromEnv, loadRunConfig } from './config';
import { enumerateSubdomains } from './enumerator';
import { ConfigError } from './errors';
import { ConsoleReporter } from './reporter';
import pkg from '../package.json';

export type CliOptions = {
  domain: string;
  concurrency: number;
  proxy?: string;
  timeout: number;
  validate: boolean;
};

export interface CliDeps {
  out?: NodeJS.WritableStream;
  err?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  enumerate?: typeof enumerateSubdomains;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('subsweep')
    .description('Enumerate subdomains from certificate transparency, SecurityTrails, Shodan and VirusTotal')
    .version(pkg.version)
    .requiredOption('-d, --domain <domain>', 'domain to enumerate')
    .option('-c, --concurrency <n>', 'max DNS lookups in flight with --validate', parsePositiveInt, CONFIG.CONCURRENCY.DEFAULT)
    .option('-p, --proxy <url>', 'HTTP(S) proxy for every source request')
    .option('-t, --timeout <ms>', 'overall timeout per HTTP request', parsePositiveInt, CONFIG.HTTP_TIMEOUT_MS)
    .option('--validate', 'resolve each result and mark it active or inactive', false)
    .addHelpText(
      'after',
      '\nAPI keys are read from SECURITYTRAILS_API_KEY, SHODAN_API_KEY and VIRUSTOTAL_API_KEY.\n' +
        'Without any key only crt.sh is queried.',
    );
}

/**
 * Parse argv, run one enumeration and return the process exit code.
 * Configuration problems map to 1; source failures never change the exit code.
 */
export async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? process.stdout;
  const err = deps.err ?? process.stderr;
  const enumerate = deps.enumerate ?? enumerateSubdomains;

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.write(s),
      writeErr: (s) => err.write(s),
    });

  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  const opts = program.opts<CliOptions>();

  try {
    const config = loadRunConfig({
      domain: opts.domain,
      concurrency: opts.concurrency,
      timeoutMs: opts.timeout,
      proxyUrl: opts.proxy,
      validate: opts.validate,
      credentials: credentialsFromEnv(deps.env ?? process.env),
    });
    await enumerate(config, { reporter: new ConsoleReporter(out) });
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      err.write(`error: ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}
