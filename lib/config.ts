// Runtime defaults for timeouts, retries and concurrency, read from env with sane
// fallbacks, plus validation of the per-run configuration.
import { z } from 'zod';
import { ConfigError } from './errors';
import logger from './logger';
import { isValidHost, normalizeDomain } from './subdomain';
import type { SourceName } from './types';

/** Positive integer from env; anything else (blank, fractional, negative) falls back. */
export function envInt(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 5000),
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),

  RETRY: {
    ATTEMPTS: envInt('RETRY_ATTEMPTS', 3),
    DELAY_MS: envInt('RETRY_DELAY_MS', 2000),
  },

  CONCURRENCY: {
    DEFAULT: envInt('CONCURRENCY_DEFAULT', 20),
  },

  USER_AGENT: process.env.SUBSWEEP_USER_AGENT || 'subsweep/0.1',
};

export interface Credentials {
  securitytrails?: string;
  shodan?: string;
  virustotal?: string;
}

export interface RunConfig {
  domain: string;
  concurrency: number;
  timeoutMs: number;
  proxyUrl?: string;
  validate: boolean;
  credentials: Credentials;
}

export interface SourceDescriptor {
  readonly name: SourceName;
  readonly enabled: boolean;
  readonly credential?: string;
}

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const runConfigSchema = z.object({
  domain: z.string().trim().min(1, 'domain is required'),
  concurrency: z.coerce.number().int().positive().default(CONFIG.CONCURRENCY.DEFAULT),
  timeoutMs: z.coerce.number().int().positive().default(CONFIG.HTTP_TIMEOUT_MS),
  proxyUrl: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined)),
  validate: z.boolean().default(false),
  credentials: z
    .object({
      securitytrails: optionalSecret,
      shodan: optionalSecret,
      virustotal: optionalSecret,
    })
    .default({}),
});

export type RunConfigInput = z.input<typeof runConfigSchema>;

/**
 * Pull API credentials from the environment. Empty values count as missing.
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    securitytrails: env.SECURITYTRAILS_API_KEY || undefined,
    shodan: env.SHODAN_API_KEY || undefined,
    virustotal: env.VIRUSTOTAL_API_KEY || undefined,
  };
}

/**
 * Validate raw options into an immutable RunConfig.
 * Throws ConfigError on anything unusable. The domain is normalized but a host that
 * fails public-suffix validation only produces a warning.
 */
export function loadRunConfig(input: RunConfigInput): Readonly<RunConfig> {
  const parsed = runConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration: ${detail}`, { cause: parsed.error });
  }

  let domain: string;
  try {
    domain = normalizeDomain(parsed.data.domain);
  } catch (err) {
    throw new ConfigError(`invalid domain "${parsed.data.domain}"`, { cause: err });
  }
  if (!domain) throw new ConfigError(`invalid domain "${parsed.data.domain}"`);
  if (!isValidHost(domain)) {
    logger.warn({ domain }, 'domain has no recognised public suffix, continuing anyway');
  }

  return Object.freeze({ ...parsed.data, domain, credentials: Object.freeze({ ...parsed.data.credentials }) });
}

/**
 * Build one descriptor per source. crt.sh is public and always on; keyed
 * sources are enabled only when their credential is present.
 */
export function sourceDescriptors(credentials: Credentials): SourceDescriptor[] {
  return [
    { name: 'crtsh', enabled: true },
    { name: 'securitytrails', enabled: !!credentials.securitytrails, credential: credentials.securitytrails },
    { name: 'shodan', enabled: !!credentials.shodan, credential: credentials.shodan },
    { name: 'virustotal', enabled: !!credentials.virustotal, credential: credentials.virustotal },
  ];
}

export default CONFIG;
