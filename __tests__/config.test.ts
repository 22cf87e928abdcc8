import { credentialsFromEnv, envInt, loadRunConfig, sourceDescriptors } from '../lib/config';
import { ConfigError } from '../lib/errors';

describe('loadRunConfig', () => {
  test('applies defaults and normalizes the domain', () => {
    const config = loadRunConfig({ domain: ' https://Example.COM/path ' });

    expect(config).toEqual({
      domain: 'example.com',
      concurrency: 20,
      timeoutMs: 5000,
      validate: false,
      credentials: {},
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('empty domain is a ConfigError', () => {
    expect(() => loadRunConfig({ domain: '   ' })).toThrow(ConfigError);
  });

  test('non-positive concurrency is a ConfigError naming the field', () => {
    expect(() => loadRunConfig({ domain: 'example.com', concurrency: 0 })).toThrow(/concurrency/);
  });

  test('blank credentials and proxy count as absent', () => {
    const config = loadRunConfig({
      domain: 'example.com',
      proxyUrl: '  ',
      credentials: { securitytrails: ' ', shodan: 'shodan-test-key' },
    });

    expect(config.proxyUrl).toBeUndefined();
    expect(config.credentials).toEqual({ shodan: 'shodan-test-key' });
  });

  test('keeps a proxy URL as given; it is checked when the client is built', () => {
    expect(loadRunConfig({ domain: 'example.com', proxyUrl: 'http://[broken' }).proxyUrl).toBe('http://[broken');
  });
});

describe('credentialsFromEnv', () => {
  test('reads the three API keys, treating empty values as missing', () => {
    const creds = credentialsFromEnv({ SECURITYTRAILS_API_KEY: '', SHODAN_API_KEY: 'shodan-test-key' });
    expect(creds).toEqual({ shodan: 'shodan-test-key' });
    expect(creds.securitytrails).toBeUndefined();
  });
});

describe('sourceDescriptors', () => {
  test('crt.sh is always enabled; keyed sources follow their credential', () => {
    expect(sourceDescriptors({ virustotal: 'vt-test-key' })).toEqual([
      { name: 'crtsh', enabled: true },
      { name: 'securitytrails', enabled: false, credential: undefined },
      { name: 'shodan', enabled: false, credential: undefined },
      { name: 'virustotal', enabled: true, credential: 'vt-test-key' },
    ]);
  });
});

describe('envInt', () => {
  test('reads positive integers', () => {
    expect(envInt('RETRY_ATTEMPTS', 3, { RETRY_ATTEMPTS: '5' })).toBe(5);
  });

  test('falls back on missing, fractional or non-positive values', () => {
    expect(envInt('RETRY_ATTEMPTS', 3, {})).toBe(3);
    expect(envInt('RETRY_ATTEMPTS', 3, { RETRY_ATTEMPTS: '2.5' })).toBe(3);
    expect(envInt('RETRY_ATTEMPTS', 3, { RETRY_ATTEMPTS: '0' })).toBe(3);
    expect(envInt('RETRY_ATTEMPTS', 3, { RETRY_ATTEMPTS: 'many' })).toBe(3);
  });
});
