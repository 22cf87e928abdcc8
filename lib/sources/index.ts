import type { SourceName } from '../types';
import crtshSource from './crtsh';
import type { SourceAdapter } from './fetchSource';
import securityTrailsSource from './securitytrails';
import shodanSource from './shodan';
import virusTotalSource from './virustotal';

export const SOURCE_ADAPTERS: Readonly<Record<SourceName, SourceAdapter>> = {
  crtsh: crtshSource,
  securitytrails: securityTrailsSource,
  shodan: shodanSource,
  virustotal: virusTotalSource,
};

export { crtshSource, securityTrailsSource, shodanSource, virusTotalSource };
export { fetchSource } from './fetchSource';
export type { SourceAdapter, SourceContext, SourceFetchResult } from './fetchSource';
