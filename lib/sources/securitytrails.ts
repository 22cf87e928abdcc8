import { qualifyLabel } from '../subdomain';
import { isRecord, SourceAdapter, stringsOf } from './fetchSource';

const SECURITYTRAILS_BASE = 'https://api.securitytrails.com/v1';

/**
 * SecurityTrails answers with bare labels (`["www", "mail"]`) that are joined to the domain.
 */
export const securityTrailsSource: SourceAdapter = {
  name: 'securitytrails',
  requiresCredential: true,

  buildRequest(domain, apiKey = '') {
    return {
      url: `${SECURITYTRAILS_BASE}/domain/${encodeURIComponent(domain)}/subdomains`,
      headers: { APIKEY: apiKey },
    };
  },

  parse(data, domain) {
    if (!isRecord(data)) return [];
    return stringsOf(data.subdomains)
      .filter((label) => label.trim())
      .map((label) => qualifyLabel(label, domain));
  },
};

export default securityTrailsSource;
