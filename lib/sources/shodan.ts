import { qualifyLabel } from '../subdomain';
import { isRecord, SourceAdapter, stringsOf } from './fetchSource';

const SHODAN_BASE = 'https://api.shodan.io';

export const shodanSource: SourceAdapter = {
  name: 'shodan',
  requiresCredential: true,

  buildRequest(domain, apiKey = '') {
    return {
      url: `${SHODAN_BASE}/dns/domain/${encodeURIComponent(domain)}?key=${encodeURIComponent(apiKey)}`,
    };
  },

  // Same label-only shape as SecurityTrails.
  parse(data, domain) {
    if (!isRecord(data)) return [];
    return stringsOf(data.subdomains)
      .filter((label) => label.trim())
      .map((label) => qualifyLabel(label, domain));
  },
};

export default shodanSource;
