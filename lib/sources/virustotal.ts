import { qualifyLabel } from '../subdomain';
import { isRecord, SourceAdapter } from './fetchSource';

const VIRUSTOTAL_BASE = 'https://www.virustotal.com/api/v3';

function entryName(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry;
  if (isRecord(entry) && typeof entry.id === 'string') return entry.id;
  return undefined;
}

/**
 * VirusTotal v3 returns `{ data: [{ id: "a.example.com", type: "domain" }, ...] }`.
 * Amass-style mirrors of the same endpoint answer with a flat array instead, and
 * some of them return bare labels. Both shapes are accepted here: names under the
 * domain pass through, dot-less labels get the domain appended, anything else is
 * left as reported.
 */
export const virusTotalSource: SourceAdapter = {
  name: 'virustotal',
  requiresCredential: true,

  buildRequest(domain, apiKey = '') {
    return {
      url: `${VIRUSTOTAL_BASE}/domains/${encodeURIComponent(domain)}/subdomains?limit=40`,
      headers: { 'x-apikey': apiKey },
    };
  },

  parse(data, domain) {
    let entries: unknown[];
    if (Array.isArray(data)) entries = data;
    else if (isRecord(data) && Array.isArray(data.data)) entries = data.data;
    else return [];

    const names: string[] = [];
    for (const entry of entries) {
      const name = entryName(entry)?.trim();
      if (!name) continue;
      names.push(name.includes('.') ? name : qualifyLabel(name, domain));
    }
    return names;
  },
};

export default virusTotalSource;
