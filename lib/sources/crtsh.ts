import { isRecord, SourceAdapter } from './fetchSource';

/**
 * crt.sh — Certificate Transparency log search.
 * Completely free, no auth required. Each record's `name_value` may hold several
 * newline-separated names, wildcards included.
 */
export const crtshSource: SourceAdapter = {
  name: 'crtsh',
  requiresCredential: false,

  buildRequest(domain) {
    return { url: `https://crt.sh/?q=%25.${encodeURIComponent(domain)}&output=json` };
  },

  parse(data) {
    if (!Array.isArray(data)) return [];
    const names: string[] = [];
    for (const cert of data) {
      if (!isRecord(cert) || typeof cert.name_value !== 'string') continue;
      for (const name of cert.name_value.split(/\r?\n/)) {
        if (name.trim()) names.push(name);
      }
    }
    return names;
  },
};

export default crtshSource;
