import { toASCII } from "punycode/";
import * as psl from "psl";

/**
 * Normalize an input string to a host (ASCII/punycode), lowercase, stripped of protocol/path/port.
 * Returns the ASCII host or throws Error if can't parse.
 */
export function normalizeDomain(input: string): string {
  if (!input || typeof input !== "string") {
    throw new Error("Invalid input");
  }

  let s = input.trim();
  if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(s)) {
    s = "http://" + s;
  }

  try {
    const url = new URL(s);
    return toASCII(url.hostname).toLowerCase().replace(/^\.+|\.+$/g, "");
  } catch {
    // bare host with an optional port/path, e.g. "example.com:8080/path"
    const m = input.trim().match(/^([^\/ :]+)(?::\d+)?(?:\/.*)?$/);
    if (m) {
      return toASCII(m[1]).toLowerCase().replace(/^\.+|\.+$/g, "");
    }
    throw new Error("Unable to normalize domain");
  }
}

/**
 * Basic host validation: the registrable domain must be derivable via the public suffix list.
 */
export function isValidHost(host: string): boolean {
  if (!host || typeof host !== "string") return false;
  const cleaned = host.trim().toLowerCase();
  if (/\s/.test(cleaned)) return false;
  let ascii: string;
  try {
    ascii = toASCII(cleaned);
  } catch {
    return false;
  }
  if (ascii.length > 255) return false;
  return psl.get(ascii) !== null;
}

/** A finding such as `*.example.com` stands for every name under it. */
export function isWildcard(value: string): boolean {
  return value.startsWith("*");
}

/** Canonical form used as the dedupe key: trimmed, lowercase, no trailing dot. */
export function normalizeFinding(value: string): string {
  return value.trim().toLowerCase().replace(/\.$/, "");
}

/**
 * Turn a short label returned by an API ("mail") into a full host ("mail.example.com").
 * Names already under the domain are returned unchanged.
 */
export function qualifyLabel(label: string, domain: string): string {
  const l = label.trim().toLowerCase();
  if (l === domain || l.endsWith(`.${domain}`)) return l;
  return `${l}.${domain}`;
}
