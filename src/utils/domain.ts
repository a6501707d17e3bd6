const IPV4_REGEX = /^\d{1,3}(\.\d{1,3}){3}$/;

// Second-level labels that belong to the public suffix (example.co.uk → domain "example")
const SECOND_LEVEL_SUFFIXES = new Set([
  'ac', 'co', 'com', 'edu', 'gov', 'net', 'org', 'mil', 'ltd', 'plc', 'gob', 'nic',
]);

export interface HostParts {
  hostname: string;
  subdomain: string;
  domain: string;
  suffix: string;
}

export function isIpAddress(hostname: string): boolean {
  return IPV4_REGEX.test(hostname) || hostname.includes(':') || hostname.startsWith('[');
}

/**
 * Split a hostname into subdomain, registrable label and public suffix.
 * IP addresses and single-label hosts yield an empty suffix.
 */
export function splitHost(hostname: string): HostParts {
  const host = hostname.toLowerCase().replace(/\.$/, '');

  if (isIpAddress(host)) {
    return { hostname: host, subdomain: '', domain: '', suffix: '' };
  }

  const labels = host.split('.').filter(label => label.length > 0);
  if (labels.length <= 1) {
    return { hostname: host, subdomain: '', domain: labels[0] ?? '', suffix: '' };
  }

  let suffixLength = 1;
  const secondLevel = labels[labels.length - 2];
  const topLevel = labels[labels.length - 1];
  if (
    labels.length >= 3 &&
    secondLevel !== undefined &&
    topLevel !== undefined &&
    topLevel.length === 2 &&
    SECOND_LEVEL_SUFFIXES.has(secondLevel)
  ) {
    suffixLength = 2;
  }

  const suffix = labels.slice(labels.length - suffixLength).join('.');
  const domain = labels[labels.length - suffixLength - 1] ?? '';
  const subdomain = labels.slice(0, labels.length - suffixLength - 1).join('.');

  return { hostname: host, subdomain, domain, suffix };
}

/**
 * Canonical form used for duplicate detection: lowercase scheme and host,
 * default port dropped, repeated slashes collapsed, no query or fragment.
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);
  const pathname = parsed.pathname.replace(/\/{2,}/g, '/');
  return `${parsed.protocol}//${parsed.host}${pathname}`;
}

export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}
