// src/services/retrieval/trusted-domains.ts

export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * True when `domain` equals an allow-listed domain or is a subdomain of one.
 */
export function isTrustedDomain(domain: string, allowList: readonly string[]): boolean {
  const host = domain.toLowerCase().replace(/^www\./, '');
  return allowList.some((allowed) => host === allowed || host.endsWith(`.${allowed}`));
}
