import { describe, expect, it } from 'vitest';
import { hostnameOf, isTrustedDomain } from './trusted-domains';

describe('isTrustedDomain', () => {
  const allowList = ['cisa.gov', 'nist.gov'];

  it('accepts exact domains and subdomains', () => {
    expect(isTrustedDomain('cisa.gov', allowList)).toBe(true);
    expect(isTrustedDomain('www.cisa.gov', allowList)).toBe(true);
    expect(isTrustedDomain('csrc.nist.gov', allowList)).toBe(true);
    expect(isTrustedDomain('NVD.NIST.GOV', allowList)).toBe(true);
  });

  it('rejects lookalike domains', () => {
    expect(isTrustedDomain('evilcisa.gov', allowList)).toBe(false);
    expect(isTrustedDomain('cisa.gov.example.com', allowList)).toBe(false);
    expect(isTrustedDomain('example.com', allowList)).toBe(false);
  });
});

describe('hostnameOf', () => {
  it('extracts the lower-cased hostname', () => {
    expect(hostnameOf('https://WWW.nist.gov/cyberframework')).toBe('www.nist.gov');
  });

  it('returns null for something that is not a URL', () => {
    expect(hostnameOf('not a url')).toBeNull();
  });
});
