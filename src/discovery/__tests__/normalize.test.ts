import { describe, it, expect } from 'vitest';
import { normalizeUrl, hostMatchesDomain, ledgerDomain, stripWww } from '../normalize.js';

describe('normalizeUrl', () => {
  it('lowercases scheme and host but not the path', () => {
    expect(normalizeUrl('HTTPS://Example.COM/Recipes/Lamb-Stew')).toBe('https://example.com/Recipes/Lamb-Stew');
  });

  it('drops tracking params and the fragment, sorts the rest', () => {
    expect(
      normalizeUrl('https://example.com/stew/?utm_source=news&b=2&fbclid=xyz&a=1#comments'),
    ).toBe('https://example.com/stew?a=1&b=2');
  });

  it('strips every trailing slash', () => {
    expect(normalizeUrl('https://example.com/stew///')).toBe('https://example.com/stew');
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('maps tracking variants of one page to the same key', () => {
    const a = normalizeUrl('https://example.com/pie?ref=home');
    const b = normalizeUrl('https://EXAMPLE.com/pie/#top');
    const c = normalizeUrl('https://example.com/pie?mc_cid=1&mc_eid=2&campaign=spring');
    expect(a).toBe('https://example.com/pie');
    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it('is idempotent', () => {
    const once = normalizeUrl('https://Example.com/a/b/?z=1&y=2&utm_medium=x');
    expect(normalizeUrl(once)).toBe(once);
  });

  it('keeps an explicit port', () => {
    expect(normalizeUrl('http://localhost:8080/x/')).toBe('http://localhost:8080/x');
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('hostMatchesDomain', () => {
  it('matches the domain itself and its subdomains', () => {
    expect(hostMatchesDomain('example.com', 'example.com')).toBe(true);
    expect(hostMatchesDomain('www.example.com', 'example.com')).toBe(true);
    expect(hostMatchesDomain('notexample.com', 'example.com')).toBe(false);
  });

  it('supports leading-dot wildcard entries', () => {
    expect(hostMatchesDomain('blog.example.com', '.example.com')).toBe(true);
    expect(hostMatchesDomain('example.com', '.example.com')).toBe(true);
  });

  it('never matches an empty domain', () => {
    expect(hostMatchesDomain('example.com', '  ')).toBe(false);
  });
});

describe('ledgerDomain', () => {
  it('is the lowercase host without www', () => {
    expect(ledgerDomain('https://WWW.Example.com/stew')).toBe('example.com');
    expect(ledgerDomain('https://blog.example.com/stew')).toBe('blog.example.com');
    expect(ledgerDomain('nope')).toBe('');
  });

  it('matches stripWww for bare hosts', () => {
    expect(stripWww('www.Example.com')).toBe('example.com');
  });
});
