import { describe, expect, it } from 'vitest';
import {
  detectLinks,
  getForbiddenLinks,
  isDomainAllowed,
  normalizeDomain,
  stripLinks,
} from '../src/moderation/link-detector';

describe('link detector', () => {
  it('detects plain links', () => {
    const links = getForbiddenLinks('check https://example.com/path', []);
    expect(links).toHaveLength(1);
    expect(links[0].domain).toBe('example.com');
  });

  it('detects www hosts without a scheme', () => {
    const links = detectLinks('www.Example.com/page is down');
    expect(links).toEqual([{ raw: 'www.Example.com/page', domain: 'example.com' }]);
  });

  it('does not count the www part of a full url twice', () => {
    const links = detectLinks('https://www.example.com');
    expect(links).toHaveLength(1);
    expect(links[0].domain).toBe('example.com');
  });

  it('detects messenger invite links', () => {
    const links = detectLinks('join t.me/my_channel now');
    expect(links).toEqual([{ raw: 't.me/my_channel', domain: 't.me' }]);
  });

  it('deduplicates repeated links', () => {
    expect(detectLinks('https://example.com/a and https://example.com/a')).toHaveLength(1);
  });

  it('strips trailing punctuation and brackets', () => {
    expect(detectLinks('see https://example.com/page.')[0].raw).toBe('https://example.com/page');
    expect(detectLinks('(https://example.com)')[0].raw).toBe('https://example.com');
  });

  it('does not treat email address as link', () => {
    expect(getForbiddenLinks('email: ivan.petrov@example.com', [])).toHaveLength(0);
  });

  it('does not treat russian abbreviations with dots as links', () => {
    expect(getForbiddenLinks('г.Москва, ул.Ленина', [])).toHaveLength(0);
  });

  it('allows whitelisted domains including subdomains', () => {
    expect(getForbiddenLinks('https://blog.allowed.com/post', ['allowed.com'])).toHaveLength(0);
    expect(isDomainAllowed('notallowed.com', ['allowed.com'])).toBe(false);
  });

  it('normalizes domains', () => {
    expect(normalizeDomain('WWW.Example.COM.')).toBe('example.com');
    expect(normalizeDomain('https://sub.example.org/path')).toBe('sub.example.org');
    expect(normalizeDomain('   ')).toBeNull();
  });

  it('removes links from text', () => {
    expect(stripLinks('CHECK THIS OUT http://spam.example').trim()).toBe('CHECK THIS OUT');
  });
});
