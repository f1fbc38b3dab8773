import { describe, it, expect } from 'vitest';
import { normalizeUrl, isAbsoluteUrl, resolveUrl } from '../src/url.js';

describe('normalizeUrl', () => {
  it('drops scheme and trailing slash', () => {
    expect(normalizeUrl('https://a.com/p/')).toBe('a.com/p');
    expect(normalizeUrl('https://a.com/p/')).toBe(normalizeUrl('http://a.com/p'));
  });

  it('drops query and fragment', () => {
    expect(normalizeUrl('https://a.com/p?x=1#top')).toBe('a.com/p');
  });

  it('keeps the port', () => {
    expect(normalizeUrl('http://a.com:8080/p/')).toBe('a.com:8080/p');
  });

  it('reduces a root URL to the host', () => {
    expect(normalizeUrl('https://a.com/')).toBe('a.com');
  });

  it('is idempotent', () => {
    for (const u of ['https://a.com/p/', 'http://a.com:8080/x/y//', 'https://a.com', '//cdn.a.com/x/', '/relative/path/']) {
      const once = normalizeUrl(u);
      expect(normalizeUrl(once)).toBe(once);
    }
  });

  it('handles protocol-relative URLs', () => {
    expect(normalizeUrl('//cdn.a.com/x/')).toBe('cdn.a.com/x');
  });
});

describe('isAbsoluteUrl / resolveUrl', () => {
  it('detects absolute URLs', () => {
    expect(isAbsoluteUrl('https://a.com/x')).toBe(true);
    expect(isAbsoluteUrl('/x')).toBe(false);
  });

  it('resolves relative references', () => {
    expect(resolveUrl('/page', 'https://ex.com/other/')).toBe('https://ex.com/page');
    expect(resolveUrl('/page', 'not a url')).toBeUndefined();
  });
});
