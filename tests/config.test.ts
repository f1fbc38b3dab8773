import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, createConfig, findBlockedSite, isCjkHinted } from '../src/config.js';

describe('config', () => {
  it('is deeply frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.stopWords)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.title.cjk)).toBe(true);
  });

  it('creates frozen copies with overrides', () => {
    const config = createConfig({ blockedSites: ['example.org'] });
    expect(config.blockedSites).toEqual(['example.org']);
    expect(config.stopWords).toBe(DEFAULT_CONFIG.stopWords);
    expect(Object.isFrozen(config)).toBe(true);
    expect(DEFAULT_CONFIG.blockedSites).toContain('bbc.com');
  });

  it('detects CJK site hints', () => {
    expect(isCjkHinted('https://www.gov.cn/')).toBe(true);
    expect(isCjkHinted('https://www.zhihu.com/question/1')).toBe(true);
    expect(isCjkHinted('https://example.com/')).toBe(false);
  });

  it('matches blocked sites case-insensitively', () => {
    expect(findBlockedSite('https://WWW.YouTube.com/watch?v=1')).toBe('youtube.com');
    expect(findBlockedSite('https://example.com/')).toBeUndefined();
  });
});
