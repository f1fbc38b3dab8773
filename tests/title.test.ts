import { describe, it, expect } from 'vitest';
import { analyzeTitle } from '../src/checks/title.js';
import { CheerioDocument } from '../src/document.js';

const withTitle = (title: string) => CheerioDocument.parse(`<html><head><title>${title}</title></head><body></body></html>`);

describe('analyzeTitle', () => {
  it('fails when <title> is missing', () => {
    const result = analyzeTitle(CheerioDocument.parse('<html><head></head><body><h1>x</h1></body></html>'));
    expect(result.status).toBe('fail');
    expect(result.verdict).toBe(false);
    expect(result.metrics.present).toBe(false);
    expect(result.findings[0].message).toBe('Missing <title>; search engines cannot tell what the page is about');
  });

  it('passes a 30-character CJK title', () => {
    const result = analyzeTitle(withTitle('中文网站搜索引擎优化基础检查工具帮助站长快速了解页面标题内容'));
    expect(result.status).toBe('pass');
    expect(result.verdict).toBe(true);
    expect(result.metrics).toMatchObject({ length: 30, language: 'cjk', recommendedMin: 30, recommendedMax: 50 });
  });

  it('fails a short latin title', () => {
    const result = analyzeTitle(withTitle('Short'));
    expect(result.status).toBe('fail');
    expect(result.metrics).toMatchObject({ length: 5, language: 'latin' });
    expect(result.findings[1]).toEqual({ level: 'fail', message: 'Too short (5); aim for 50-60 characters' });
  });

  it('applies the latin bands', () => {
    expect(analyzeTitle(withTitle('Guide to Structured Content for Websites')).status).toBe('warn');
    expect(analyzeTitle(withTitle('A Practical Guide to Structured Content for Modern Websites')).status).toBe('pass');
    const long = analyzeTitle(withTitle('A Practical Guide to Structured Content and Metadata for Modern Websites'));
    expect(long.status).toBe('warn');
    expect(long.metrics.length).toBe(72);
    expect(long.verdict).toBe(false);
  });

  it('applies the CJK bands', () => {
    expect(analyzeTitle(withTitle('中文网站搜索引擎优化')).status).toBe('fail');
    expect(analyzeTitle(withTitle('中文网站搜索引擎优化基础检查工具')).status).toBe('warn');
  });

  it('collapses whitespace before measuring', () => {
    const result = analyzeTitle(withTitle('  Hello \n  World  '));
    expect(result.metrics.title).toBe('Hello World');
    expect(result.metrics.length).toBe(11);
  });

  it('measures an empty title as zero length', () => {
    const result = analyzeTitle(withTitle(''));
    expect(result.metrics.present).toBe(true);
    expect(result.status).toBe('fail');
  });
});
