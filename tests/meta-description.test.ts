import { describe, it, expect } from 'vitest';
import { analyzeMetaDescription } from '../src/checks/meta-description.js';
import { CheerioDocument } from '../src/document.js';

const withMeta = (meta: string) => CheerioDocument.parse(`<html><head><title>t</title>${meta}</head><body></body></html>`);
const withDescription = (content: string) => withMeta(`<meta name="description" content="${content}">`);
const latin = (n: number) => 'x'.repeat(n);
const CJK_103 =
  '搜索引擎优化是提升网站自然流量的重要方法，本文从标题、描述、标题标签、图片替代文本和规范链接五个方面介绍基础检查流程，帮助站长快速发现问题并逐步改进页面质量与用户体验，让更多用户找到你的网站内容。欢迎阅读。';

describe('analyzeMetaDescription', () => {
  it('fails without the tag', () => {
    const result = analyzeMetaDescription(withMeta('<meta name="keywords" content="a,b">'));
    expect(result.status).toBe('fail');
    expect(result.verdict).toBe(false);
    expect(result.metrics.present).toBe(false);
  });

  it('warns on empty or absent content', () => {
    for (const meta of ['<meta name="description" content="  ">', '<meta name="description">']) {
      const result = analyzeMetaDescription(withMeta(meta));
      expect(result.status).toBe('warn');
      expect(result.verdict).toBe(false);
      expect(result.metrics.present).toBe(true);
    }
  });

  it('bands latin descriptions', () => {
    expect(analyzeMetaDescription(withDescription(latin(100))).status).toBe('fail');
    expect(analyzeMetaDescription(withDescription(latin(130))).status).toBe('warn');
    expect(analyzeMetaDescription(withDescription(latin(150))).status).toBe('pass');
    expect(analyzeMetaDescription(withDescription(latin(185))).status).toBe('warn');
  });

  it('accepts latin lengths in [140, 180] only', () => {
    expect(analyzeMetaDescription(withDescription(latin(140))).verdict).toBe(true);
    expect(analyzeMetaDescription(withDescription(latin(180))).verdict).toBe(true);
    expect(analyzeMetaDescription(withDescription(latin(139))).verdict).toBe(false);
    expect(analyzeMetaDescription(withDescription(latin(181))).verdict).toBe(false);
  });

  it('uses CJK bands for CJK-dominant text', () => {
    const result = analyzeMetaDescription(withDescription(CJK_103));
    expect(result.metrics).toMatchObject({ length: 103, language: 'cjk', recommendedMin: 120, recommendedMax: 160 });
    expect(result.status).toBe('pass');
    expect(result.verdict).toBe(true);
    expect(analyzeMetaDescription(withDescription(CJK_103.slice(0, 60))).status).toBe('warn');
    expect(analyzeMetaDescription(withDescription(CJK_103.slice(0, 40))).status).toBe('fail');
  });

  it('previews at most 100 characters', () => {
    const result = analyzeMetaDescription(withDescription(latin(150)));
    expect(result.metrics.preview).toBe(latin(100) + '...');
    expect(analyzeMetaDescription(withDescription(CJK_103)).metrics.preview).toBe(Array.from(CJK_103).slice(0, 100).join('') + '...');
  });
});
