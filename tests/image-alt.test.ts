import { describe, it, expect } from 'vitest';
import { analyzeImageAlt } from '../src/checks/image-alt.js';
import { CheerioDocument } from '../src/document.js';

const withImages = (withAlt: number, without: number, missingTag = (i: number) => `<img src="/img/missing-${i}.png">`) =>
  CheerioDocument.parse(
    '<html><body>' +
      Array.from({ length: withAlt }, (_, i) => `<img src="/img/ok-${i}.png" alt="Photo ${i}">`).join('') +
      Array.from({ length: without }, (_, i) => missingTag(i)).join('') +
      '</body></html>',
  );

describe('analyzeImageAlt', () => {
  it('reports info without images', () => {
    const result = analyzeImageAlt(withImages(0, 0));
    expect(result.status).toBe('info');
    expect(result.verdict).toBe(true);
    expect(result.metrics.total).toBe(0);
  });

  it('passes when every image has alt text', () => {
    const result = analyzeImageAlt(withImages(3, 0));
    expect(result.status).toBe('pass');
    expect(result.metrics.severity).toBe('none');
  });

  it('flags under 20% as a minor warning', () => {
    const result = analyzeImageAlt(withImages(9, 1));
    expect(result.status).toBe('warn');
    expect(result.metrics).toMatchObject({ severity: 'minor', missing: 1, missingPercentage: 10 });
    expect(result.verdict).toBe(false);
  });

  it('puts exactly 20% in the moderate bucket', () => {
    const result = analyzeImageAlt(withImages(4, 1));
    expect(result.status).toBe('warn');
    expect(result.metrics.severity).toBe('moderate');
    expect(result.findings[0].message).toBe('1 of 5 images missing alt (20.0%)');
  });

  it('fails at 50% or more', () => {
    const result = analyzeImageAlt(withImages(2, 2));
    expect(result.status).toBe('fail');
    expect(result.metrics.severity).toBe('severe');
  });

  it('counts empty alt attributes as missing', () => {
    const result = analyzeImageAlt(withImages(1, 1, () => '<img src="/spacer.gif" alt="">'));
    expect(result.metrics.missing).toBe(1);
    expect(result.metrics.examples).toEqual(['/spacer.gif']);
  });

  it('lists at most five truncated examples', () => {
    const result = analyzeImageAlt(withImages(0, 7, (i) => (i === 0 ? '<img>' : `<img src="/${'a'.repeat(80)}-${i}.png">`)));
    expect(result.metrics.examples).toHaveLength(5);
    expect(result.metrics.examples[0]).toBe('(no src)');
    expect(result.metrics.examples[1]).toBe('/' + 'a'.repeat(49));
    expect(result.findings.filter((f) => f.message.startsWith('Image '))).toHaveLength(5);
  });
});
