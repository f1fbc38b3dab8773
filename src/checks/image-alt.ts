import { DEFAULT_CONFIG, type ProbeConfig } from '../config.js';
import type { DocumentHandle } from '../document.js';
import type { FieldResult, Finding } from '../types.js';

export type AltGapSeverity = 'none' | 'minor' | 'moderate' | 'severe';

export interface ImageAltMetrics {
  total: number;
  severity: AltGapSeverity;
  missing: number;
  missingPercentage: number;
  examples: string[];
}

export type ImageAltResult = FieldResult<ImageAltMetrics>;

export function analyzeImageAlt(doc: DocumentHandle, config: ProbeConfig = DEFAULT_CONFIG): ImageAltResult {
  const images = doc.findAll('img');
  const total = images.length;

  if (total === 0) {
    return {
      check: 'image-alt',
      status: 'info',
      verdict: true,
      metrics: { total, severity: 'none', missing: 0, missingPercentage: 0, examples: [] },
      findings: [{ level: 'info', message: 'No images on the page; relevant images can improve the experience' }],
    };
  }

  const { minorBelow, moderateBelow, maxExamples, srcChars } = config.imageAlt;
  const withoutAlt = images.filter((img) => !img.attr('alt'));
  const missing = withoutAlt.length;
  const missingPercentage = (missing * 100) / total;
  const examples = withoutAlt
    .slice(0, maxExamples)
    .map((img) => Array.from(img.attr('src') ?? '(no src)').slice(0, srcChars).join(''));

  const summary: Finding = {
    level: 'info',
    message: `${missing} of ${total} images missing alt (${missingPercentage.toFixed(1)}%)`,
  };
  let status: ImageAltResult['status'];
  let severity: AltGapSeverity;
  let verdictFinding: Finding;
  if (missing === 0) {
    status = 'pass';
    severity = 'none';
    verdictFinding = { level: 'pass', message: 'All images have alt text' };
  } else if (missingPercentage < minorBelow) {
    status = 'warn';
    severity = 'minor';
    verdictFinding = { level: 'warn', message: 'A few images lack alt text; add descriptive text to them' };
  } else if (missingPercentage < moderateBelow) {
    status = 'warn';
    severity = 'moderate';
    verdictFinding = { level: 'warn', message: 'Many images lack alt text; search engines cannot understand them, which hurts comprehension' };
  } else {
    status = 'fail';
    severity = 'severe';
    verdictFinding = { level: 'fail', message: 'At least half of the images lack alt text; add alt attributes systematically' };
  }

  return {
    check: 'image-alt',
    status,
    verdict: missing === 0,
    metrics: { total, severity, missing, missingPercentage, examples },
    findings: [
      summary,
      verdictFinding,
      ...examples.map((src, i): Finding => ({ level: 'info', message: `Image ${i + 1} without alt: src='${src}'` })),
    ],
  };
}
