import { DEFAULT_CONFIG, type ProbeConfig } from '../config.js';
import type { DocumentHandle } from '../document.js';
import { profileLanguage } from '../language.js';
import type { Dominance, FieldResult } from '../types.js';
import { classifyLength } from './title.js';

export interface MetaDescriptionMetrics {
  present: boolean;
  preview: string;
  length: number;
  language: Dominance;
  cjkRatio: number;
  recommendedMin: number;
  recommendedMax: number;
}

export type MetaDescriptionResult = FieldResult<MetaDescriptionMetrics>;

/**
 * The boolean verdict uses the `acceptable` range, which is narrower than the
 * warn/fail bands: a description can carry no warning and still miss it.
 */
export function analyzeMetaDescription(doc: DocumentHandle, config: ProbeConfig = DEFAULT_CONFIG): MetaDescriptionResult {
  const el = doc.find('meta[name="description"]');
  const content = el?.attr('content')?.trim() ?? '';
  const base: MetaDescriptionMetrics = {
    present: !!el,
    preview: '',
    length: 0,
    language: 'latin',
    cjkRatio: 0,
    recommendedMin: config.description.latin.recommendedMin,
    recommendedMax: config.description.latin.recommendedMax,
  };

  if (!el) {
    return {
      check: 'meta-description',
      status: 'fail',
      verdict: false,
      metrics: base,
      findings: [{ level: 'fail', message: 'Missing meta description; search engines will pick their own snippet' }],
    };
  }
  if (!content) {
    return {
      check: 'meta-description',
      status: 'warn',
      verdict: false,
      metrics: base,
      findings: [{ level: 'warn', message: 'Meta description is empty; add a summary that invites the click' }],
    };
  }

  const profile = profileLanguage(content, config.description.threshold);
  const bands = config.description[profile.dominant];
  const { status, finding } = classifyLength(profile.length, bands);
  const [min, max] = bands.acceptable;
  const chars = Array.from(content);
  const { previewChars } = config.description;
  const preview = chars.length > previewChars ? chars.slice(0, previewChars).join('') + '...' : content;

  return {
    check: 'meta-description',
    status,
    verdict: profile.length >= min && profile.length <= max,
    metrics: {
      present: true,
      preview,
      length: profile.length,
      language: profile.dominant,
      cjkRatio: profile.ratio,
      recommendedMin: bands.recommendedMin,
      recommendedMax: bands.recommendedMax,
    },
    findings: [
      { level: 'info', message: `Description: ${preview}` },
      finding,
      { level: 'info', message: 'Include the keywords and avoid repeating the title' },
    ],
  };
}
