import { DEFAULT_CONFIG, type LengthBands, type ProbeConfig } from '../config.js';
import type { DocumentHandle } from '../document.js';
import { profileLanguage } from '../language.js';
import type { CheckStatus, Dominance, FieldResult, Finding } from '../types.js';

export interface TitleMetrics {
  present: boolean;
  title: string;
  length: number;
  language: Dominance;
  cjkRatio: number;
  recommendedMin: number;
  recommendedMax: number;
}

export type TitleResult = FieldResult<TitleMetrics>;

export function classifyLength(length: number, bands: LengthBands): { status: CheckStatus; finding: Finding } {
  const range = `${bands.recommendedMin}-${bands.recommendedMax}`;
  if (length < bands.failBelow) return { status: 'fail', finding: { level: 'fail', message: `Too short (${length}); aim for ${range} characters` } };
  if (length < bands.warnBelow) return { status: 'warn', finding: { level: 'warn', message: `Slightly short (${length}); aim for ${range} characters` } };
  if (length > bands.warnAbove) return { status: 'warn', finding: { level: 'warn', message: `Too long (${length}); keep it under ${bands.warnAbove} characters` } };
  return { status: 'pass', finding: { level: 'pass', message: `Length ${length} is within range` } };
}

export function analyzeTitle(doc: DocumentHandle, config: ProbeConfig = DEFAULT_CONFIG): TitleResult {
  const el = doc.find('title');
  if (!el) {
    return {
      check: 'title',
      status: 'fail',
      verdict: false,
      metrics: {
        present: false,
        title: '',
        length: 0,
        language: 'latin',
        cjkRatio: 0,
        recommendedMin: config.title.latin.recommendedMin,
        recommendedMax: config.title.latin.recommendedMax,
      },
      findings: [{ level: 'fail', message: 'Missing <title>; search engines cannot tell what the page is about' }],
    };
  }

  const title = el.text();
  const profile = profileLanguage(title, config.title.threshold);
  const bands = config.title[profile.dominant];
  const { status, finding } = classifyLength(profile.length, bands);
  const [min, max] = config.title.acceptable;

  return {
    check: 'title',
    status,
    verdict: profile.length >= min && profile.length <= max,
    metrics: {
      present: true,
      title,
      length: profile.length,
      language: profile.dominant,
      cjkRatio: profile.ratio,
      recommendedMin: bands.recommendedMin,
      recommendedMax: bands.recommendedMax,
    },
    findings: [
      { level: 'info', message: `Title: "${title}"` },
      finding,
      { level: 'info', message: 'Keep the core keyword in the title while making it worth clicking' },
    ],
  };
}
