import type { Dominance } from './types.js';

export interface LanguageProfile {
  dominant: Dominance;
  ratio: number;
  cjkCount: number;
  length: number;
}

const CJK_CHAR = /[\u4e00-\u9fff]/;

/**
 * Classifies a text span as CJK- or Latin-dominant. `threshold` is the share of
 * CJK Unified Ideographs the span must exceed: 1/2 for titles, 1/3 for
 * descriptions, which carry more punctuation and Latin tokens.
 */
export function profileLanguage(text: string, threshold: number): LanguageProfile {
  const chars = Array.from(text);
  const cjkCount = chars.filter((c) => CJK_CHAR.test(c)).length;
  const length = chars.length;
  return {
    dominant: cjkCount > length * threshold ? 'cjk' : 'latin',
    ratio: length ? cjkCount / length : 0,
    cjkCount,
    length,
  };
}
