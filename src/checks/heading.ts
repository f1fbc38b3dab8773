import { DEFAULT_CONFIG, type ProbeConfig } from '../config.js';
import type { DocumentHandle } from '../document.js';
import { charLength, worstStatus, type FieldResult, type Finding } from '../types.js';

export type TitleRelation = 'identical' | 'contains' | 'related' | 'weak' | 'skipped';

export interface HeadingMetrics {
  h1Count: number;
  headings: string[];
  relation: TitleRelation;
}

export type HeadingResult = FieldResult<HeadingMetrics>;

/**
 * Naive key-phrase candidates: drops stop-word characters and joins the first
 * three remaining characters, plus characters 3-5 when at least five remain.
 * Works character by character, not on real tokens.
 */
export function extractKeyPhrases(text: string, stopWords: readonly string[] = DEFAULT_CONFIG.stopWords): string[] {
  const stop = new Set(stopWords);
  const words = Array.from(text).filter((c) => !stop.has(c));
  const phrases: string[] = [];
  if (words.length > 2) phrases.push(words.slice(0, 3).join(''));
  if (words.length > 4) phrases.push(words.slice(2, 5).join(''));
  return phrases;
}

export function findSharedPhrase(a: string, b: string, stopWords?: readonly string[]): [string, string] | undefined {
  for (const pa of extractKeyPhrases(a, stopWords)) {
    for (const pb of extractKeyPhrases(b, stopWords)) {
      if (charLength(pa) < 2 || charLength(pb) < 2) continue;
      if (pa.includes(pb) || pb.includes(pa)) return [pa, pb];
    }
  }
  return undefined;
}

function relate(h1: string, title: string, config: ProbeConfig): { relation: TitleRelation; finding: Finding } {
  if (h1 === title) {
    return { relation: 'identical', finding: { level: 'warn', message: 'H1 and title are identical: acceptable, but a variation can cover more keywords' } };
  }
  if (title.includes(h1) || h1.includes(title)) {
    return { relation: 'contains', finding: { level: 'pass', message: 'H1 and title are in a containment relation' } };
  }
  const shared = findSharedPhrase(h1, title, config.stopWords);
  if (shared) {
    return { relation: 'related', finding: { level: 'pass', message: `H1 is close to the title in meaning (shared: '${shared[0]}'/'${shared[1]}')` } };
  }
  return { relation: 'weak', finding: { level: 'warn', message: 'Weak relation between H1 and title; the H1 should roughly match the title meaning' } };
}

export function analyzeHeadings(doc: DocumentHandle, pageTitle = '', config: ProbeConfig = DEFAULT_CONFIG): HeadingResult {
  const headings = doc.findAll('h1').map((h) => h.text());
  const h1Count = headings.length;

  if (h1Count === 0) {
    return {
      check: 'heading',
      status: 'fail',
      verdict: false,
      metrics: { h1Count, headings, relation: 'skipped' },
      findings: [{ level: 'fail', message: 'No H1 found; every page should have exactly one H1 summarizing its topic' }],
    };
  }

  const { minLength, maxLength } = config.heading;
  const findings: Finding[] = headings.map((text, i): Finding => {
    const len = charLength(text);
    const label = `H1-${i + 1} "${text}" (${len} characters)`;
    if (len === 0) return { level: 'fail', message: `${label}: empty` };
    if (len < minLength) return { level: 'warn', message: `${label}: possibly too short` };
    if (len > maxLength) return { level: 'warn', message: `${label}: possibly too long` };
    return { level: 'pass', message: `${label}: length OK` };
  });

  if (h1Count > 1) {
    findings.push({ level: 'warn', message: `Found ${h1Count} H1 elements; expect exactly one` });
  }

  let relation: TitleRelation = 'skipped';
  if (pageTitle) {
    const related = relate(headings[0], pageTitle, config);
    relation = related.relation;
    findings.push(related.finding);
  } else {
    findings.push({ level: 'info', message: 'No page title to compare the H1 against' });
  }

  return {
    check: 'heading',
    status: worstStatus(findings.map((f) => f.level)),
    verdict: h1Count === 1,
    metrics: { h1Count, headings, relation },
    findings,
  };
}
