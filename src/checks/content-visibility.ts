import { DEFAULT_CONFIG, type ProbeConfig } from '../config.js';
import type { DocumentHandle } from '../document.js';
import { charLength, type FieldResult, type Finding, type VisibleTextStats } from '../types.js';

export interface ContentVisibilityMetrics extends VisibleTextStats {
  hasBody: boolean;
  meaningfulParagraphs: number;
  hasContentStructure: boolean;
}

export type ContentVisibilityResult = FieldResult<ContentVisibilityMetrics>;

function noiseSelector(config: ProbeConfig): string {
  const byName = config.noiseNames.flatMap((n) => [`.${n}`, `#${n}`]);
  return [...config.noiseTags, ...byName].join(', ');
}

export function visibleTextStats(body: DocumentHandle, config: ProbeConfig = DEFAULT_CONFIG): VisibleTextStats {
  const working = body.clone();
  working.remove(noiseSelector(config));
  const text = working.text(' ');
  return {
    charLength: charLength(text),
    wordCount: text ? text.split(' ').length : 0,
  };
}

/**
 * Estimates whether substantive content is in the HTML before any script runs.
 * Noise is stripped from a private copy of <body>; paragraph and structure
 * signals are read from the untouched original.
 */
export function assessContentVisibility(doc: DocumentHandle, config: ProbeConfig = DEFAULT_CONFIG): ContentVisibilityResult {
  const body = doc.scope('body');
  if (!body) {
    return {
      check: 'content-visibility',
      status: 'fail',
      verdict: false,
      metrics: { hasBody: false, charLength: 0, wordCount: 0, meaningfulParagraphs: 0, hasContentStructure: false },
      findings: [{ level: 'fail', message: 'No <body> element found' }],
    };
  }

  const stats = visibleTextStats(body, config);
  const { failBelow, hybridBelow, borderlineBelow, meaningfulParagraphChars } = config.visibility;

  const meaningfulParagraphs = body
    .findAll('p')
    .filter((p) => charLength(p.text()) > meaningfulParagraphChars).length;
  const hasContentStructure =
    body.findAll(config.contentSignalTags).length > 0 ||
    body.findWhere((el) => {
      const cls = el.attr('class')?.toLowerCase();
      return !!cls && config.contentSignalWords.some((w) => cls.includes(w));
    }).length > 0;

  const metrics: ContentVisibilityMetrics = { hasBody: true, ...stats, meaningfulParagraphs, hasContentStructure };
  const summary: Finding = {
    level: 'info',
    message: `Visible text in initial HTML: ${stats.charLength} characters, ~${stats.wordCount} words`,
  };
  const result = (status: 'pass' | 'warn' | 'fail', verdict: boolean, ...findings: Finding[]): ContentVisibilityResult => ({
    check: 'content-visibility',
    status,
    verdict,
    metrics,
    findings: [summary, ...findings],
  });

  if (stats.charLength < failBelow) {
    return result('fail', false,
      { level: 'fail', message: 'Very little text in the initial HTML: high render-dependency risk' },
      { level: 'info', message: 'Crawlers that do not run JavaScript may miss most of this page; put core content in the HTML response' });
  }
  if (stats.charLength < hybridBelow && meaningfulParagraphs < 2) {
    return result('warn', false,
      { level: 'warn', message: 'Initial HTML may lack substantive content: possible hybrid rendering' },
      { level: 'info', message: 'Make sure at least part of the core content is reachable without JavaScript' });
  }
  if (hasContentStructure || meaningfulParagraphs >= 2) {
    return result('pass', true,
      { level: 'pass', message: 'Initial HTML carries substantive content: content likely server-rendered' });
  }

  const acceptable = stats.charLength >= borderlineBelow;
  return result(acceptable ? 'pass' : 'warn', acceptable,
    { level: 'info', message: 'Some initial content but no clear content structure: needs further check' });
}
