import { allResults, type PageReport } from './analyze.js';
import type { CheckId, CheckStatus } from './types.js';

const LABELS: Record<CheckId, string> = {
  'content-visibility': 'Initial content visibility',
  title: 'Title',
  'meta-description': 'Meta description',
  heading: 'H1 heading',
  'image-alt': 'Image alt text',
  canonical: 'Canonical link',
};

const MARKS: Record<CheckStatus, string> = { pass: '✓', warn: '!', fail: '✗', info: '·' };

export const RENDER_NOTE = 'Initial content looks thin, so the checks below may be inaccurate.';

export function renderText(report: PageReport): string {
  const lines: string[] = [];
  lines.push(`Target: ${report.url}`);
  if (report.status !== undefined) lines.push(`HTTP status: ${report.status}`);
  if (report.decode) lines.push(`Encoding: ${report.decode.encoding} (${report.decode.stage})`);
  lines.push('');
  for (const result of allResults(report)) {
    lines.push(`${MARKS[result.status]} ${LABELS[result.check]}  [${result.status.toUpperCase()}]`);
    for (const f of result.findings) lines.push(`   ${MARKS[f.level]} ${f.message}`);
    if (result.check === 'content-visibility' && !result.verdict) lines.push(`   ${MARKS.info} ${RENDER_NOTE}`);
    lines.push('');
  }
  return lines.join('\n');
}

export function renderMarkdown(report: PageReport): string {
  const lines: string[] = [];
  lines.push('# On-page Report');
  lines.push('');
  lines.push(`**Target:** ${report.url}  `);
  if (report.status !== undefined) lines.push(`**HTTP status:** ${report.status}  `);
  if (report.decode) lines.push(`**Encoding:** ${report.decode.encoding} (${report.decode.stage})`);
  lines.push('');
  lines.push('## Summary');
  for (const result of allResults(report)) {
    lines.push(`- **${LABELS[result.check]}:** ${result.status.toUpperCase()}`);
  }
  lines.push('');
  lines.push('## Findings');
  for (const result of allResults(report)) {
    lines.push(`### ${LABELS[result.check]}`);
    for (const f of result.findings) lines.push(`- ${MARKS[f.level]} ${f.message}`);
    lines.push('');
  }
  return lines.join('\n');
}

export function renderJson(report: PageReport): string {
  return JSON.stringify(report, null, 2);
}
