import type { DocumentHandle } from '../document.js';
import type { FieldResult, Finding } from '../types.js';
import { isAbsoluteUrl, normalizeUrl, resolveUrl } from '../url.js';

export interface CanonicalMetrics {
  present: boolean;
  href: string;
  selfReferencing: boolean;
}

export type CanonicalResult = FieldResult<CanonicalMetrics>;

export function analyzeCanonical(doc: DocumentHandle, pageUrl: string): CanonicalResult {
  const el = doc.find('link[rel~="canonical"]');
  if (!el) {
    return {
      check: 'canonical',
      status: 'warn',
      verdict: false,
      metrics: { present: false, href: '', selfReferencing: false },
      findings: [
        { level: 'warn', message: 'No canonical link; duplicate pages may dilute ranking signals' },
        { level: 'info', message: `Add <link rel="canonical" href="${pageUrl}">` },
      ],
    };
  }

  const href = el.attr('href')?.trim() ?? '';
  if (!href) {
    return {
      check: 'canonical',
      status: 'fail',
      verdict: false,
      metrics: { present: true, href, selfReferencing: false },
      findings: [{ level: 'fail', message: 'Canonical link has an empty href' }],
    };
  }

  const findings: Finding[] = [{ level: 'info', message: `Canonical URL: ${href}` }];
  let target = href;
  if (!isAbsoluteUrl(href)) {
    const resolved = resolveUrl(href, pageUrl);
    if (resolved) {
      target = resolved;
      findings.push({ level: 'info', message: `Canonical is relative; prefer an absolute URL (${resolved})` });
    }
  }

  // both sides go through the URL parser so percent-encoding and host case agree
  const selfReferencing =
    normalizeUrl(resolveUrl(target, pageUrl) ?? target) === normalizeUrl(resolveUrl(pageUrl, pageUrl) ?? pageUrl);
  findings.push(
    selfReferencing
      ? { level: 'pass', message: 'Canonical is self-referencing, correct' }
      : { level: 'warn', message: 'Canonical points elsewhere; this page may not be the canonical version' },
  );

  return {
    check: 'canonical',
    status: selfReferencing ? 'pass' : 'warn',
    verdict: selfReferencing,
    metrics: { present: true, href, selfReferencing },
    findings,
  };
}
