import { analyzeCanonical, type CanonicalResult } from './checks/canonical.js';
import { assessContentVisibility, type ContentVisibilityResult } from './checks/content-visibility.js';
import { analyzeHeadings, type HeadingResult } from './checks/heading.js';
import { analyzeImageAlt, type ImageAltResult } from './checks/image-alt.js';
import { analyzeMetaDescription, type MetaDescriptionResult } from './checks/meta-description.js';
import { analyzeTitle, type TitleResult } from './checks/title.js';
import { DEFAULT_CONFIG, type ProbeConfig } from './config.js';
import { CheerioDocument, type DocumentHandle } from './document.js';
import { resolveEncoding, type DecodeResult, type EncodingDetector } from './encoding.js';
import type { RawResponse } from './types.js';

export interface PageChecks {
  contentVisibility: ContentVisibilityResult;
  title: TitleResult;
  metaDescription: MetaDescriptionResult;
  heading: HeadingResult;
  imageAlt: ImageAltResult;
  canonical: CanonicalResult;
}

export interface PageReport {
  url: string;
  status?: number;
  decode?: Omit<DecodeResult, 'text'>;
  checks: PageChecks;
}

export function analyzeDocument(doc: DocumentHandle, pageUrl: string, config: ProbeConfig = DEFAULT_CONFIG): PageReport {
  const contentVisibility = assessContentVisibility(doc, config);
  const title = analyzeTitle(doc, config);
  const metaDescription = analyzeMetaDescription(doc, config);
  const heading = analyzeHeadings(doc, title.metrics.title, config);
  const imageAlt = analyzeImageAlt(doc, config);
  const canonical = analyzeCanonical(doc, pageUrl);
  return { url: pageUrl, checks: { contentVisibility, title, metaDescription, heading, imageAlt, canonical } };
}

export function analyzePage(raw: RawResponse, config: ProbeConfig = DEFAULT_CONFIG, detect?: EncodingDetector): PageReport {
  const { text, ...decode } = resolveEncoding(raw, config, detect);
  const doc = CheerioDocument.parse(text);
  return { ...analyzeDocument(doc, raw.sourceUrl, config), status: raw.status, decode };
}

export function allResults(report: PageReport) {
  const { contentVisibility, title, metaDescription, heading, imageAlt, canonical } = report.checks;
  return [contentVisibility, title, metaDescription, heading, imageAlt, canonical] as const;
}
