export { analyzeDocument, analyzePage, allResults } from './analyze.js';
export type { PageChecks, PageReport } from './analyze.js';

export { assessContentVisibility, visibleTextStats } from './checks/content-visibility.js';
export type { ContentVisibilityMetrics, ContentVisibilityResult } from './checks/content-visibility.js';
export { analyzeTitle, classifyLength } from './checks/title.js';
export type { TitleMetrics, TitleResult } from './checks/title.js';
export { analyzeMetaDescription } from './checks/meta-description.js';
export type { MetaDescriptionMetrics, MetaDescriptionResult } from './checks/meta-description.js';
export { analyzeHeadings, extractKeyPhrases, findSharedPhrase } from './checks/heading.js';
export type { HeadingMetrics, HeadingResult, TitleRelation } from './checks/heading.js';
export { analyzeImageAlt } from './checks/image-alt.js';
export type { AltGapSeverity, ImageAltMetrics, ImageAltResult } from './checks/image-alt.js';
export { analyzeCanonical } from './checks/canonical.js';
export type { CanonicalMetrics, CanonicalResult } from './checks/canonical.js';

export { DEFAULT_CONFIG, LANGUAGE_THRESHOLDS, createConfig, findBlockedSite, isCjkHinted } from './config.js';
export type { ConnectivityProbe, LengthBands, ProbeConfig } from './config.js';
export { CheerioDocument } from './document.js';
export type { DocumentHandle, ElementHandle } from './document.js';
export { charsetFromContentType, decodeResponse, detectWithJschardet, resolveEncoding } from './encoding.js';
export type { DecodeResult, DecodeStage, Detection, EncodingDetector } from './encoding.js';
export { FetchError, classifyFetchError, fetchPage, probeConnectivity, readLocalPage } from './fetch.js';
export type { ConnectivityResult, FetchErrorKind, FetchOptions } from './fetch.js';
export { profileLanguage } from './language.js';
export type { LanguageProfile } from './language.js';
export { renderJson, renderMarkdown, renderText } from './report.js';
export { normalizeUrl } from './url.js';
export type { CheckId, CheckStatus, Dominance, FieldResult, Finding, RawResponse, VisibleTextStats } from './types.js';
