import type { Dominance } from './types.js';

export interface LengthBands {
  failBelow: number;
  warnBelow: number;
  warnAbove: number;
  recommendedMin: number;
  recommendedMax: number;
}

export interface ConnectivityProbe {
  name: string;
  url: string;
  timeoutMs: number;
}

export interface ProbeConfig {
  cjkSiteHints: readonly string[];
  blockedSites: readonly string[];
  suggestedSites: readonly string[];
  stopWords: readonly string[];
  encodingPriority: { cjk: readonly string[]; default: readonly string[] };
  detection: { sampleBytes: number; minConfidence: number };
  noiseTags: readonly string[];
  noiseNames: readonly string[];
  contentSignalTags: readonly string[];
  contentSignalWords: readonly string[];
  visibility: { failBelow: number; hybridBelow: number; borderlineBelow: number; meaningfulParagraphChars: number };
  title: { threshold: number; acceptable: [number, number] } & Record<Dominance, LengthBands>;
  description: { threshold: number; previewChars: number } & Record<Dominance, LengthBands & { acceptable: [number, number] }>;
  heading: { minLength: number; maxLength: number };
  imageAlt: { minorBelow: number; moderateBelow: number; maxExamples: number; srcChars: number };
  connectivityProbes: readonly ConnectivityProbe[];
  requestHeaders: Readonly<Record<string, string>>;
}

export const LANGUAGE_THRESHOLDS = { title: 1 / 2, description: 1 / 3 } as const;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export const DEFAULT_CONFIG: ProbeConfig = deepFreeze<ProbeConfig>({
  cjkSiteHints: ['.cn', 'sina', 'baidu', 'sohu', '163', 'qq', 'zhihu'],
  blockedSites: ['bbc.com', 'wikipedia.org', 'twitter.com', 'facebook.com', 'google.com', 'youtube.com'],
  suggestedSites: ['https://www.baidu.com', 'https://www.qq.com', 'https://www.jd.com', 'https://www.taobao.com', 'https://www.zhihu.com'],
  stopWords: ['的', '和', '与', '及', '或', '在', '是', '有', '了', '吗', '呢', '吧', '啊'],
  encodingPriority: {
    cjk: ['gbk', 'gb2312', 'gb18030', 'utf-8', 'iso-8859-1'],
    default: ['utf-8', 'gbk', 'gb2312', 'iso-8859-1'],
  },
  detection: { sampleBytes: 1024, minConfidence: 0.8 },
  noiseTags: ['script', 'style', 'noscript', 'iframe', 'nav', 'header', 'footer', 'aside', 'form', 'button', 'input'],
  noiseNames: ['nav', 'navigation', 'navbar', 'menu', 'header', 'footer', 'sidebar'],
  contentSignalTags: ['article', 'main'],
  contentSignalWords: ['content', 'post', 'article', 'main', 'entry'],
  visibility: { failBelow: 100, hybridBelow: 300, borderlineBelow: 200, meaningfulParagraphChars: 50 },
  title: {
    threshold: LANGUAGE_THRESHOLDS.title,
    acceptable: [30, 70],
    cjk: { failBelow: 15, warnBelow: 30, warnAbove: 70, recommendedMin: 30, recommendedMax: 50 },
    latin: { failBelow: 30, warnBelow: 50, warnAbove: 65, recommendedMin: 50, recommendedMax: 60 },
  },
  description: {
    threshold: LANGUAGE_THRESHOLDS.description,
    previewChars: 100,
    cjk: { failBelow: 50, warnBelow: 100, warnAbove: 200, recommendedMin: 120, recommendedMax: 160, acceptable: [100, 200] },
    latin: { failBelow: 120, warnBelow: 140, warnAbove: 180, recommendedMin: 150, recommendedMax: 160, acceptable: [140, 180] },
  },
  heading: { minLength: 10, maxLength: 100 },
  imageAlt: { minorBelow: 20, moderateBelow: 50, maxExamples: 5, srcChars: 50 },
  connectivityProbes: [
    { name: 'Baidu', url: 'https://www.baidu.com', timeoutMs: 5000 },
    { name: 'Tencent', url: 'https://www.qq.com', timeoutMs: 5000 },
    { name: 'GitHub', url: 'https://github.com', timeoutMs: 10000 },
  ],
  requestHeaders: {
    'user-agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'accept-language': 'zh-CN,zh;q=0.9,en;q=0.8',
  },
});

export function createConfig(overrides: Partial<ProbeConfig> = {}): ProbeConfig {
  return deepFreeze<ProbeConfig>({ ...DEFAULT_CONFIG, ...overrides });
}

export function isCjkHinted(url: string, config: ProbeConfig = DEFAULT_CONFIG): boolean {
  return config.cjkSiteHints.some((hint) => url.includes(hint));
}

export function findBlockedSite(url: string, config: ProbeConfig = DEFAULT_CONFIG): string | undefined {
  const lower = url.toLowerCase();
  return config.blockedSites.find((site) => lower.includes(site));
}
