import jschardet from 'jschardet';
import { DEFAULT_CONFIG, isCjkHinted, type ProbeConfig } from './config.js';
import type { RawResponse } from './types.js';

export type DecodeStage = 'declared' | 'hinted' | 'detected' | 'fallback' | 'lossy';

export interface Detection {
  encoding: string | null;
  confidence: number;
}

export type EncodingDetector = (sample: Uint8Array) => Detection;

export interface DecodeResult {
  text: string;
  encoding: string;
  stage: DecodeStage;
  degraded: boolean;
  detection?: Detection;
}

export const detectWithJschardet: EncodingDetector = (sample) => {
  const { encoding, confidence } = jschardet.detect(Buffer.from(sample));
  return { encoding: encoding || null, confidence };
};

function decodeStrict(bytes: Uint8Array, encoding: string): string | undefined {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    // unknown label (RangeError) or malformed input (TypeError)
    return undefined;
  }
}

function decodeReplacing(bytes: Uint8Array, encoding: string): string | undefined {
  try {
    return new TextDecoder(encoding).decode(bytes);
  } catch {
    return undefined;
  }
}

export function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*["']?([^"';\s]+)/i);
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * Turns response bytes into text. Tries the declared charset, then a guess
 * from the URL, then statistical detection on the first bytes, then a fixed
 * priority list, and finally lossy UTF-8. Never throws.
 */
export function resolveEncoding(
  raw: RawResponse,
  config: ProbeConfig = DEFAULT_CONFIG,
  detect: EncodingDetector = detectWithJschardet,
): DecodeResult {
  const { bytes, declaredEncoding, sourceUrl } = raw;
  const hinted = isCjkHinted(sourceUrl, config);
  let detection: Detection | undefined;

  if (declaredEncoding) {
    const text = decodeStrict(bytes, declaredEncoding);
    if (text !== undefined) return { text, encoding: declaredEncoding, stage: 'declared', degraded: false };

    const guess = hinted ? 'gbk' : 'utf-8';
    const guessed = decodeStrict(bytes, guess);
    if (guessed !== undefined) return { text: guessed, encoding: guess, stage: 'hinted', degraded: true };
  } else {
    detection = detect(bytes.subarray(0, config.detection.sampleBytes));
    if (detection.encoding && detection.confidence > config.detection.minConfidence) {
      const text = decodeReplacing(bytes, detection.encoding);
      if (text !== undefined) return { text, encoding: detection.encoding, stage: 'detected', degraded: false, detection };
    }
  }

  const candidates = hinted ? config.encodingPriority.cjk : config.encodingPriority.default;
  for (const encoding of candidates) {
    const text = decodeStrict(bytes, encoding);
    if (text !== undefined) return { text, encoding, stage: 'fallback', degraded: true, detection };
  }

  const text = new TextDecoder('utf-8').decode(bytes).replace(/\uFFFD/g, '');
  return { text, encoding: 'utf-8', stage: 'lossy', degraded: true, detection };
}

export function decodeResponse(raw: RawResponse, config: ProbeConfig = DEFAULT_CONFIG): string {
  return resolveEncoding(raw, config).text;
}
