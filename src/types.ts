export type CheckStatus = 'pass' | 'warn' | 'fail' | 'info';

export type CheckId =
  | 'content-visibility'
  | 'title'
  | 'meta-description'
  | 'heading'
  | 'image-alt'
  | 'canonical';

export type Dominance = 'cjk' | 'latin';

export interface Finding {
  level: CheckStatus;
  message: string;
}

export interface FieldResult<M> {
  check: CheckId;
  status: CheckStatus;
  verdict: boolean;
  metrics: M;
  findings: Finding[];
}

export interface RawResponse {
  bytes: Uint8Array;
  declaredEncoding?: string;
  sourceUrl: string;
  status?: number;
}

export interface VisibleTextStats {
  charLength: number;
  wordCount: number;
}

const SEVERITY: Record<CheckStatus, number> = { info: 0, pass: 1, warn: 2, fail: 3 };

export function worstStatus(levels: CheckStatus[], fallback: CheckStatus = 'pass'): CheckStatus {
  return levels.reduce((worst, l) => (SEVERITY[l] > SEVERITY[worst] ? l : worst), fallback);
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}
