import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { request, type Dispatcher } from 'undici';
import { DEFAULT_CONFIG, type ConnectivityProbe } from './config.js';
import { charsetFromContentType } from './encoding.js';
import type { RawResponse } from './types.js';

export type FetchErrorKind = 'timeout' | 'tls' | 'connection' | 'unknown';

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`${kind} error fetching ${url}${describeCause(options?.cause)}`, options);
    this.name = 'FetchError';
  }
}

export interface FetchOptions {
  timeoutMs?: number;
  headers?: Readonly<Record<string, string>>;
  maxRedirections?: number;
  dispatcher?: Dispatcher;
}

const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);
const TLS_CODE = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_|SELF_SIGNED_)/;

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `: ${cause.message}` : '';
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const code: unknown = Reflect.get(err, 'code');
  if (typeof code === 'string') return code;
  return errorCode(Reflect.get(err, 'cause'));
}

export function classifyFetchError(err: unknown): FetchErrorKind {
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) return 'timeout';
  const code = errorCode(err);
  if (!code) return 'unknown';
  if (TIMEOUT_CODES.has(code)) return 'timeout';
  if (TLS_CODE.test(code)) return 'tls';
  if (CONNECTION_CODES.has(code)) return 'connection';
  return 'unknown';
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function fetchPage(target: string, options: FetchOptions = {}): Promise<RawResponse> {
  const { timeoutMs = 10000, headers = DEFAULT_CONFIG.requestHeaders, maxRedirections = 5, dispatcher } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await request(target, { method: 'GET', signal: controller.signal, headers: { ...headers }, maxRedirections, dispatcher });
    const bytes = new Uint8Array(await res.body.arrayBuffer());
    return {
      bytes,
      declaredEncoding: charsetFromContentType(headerValue(res.headers['content-type'])),
      sourceUrl: target,
      status: res.statusCode,
    };
  } catch (err) {
    throw new FetchError(classifyFetchError(err), target, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

export function readLocalPage(path: string): RawResponse {
  const full = resolve(process.cwd(), path);
  return { bytes: new Uint8Array(readFileSync(full)), sourceUrl: pathToFileURL(full).toString() };
}

export interface ConnectivityResult {
  name: string;
  url: string;
  reachable: boolean;
  status?: number;
  error?: string;
}

export async function probeConnectivity(
  probes: readonly ConnectivityProbe[] = DEFAULT_CONFIG.connectivityProbes,
  options: Omit<FetchOptions, 'timeoutMs'> = {},
): Promise<ConnectivityResult[]> {
  const results: ConnectivityResult[] = [];
  for (const probe of probes) {
    try {
      const res = await fetchPage(probe.url, { ...options, timeoutMs: probe.timeoutMs });
      results.push({ name: probe.name, url: probe.url, reachable: true, status: res.status });
    } catch (err) {
      results.push({ name: probe.name, url: probe.url, reachable: false, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return results;
}
