const WITH_AUTHORITY = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#]*)([^?#]*)/i;

/**
 * Reduces a URL to `host + path` for self-reference comparison: scheme, query
 * and fragment go, trailing slashes are stripped. Strings without an authority
 * (including already-normalized ones) keep everything before `?` or `#`.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  const match = trimmed.match(WITH_AUTHORITY);
  const hostAndPath = match ? match[1] + match[2] : trimmed.split(/[?#]/)[0];
  return hostAndPath.replace(/\/+$/, '');
}

export function isAbsoluteUrl(url: string): boolean {
  return WITH_AUTHORITY.test(url.trim());
}

export function resolveUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}
