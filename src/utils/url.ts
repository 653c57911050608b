/**
 * Normalizes a URL for duplicate detection only; the result is never stored.
 *
 * Mirrors the desktop app's comparison key exactly: a trailing slash is
 * trimmed both before and after the fragment is cut, and only a scheme
 * written as `http://` is upgraded (scheme-less input keeps no scheme).
 */
export function normalizeUrlForDuplicates(url: string): string {
  let normalized = url.toLowerCase().trim();

  if (normalized.startsWith('http://')) {
    normalized = 'https://' + normalized.slice('http://'.length);
  }

  if (normalized.endsWith('/')) normalized = normalized.slice(0, -1);

  const wwwTag = '://www.';
  const wwwIdx = normalized.indexOf(wwwTag);
  if (wwwIdx >= 0) {
    normalized = normalized.slice(0, wwwIdx + 3) + normalized.slice(wwwIdx + wwwTag.length);
  }

  const hashIdx = normalized.indexOf('#');
  if (hashIdx >= 0) normalized = normalized.slice(0, hashIdx);

  if (normalized.endsWith('/')) normalized = normalized.slice(0, -1);

  return normalized;
}

/** The title a link gets before a real page title is known. */
export function defaultTitleForUrl(url: string): string {
  try {
    return new URL(url).hostname || url;
  } catch {
    return url;
  }
}

export function isSkippableUrl(url: string): boolean {
  return /^(javascript:|chrome:|chrome-extension:|about:|edge:|file:|place:|moz-extension:)/i.test(url);
}
