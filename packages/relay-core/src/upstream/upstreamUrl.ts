/**
 * Validates an upstream base address and strips trailing slashes, query and hash.
 * An empty or whitespace-only value is returned as '' and means "unconfigured".
 */
export function normalizeUpstreamBase(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    return '';
  }

  const url = new URL(trimmed);
  if (!/^https?:$/.test(url.protocol)) {
    throw new Error('Only http/https upstream addresses are supported');
  }
  url.hash = '';
  url.search = '';

  return url.toString().replace(/\/+$/, '');
}

export function buildUpstreamUrl(base: string, path: string): string {
  const suffix = path.startsWith('/') ? path : `/${path}`;
  return `${base}${suffix}`;
}
