/**
 * URL and filename helpers shared by the crawl stages
 */

/**
 * Resolves a possibly relative href against the source base URL.
 * Returns null for hrefs that cannot be parsed.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Builds the listing URL for one entity's child items.
 *
 * Existing query parameters are kept, except that `t` is replaced when tag
 * filters are given and `sort_type` is replaced when a sort type is given.
 * The replacements are appended after the kept parameters.
 */
export function buildListingUrl(
  baseUrl: string,
  href: string,
  tags: readonly string[] = [],
  sortType?: string
): string {
  const url = new URL(href, baseUrl);
  const params = new URLSearchParams(url.search);

  if (tags.length > 0) {
    params.delete('t');
    params.append('t', tags.join(','));
  }
  if (sortType !== undefined) {
    params.delete('sort_type');
    params.append('sort_type', sortType);
  }

  url.search = params.toString();
  return url.toString();
}

/**
 * Splits a comma separated CLI value into trimmed, non-empty parts.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Turns an arbitrary name into a filesystem-safe file name.
 */
export function sanitizeFilename(value: string, fallback = 'file'): string {
  const safe = value.replace(/[\\/:*?"<>|]/g, '_').trim().replace(/^_+|_+$/g, '');
  return safe || fallback;
}
