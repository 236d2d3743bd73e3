/**
 * Link header and scheme helpers.
 * @module http/link
 */

const LINK_ENTRY_PATTERN = /<([^>]+)>\s*((?:;[^;,]*)*)/g;
const REL_NEXT_PATTERN = /;\s*rel="next"\s*$/;

/**
 * Returns the `rel="next"` target of an RFC 5988 `link` header, or
 * undefined when the header is absent or has no next entry.
 */
export function parseNextLinkHeader(headers: Headers): string | undefined {
  const link = headers.get('link');
  if (!link) {
    return undefined;
  }

  for (const match of link.matchAll(LINK_ENTRY_PATTERN)) {
    const target = match[1];
    const params = (match[2] ?? '').split(/(?=;)/);
    if (target !== undefined && params.some((param) => REL_NEXT_PATTERN.test(param))) {
      return target;
    }
  }

  return undefined;
}

/**
 * Registries reached as `localhost:<port>` are spoken to over plain HTTP.
 */
export function scheme(registry: string): 'http' | 'https' {
  return registry.startsWith('localhost:') ? 'http' : 'https';
}
