/**
 * URL Canonicalization Utility
 * Listing URLs are the catalog identity, so every URL is normalized before it is stored or compared
 */

const TRACKING_PARAMS = [
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'gclid',
  'fbclid',
  'msclkid',
  '_ga',
  'mc_cid',
  'mc_eid',
];

/**
 * Canonicalizes a listing URL:
 * 1. Resolves it against the source base URL when relative
 * 2. Lowercases the host
 * 3. Drops trailing slashes, the fragment and tracking parameters
 * 4. Sorts remaining query parameters
 *
 * Returns null when the href cannot be resolved to an http(s) URL.
 */
export function canonicalizeUrl(href: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(href, baseUrl) : new URL(href);
  } catch {
    return null;
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    return null;
  }

  const host = urlObj.host.toLowerCase();

  let pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const filteredParams = new URLSearchParams();
  for (const [key, value] of urlObj.searchParams.entries()) {
    if (!TRACKING_PARAMS.includes(key.toLowerCase())) {
      filteredParams.append(key, value);
    }
  }
  filteredParams.sort();

  // Assigned rather than resolved: a path starting with // must not become a host
  const canonicalUrl = new URL(`${urlObj.protocol}//${host}`);
  canonicalUrl.pathname = pathname;
  canonicalUrl.search = filteredParams.toString();

  return canonicalUrl.toString();
}
