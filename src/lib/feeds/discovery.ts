const LINK_TAG = /<link\b[^>]*>/gi;
const REL_ALTERNATE = /\brel\s*=\s*["'][^"']*\balternate\b[^"']*["']/i;
const FEED_TYPE = /\btype\s*=\s*["']application\/(?:rss|atom)\+xml["']/i;
const HREF = /\bhref\s*=\s*(["'])(.*?)\1/i;

function decodeAttribute(value: string): string {
  return value
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .trim();
}

/**
 * First `<link rel="alternate">` in an HTML page that advertises an RSS or
 * Atom feed, resolved against the page URL. Attribute order and quoting
 * style do not matter.
 */
export function findFeedLink(html: string, pageUrl: string): string | null {
  for (const [tag] of html.matchAll(LINK_TAG)) {
    if (!REL_ALTERNATE.test(tag) || !FEED_TYPE.test(tag)) continue;
    const href = HREF.exec(tag)?.[2];
    if (!href) continue;
    const value = decodeAttribute(href);
    if (URL.canParse(value, pageUrl)) return new URL(value, pageUrl).href;
  }
  return null;
}
