const HTTP_URL = /https?:\/\/[^\s<>'"]+/g;
const TRAILING_PUNCTUATION = /[).,>]+$/;

/**
 * Every http(s) URL in the text, trailing punctuation removed, first
 * occurrence order, no duplicates.
 */
export function extractCandidateLinks(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(HTTP_URL)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, "");
    if (url) seen.add(url);
  }
  return [...seen];
}

/** scheme://host/path with query and fragment dropped; null if unparseable */
export function canonicalizeUrl(url: string): string | null {
  if (!URL.canParse(url)) return null;
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
}
