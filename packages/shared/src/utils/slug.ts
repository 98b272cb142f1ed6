/**
 * Filesystem-safe rendering of a subject line.
 *
 * Keeps letters, digits, underscores, whitespace and hyphens (in any script),
 * trims, then turns each whitespace run into a single hyphen.
 *
 * Example: "My apocalypse: the end is near!" → "My-apocalypse-the-end-is-near"
 */
export function slugifySubject(text: string): string {
  const withoutPunctuation = text.replace(/[^\p{L}\p{N}_\s-]/gu, "");
  return withoutPunctuation.trim().replace(/\s+/g, "-");
}

/**
 * Lower-case ASCII slug for building publisher URLs.
 *
 * Example: "The SEC's New Rule" → "the-secs-new-rule"
 */
export function slugifyForUrl(text: string): string {
  const lower = text
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/\s+/g, "-");
  return lower.replace(/-+/g, "-").replace(/^-+|-+$/g, "");
}

/** Episode slug: <date>-<subjectSlug> */
export function episodeSlug(date: string, subjectSlug: string): string {
  return `${date}-${subjectSlug}`;
}
