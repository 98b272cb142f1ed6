/** "=" + horizontal whitespace + line break: quoted-printable soft wrap */
const SOFT_BREAK = /=[^\S\n]*\n/g;
const BLANK_LINE_RUN = /\n\s*\n\s*\n+/g;
const HORIZONTAL_RUN = /[^\S\r\n]+/g;
const TRAILING_SPACE = /[^\S\r\n]+\n/g;

/**
 * Canonical spacing for flattened newsletter text.
 *
 * - Remove soft-wrap artifacts
 * - Collapse runs of 3+ line breaks to one blank line
 * - Collapse spaces/tabs to a single space
 * - Drop spaces before line breaks
 * - Trim
 *
 * normalizeWhitespace(normalizeWhitespace(t)) === normalizeWhitespace(t)
 */
export function normalizeWhitespace(text: string): string {
  return stripSoftBreaks(text)
    .replace(BLANK_LINE_RUN, "\n\n")
    .replace(HORIZONTAL_RUN, " ")
    .replace(TRAILING_SPACE, "\n")
    .trim();
}

// Removing "=\n" can bring an earlier "=" up against the next break ("==\n"),
// so repeat until nothing matches.
function stripSoftBreaks(text: string): string {
  let previous: string;
  let result = text;
  do {
    previous = result;
    result = result.replace(SOFT_BREAK, "");
  } while (result !== previous);
  return result;
}
