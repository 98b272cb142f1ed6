import { load, type CheerioAPI } from "cheerio";
import { Text, type AnyNode } from "domhandler";
import { SPOKEN_MARKERS } from "@inboxcast/shared";

const HIDDEN_STYLE = /display\s*:\s*none/i;
const FOOTNOTE_ID = /^footnote-\d+$/;
const SPACED_ELEMENTS = "p, h1, h2, h3, h4, h5, h6";
const NON_TEXT_ELEMENTS = "script, style, template";

/**
 * Prepare newsletter HTML for linearization.
 *
 * Steps (each assumes the previous ones ran):
 * 1. Drop elements styled display:none, with their subtrees
 * 2. Drop everything after the last footnote-<n> element
 * 3. Announce blockquotes
 * 4. Put a blank line before every paragraph and heading
 */
export function cleanMarkup(html: string): CheerioAPI {
  const $ = load(html);

  removeHiddenElements($);
  truncateAfterFootnotes($);
  annotateBlockquotes($);
  markParagraphBreaks($);

  return $;
}

/**
 * Concatenate the document's text in order, markup discarded.
 */
export function flattenMarkup($: CheerioAPI): string {
  $(NON_TEXT_ELEMENTS).remove();
  return $.root().text();
}

/** cleanMarkup followed by flattenMarkup. Empty or tag-free input gives "". */
export function htmlToSpeechText(html: string): string {
  return flattenMarkup(cleanMarkup(html));
}

function removeHiddenElements($: CheerioAPI): void {
  $("[style]")
    .filter((_, el) => HIDDEN_STYLE.test(el.attribs.style))
    .remove();
}

/**
 * Keep everything up to the end of the last footnote element and discard
 * whatever follows it at any depth: from that element up to the document
 * root, every later sibling is marked, then all marked nodes are removed
 * in one pass. Related-articles blocks and footers go with them.
 */
function truncateAfterFootnotes($: CheerioAPI): void {
  const lastFootnote = $("[id]")
    .filter((_, el) => FOOTNOTE_ID.test(el.attribs.id))
    .last()
    .get(0);
  if (!lastFootnote) return;

  const trailing: AnyNode[] = [];
  let current: AnyNode | null = lastFootnote;
  while (current) {
    for (let sibling = current.next; sibling; sibling = sibling.next) {
      trailing.push(sibling);
    }
    current = current.parent;
  }

  $(trailing).remove();
}

function annotateBlockquotes($: CheerioAPI): void {
  $("blockquote").each((_, el) => {
    $(el).before(new Text(`\n\n${SPOKEN_MARKERS.blockQuoteBegins}\n`));
    $(el).after(new Text(`\n\n${SPOKEN_MARKERS.blockQuoteEnds}\n`));
  });
}

function markParagraphBreaks($: CheerioAPI): void {
  $(SPACED_ELEMENTS).each((_, el) => {
    $(el).before(new Text("\n\n"));
  });
}
