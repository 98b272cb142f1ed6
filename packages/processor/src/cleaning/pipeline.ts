import type { SpeechDocument } from "@inboxcast/shared";
import { decodeMessage, type MimeMessage } from "../mime/message-decoder.js";
import { selectRenderableContent } from "../mime/content-selector.js";
import { htmlToSpeechText } from "./structural-cleaner.js";
import { normalizeWhitespace } from "./whitespace-normalizer.js";
import { inlineFootnotes } from "./footnote-inliner.js";
import { extractMetadata } from "./metadata-extractor.js";

/**
 * Full pipeline: raw email → speech-ready text plus filing metadata.
 *
 * Steps:
 * 1. MIME decode into a part tree
 * 2. Select the first text/html part
 * 3. Prune and flatten the markup
 * 4. Normalize whitespace
 * 5. Inline footnotes
 * 6. Date and subject from the headers
 *
 * Synchronous and stateless; any EngineError aborts without a result.
 */
export function processEmail(raw: Buffer | string): SpeechDocument {
  return processMessage(decodeMessage(raw));
}

/** Same as processEmail, for callers that already hold the decoded message. */
export function processMessage(message: MimeMessage): SpeechDocument {
  const html = selectRenderableContent(message);
  const metadata = extractMetadata(message);

  const text = normalizeWhitespace(htmlToSpeechText(html));
  const body = inlineFootnotes(text);

  return Object.freeze({
    date: metadata.date,
    subject_slug: metadata.subjectSlug,
    subject_raw: metadata.subjectRaw,
    body,
  });
}
