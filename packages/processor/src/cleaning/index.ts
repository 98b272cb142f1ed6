export { processEmail, processMessage } from "./pipeline.js";
export { cleanMarkup, flattenMarkup, htmlToSpeechText } from "./structural-cleaner.js";
export { normalizeWhitespace } from "./whitespace-normalizer.js";
export { collectFootnotes, inlineFootnotes, type CollectedFootnotes } from "./footnote-inliner.js";
export { extractMetadata, type MessageMetadata } from "./metadata-extractor.js";
export { parseMailDate, formatDateStamp, type MailDate } from "./mail-date.js";
