import { NoRenderableContentError } from "../errors.js";
import { decodePartText } from "./charset.js";
import { walkParts, type MimeMessage, type MimePart } from "./message-decoder.js";

export const RENDERABLE_CONTENT_TYPE = "text/html";

/**
 * First part of the given content type in depth-first document order.
 */
export function findFirstPart(
  message: MimeMessage,
  contentType: string
): MimePart | undefined {
  for (const part of walkParts(message.root)) {
    if (part.contentType === contentType) return part;
  }
  return undefined;
}

/**
 * Decoded markup of the first text/html part. A plain-text alternative that
 * comes earlier in the message is skipped.
 *
 * Throws NoRenderableContentError when the message has no HTML part, and
 * DecodeError when the part's bytes don't fit its charset.
 */
export function selectRenderableContent(message: MimeMessage): string {
  const part = findFirstPart(message, RENDERABLE_CONTENT_TYPE);
  if (!part) {
    throw new NoRenderableContentError();
  }
  return decodePartText(part);
}
