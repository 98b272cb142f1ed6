import { isUtf8 } from "node:buffer";
import iconv from "iconv-lite";
import libqp from "libqp";
import { DecodeError } from "../errors.js";
import type { MimePart } from "./message-decoder.js";

export const DEFAULT_CHARSET = "utf-8";

export interface DecodeOptions {
  /**
   * Reject malformed UTF-8 and 8-bit bytes labelled as ASCII (default true).
   * Lenient decoding substitutes U+FFFD instead; unknown charsets still fail.
   */
  strict?: boolean;
}

/**
 * Undo the part's Content-Transfer-Encoding. 7bit, 8bit, binary and
 * unrecognized encodings pass the bytes through untouched.
 */
export function decodeTransferEncoding(part: MimePart): Buffer {
  switch (part.transferEncoding) {
    case "base64":
      return Buffer.from(part.body.toString("latin1"), "base64");
    case "quoted-printable":
      return libqp.decode(part.body.toString("latin1"));
    default:
      return part.body;
  }
}

/**
 * Decode bytes under the given charset (UTF-8 when absent).
 * Unknown charsets, malformed UTF-8 and 8-bit bytes labelled as ASCII
 * raise DecodeError instead of producing replacement characters.
 */
export function decodeCharset(
  bytes: Buffer,
  declared?: string,
  options: DecodeOptions = {}
): string {
  const strict = options.strict ?? true;
  const charset = (declared ?? DEFAULT_CHARSET).trim().toLowerCase();
  const canonical = charset.replace(/[^0-9a-z]/g, "");

  if (!iconv.encodingExists(charset)) {
    throw new DecodeError(charset, "unknown charset");
  }
  if (!strict) {
    return iconv.decode(bytes, charset);
  }
  if (canonical === "utf8" && !isUtf8(bytes)) {
    throw new DecodeError(charset, "invalid byte sequence");
  }
  if ((canonical === "ascii" || canonical === "usascii") && bytes.some((b) => b > 0x7f)) {
    throw new DecodeError(charset, "byte outside 7-bit range");
  }

  return iconv.decode(bytes, charset);
}

/**
 * Full text of a leaf part: transfer-decoded, charset-decoded, with line
 * endings normalized to "\n".
 */
export function decodePartText(part: MimePart, options: DecodeOptions = {}): string {
  const bytes = decodeTransferEncoding(part);
  return decodeCharset(bytes, part.charset, options).replace(/\r\n?/g, "\n");
}
