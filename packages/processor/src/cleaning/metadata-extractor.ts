import libmime from "libmime";
import {
  DEFAULT_SUBJECT,
  UNKNOWN_DATE,
  slugifySubject,
} from "@inboxcast/shared";
import { getHeader, type MimeMessage } from "../mime/message-decoder.js";
import { parseMailDate, formatDateStamp } from "./mail-date.js";

export interface MessageMetadata {
  date: string;
  subjectSlug: string;
  subjectRaw: string;
}

/**
 * Filing metadata from the message headers:
 * - date: the Date header's calendar day as YYYY-MM-DD, or 9999-12-31
 *   when the header is missing or unparseable (sorts last)
 * - subjectRaw: Subject with encoded words decoded, trimmed
 * - subjectSlug: filesystem-safe version of subjectRaw
 */
export function extractMetadata(message: MimeMessage): MessageMetadata {
  const parsedDate = parseMailDate(getHeader(message.root, "Date", ""));
  const date = parsedDate ? formatDateStamp(parsedDate) : UNKNOWN_DATE;

  const subjectHeader = getHeader(message.root, "Subject", DEFAULT_SUBJECT);
  const subjectRaw = libmime.decodeWords(subjectHeader).trim();

  return {
    date,
    subjectSlug: slugifySubject(subjectRaw),
    subjectRaw,
  };
}
