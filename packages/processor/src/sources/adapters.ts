import { UNKNOWN_DATE, slugifyForUrl } from "@inboxcast/shared";
import { decodePartText } from "../mime/charset.js";
import { findFirstPart } from "../mime/content-selector.js";
import { getHeader, walkParts, type MimeMessage } from "../mime/message-decoder.js";
import { canonicalizeUrl, extractCandidateLinks } from "./links.js";

// ── Adapter kinds ───────────────────────────────────────────────────

export type SourceAdapter =
  | { kind: "default" }
  | { kind: "levine" }
  | { kind: "substack"; brandName: string; domain: string };

export const DEFAULT_ADAPTER: SourceAdapter = { kind: "default" };

const ADAPTERS = new Map<string, SourceAdapter>([
  ["levine", { kind: "levine" }],
  ["yglesias", { kind: "substack", brandName: "Slow Boring", domain: "slowboring.com" }],
  ["silver", { kind: "substack", brandName: "Silver Bulletin", domain: "natesilver.net" }],
]);

/** Adapter for a preset's feed slug; unknown feeds get the default adapter. */
export function getSourceAdapter(feedSlug: string): SourceAdapter {
  return ADAPTERS.get(feedSlug) ?? DEFAULT_ADAPTER;
}

export interface TitleInput {
  date: string;
  subjectRaw: string;
  subjectSlug: string;
}

export interface SourceUrlInput {
  date: string;
  subjectRaw: string;
}

const MONEY_STUFF_SUBJECT = /^Money Stuff:\s*(.+)$/i;
const LEVINE_NEWSLETTER_URL =
  /^https:\/\/www\.bloomberg\.com\/opinion\/newsletters\/\d{4}-\d{2}-\d{2}\/[^/?#]+/i;

// ── Titles ──────────────────────────────────────────────────────────

export function formatTitle(adapter: SourceAdapter, input: TitleInput): string {
  const subject = input.subjectRaw.trim() || input.subjectSlug.replace(/-/g, " ");

  switch (adapter.kind) {
    case "default":
      return subject;
    case "levine": {
      const match = MONEY_STUFF_SUBJECT.exec(subject);
      if (match) return `${input.date} - Money Stuff - ${match[1].trim()}`;
      return `${input.date} - ${subject}`;
    }
    case "substack": {
      const brandPrefix = new RegExp(`^${escapeRegExp(adapter.brandName)}:\\s*`, "i");
      return `${input.date} - ${adapter.brandName} - ${subject.replace(brandPrefix, "")}`;
    }
  }
}

// ── Body cleanup ────────────────────────────────────────────────────

/**
 * Per-source cleanup of the narration text. Substack posts read better from
 * their plain-text alternative, so that part replaces the engine body when
 * the message carries one.
 */
export function cleanSourceBody(
  adapter: SourceAdapter,
  message: MimeMessage,
  body: string
): string {
  switch (adapter.kind) {
    case "default":
    case "levine":
      return body;
    case "substack": {
      const plain = findFirstPart(message, "text/plain");
      return cleanSubstackText(plain ? decodePartText(plain, { strict: false }) : body);
    }
  }
}

export function cleanSubstackText(source: string): string {
  return source
    .replace(/\r/g, "")
    .replace(/[\u00ad\u034f]/g, "")
    .replace(/^View this post on the web at .*\n+/, "")
    .replace(/\s*\[\s*https?:\/\/[^\]]+\s*\]/g, "")
    .replace(/\nUnsubscribe\s+https?:\/\/[\s\S]*/, "")
    .replaceAll("READ IN APP", "")
    .replaceAll("Subscribed", "")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .replace(/ +\n/g, "\n")
    .trim();
}

// ── Source URLs ─────────────────────────────────────────────────────

/**
 * Canonical web address of the post, when one can be found offline.
 * Shortlinks and redirect links are not followed.
 */
export function extractSourceUrl(
  adapter: SourceAdapter,
  message: MimeMessage,
  input: SourceUrlInput
): string | null {
  switch (adapter.kind) {
    case "default":
      return null;
    case "levine":
      return extractLevineUrl(message, input);
    case "substack":
      return extractSubstackUrl(message, adapter.domain);
  }
}

function extractLevineUrl(message: MimeMessage, input: SourceUrlInput): string | null {
  for (const link of messageLinks(message)) {
    if (LEVINE_NEWSLETTER_URL.test(link)) {
      const canonical = canonicalizeUrl(link);
      if (canonical) return canonical;
    }
  }

  if (input.date === UNKNOWN_DATE) return null;

  const match = MONEY_STUFF_SUBJECT.exec(input.subjectRaw.trim());
  const inferredSlug = match ? slugifyForUrl(match[1]) : "";
  if (!inferredSlug) return null;
  return `https://www.bloomberg.com/opinion/newsletters/${input.date}/${inferredSlug}`;
}

function extractSubstackUrl(message: MimeMessage, domain: string): string | null {
  const postUrl = new RegExp(`https://(?:www\\.)?${escapeRegExp(domain)}/p/[^\\s<>?#]+`, "i");

  const listPost = getHeader(message.root, "List-Post", "");
  const headerMatch = postUrl.exec(listPost);
  if (headerMatch) {
    const canonical = canonicalizeUrl(headerMatch[0]);
    if (canonical) return canonical;
  }

  const anchored = new RegExp(`^${postUrl.source}`, "i");
  for (const link of messageLinks(message)) {
    const match = anchored.exec(link);
    if (match) {
      const canonical = canonicalizeUrl(match[0]);
      if (canonical) return canonical;
    }
  }
  return null;
}

/** Links from every text/plain and text/html part, in document order */
function messageLinks(message: MimeMessage): string[] {
  const chunks: string[] = [];
  for (const part of walkParts(message.root)) {
    if (part.contentType === "text/plain" || part.contentType === "text/html") {
      chunks.push(decodePartText(part, { strict: false }));
    }
  }
  return extractCandidateLinks(chunks.join("\n"));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
