import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { processEmail } from "./pipeline.js";
import { htmlToSpeechText } from "./structural-cleaner.js";
import { normalizeWhitespace } from "./whitespace-normalizer.js";
import { collectFootnotes, inlineFootnotes } from "./footnote-inliner.js";
import { parseMailDate, formatDateStamp } from "./mail-date.js";
import { extractMetadata } from "./metadata-extractor.js";
import { decodeMessage } from "../mime/message-decoder.js";
import {
  DanglingFootnoteError,
  DecodeError,
  NoRenderableContentError,
} from "../errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => readFile(join(__dirname, "__fixtures__", name));

// ── Structural Cleaner ──────────────────────────────────────────────

describe("htmlToSpeechText", () => {
  it("puts a blank line before paragraphs and headings", () => {
    expect(htmlToSpeechText("<h1>Title</h1><p>One.</p><p>Two.</p>")).toBe(
      "\n\nTitle\n\nOne.\n\nTwo."
    );
  });

  it("drops elements hidden with display:none, subtree included", () => {
    const html =
      '<div>Shown</div><div style="color: red; DISPLAY:none"><p>Hidden <b>deep</b></p></div><span>tail</span>';
    expect(htmlToSpeechText(html)).toBe("Showntail");
  });

  it("keeps elements that are only visually styled", () => {
    expect(htmlToSpeechText('<span style="display: block">Visible</span>')).toBe("Visible");
  });

  it("announces block quotes", () => {
    expect(htmlToSpeechText("<blockquote>Quoted.</blockquote>")).toBe(
      "\n\nBlock quote begins.\nQuoted.\n\nBlock quote ends.\n"
    );
  });

  it("discards everything after the last footnote at any depth", () => {
    const html =
      '<div><p>Intro text.</p><div class="footnotes">' +
      '<div id="footnote-1"><p>[1] First note.</p></div>' +
      '<div id="footnote-2"><p>[2] Second note.</p></div></div>' +
      '<div class="related"><h2>Related Articles</h2></div></div>' +
      "<p>Unsubscribe here</p>";

    expect(htmlToSpeechText(html)).toBe("\n\nIntro text.\n\n[1] First note.\n\n[2] Second note.");
  });

  it("ignores ids that only look like footnotes", () => {
    const html = '<p id="footnote-x">Not a note.</p><p>Still here.</p>';
    expect(htmlToSpeechText(html)).toBe("\n\nNot a note.\n\nStill here.");
  });

  it("leaves out script and style contents", () => {
    const html = "<style>p { color: red; }</style><p>Text</p><script>track()</script>";
    expect(htmlToSpeechText(html)).toBe("\n\nText");
  });

  it("returns an empty string for empty markup", () => {
    expect(htmlToSpeechText("")).toBe("");
  });
});

// ── Whitespace Normalizer ───────────────────────────────────────────

describe("normalizeWhitespace", () => {
  it("collapses runs of blank lines to one", () => {
    expect(normalizeWhitespace("a\n\n\n\nb")).toBe("a\n\nb");
    expect(normalizeWhitespace("a\n \n\t\n\nb")).toBe("a\n\nb");
  });

  it("collapses spaces and drops trailing spaces", () => {
    expect(normalizeWhitespace("a  \t b  \nc")).toBe("a b\nc");
  });

  it("removes soft line-wrap artifacts", () => {
    expect(normalizeWhitespace("foo=\nbar")).toBe("foobar");
    expect(normalizeWhitespace("foo= \t\nbar")).toBe("foobar");
  });

  it("is idempotent", () => {
    const samples = ["a==\n\nb", "  x \n\n\n y  ", "p=\n=\nq", "one\n\ntwo"];
    for (const sample of samples) {
      const once = normalizeWhitespace(sample);
      expect(normalizeWhitespace(once)).toBe(once);
    }
    expect(normalizeWhitespace("a==\n\nb")).toBe("ab");
  });

  it("trims the result", () => {
    expect(normalizeWhitespace("\n\n  Hello  \n\n")).toBe("Hello");
  });
});

// ── Footnote Inliner ────────────────────────────────────────────────

describe("collectFootnotes", () => {
  it("records definitions and removes their lines", () => {
    const { footnotes, remaining } = collectFootnotes("Body.[1]\n[1] Note one.\nMore.");
    expect(footnotes.get("1")).toBe("Note one.");
    expect(remaining).toBe("Body.[1]\n\nMore.");
  });

  it("leaves the line break of a removed definition", () => {
    expect(collectFootnotes("a\n[1] x\nb").remaining).toBe("a\n\nb");
  });

  it("reads a note that starts on the line after its number", () => {
    const { footnotes, remaining } = collectFootnotes("Body.[1]\n\n[1]\nThe note.");
    expect(footnotes.get("1")).toBe("The note.");
    expect(remaining).toBe("Body.[1]\n\n");
  });

  it("keeps the last definition of a repeated id", () => {
    const { footnotes } = collectFootnotes("[1] First.\n[1] Second.");
    expect(footnotes.get("1")).toBe("Second.");
  });
});

describe("inlineFootnotes", () => {
  it("replaces pointers with spoken asides", () => {
    expect(inlineFootnotes("See this.[1]\n\n[1] A note.")).toBe(
      "See this.Footnote begins. A note. Footnote ends."
    );
  });

  it("replaces every pointer to the same note", () => {
    expect(inlineFootnotes("A[1] B[1]\n[1]   Shared.   ")).toBe(
      "AFootnote begins. Shared. Footnote ends. BFootnote begins. Shared. Footnote ends."
    );
  });

  it("inlines a note split from its number", () => {
    expect(inlineFootnotes("Body.[1]\n\n[1]\nThe note.")).toBe(
      "Body.Footnote begins. The note. Footnote ends."
    );
  });

  it("leaves no pointer behind", () => {
    const text =
      "One[1] two[2] three[1] four[10].\n\n[1] First.\n[2]\nSecond.\n[10] Tenth.";
    const inlined = inlineFootnotes(text);

    expect(inlined).not.toMatch(/\[\d+\]/);
    expect(inlined.match(/Footnote begins\./g)).toHaveLength(4);
    expect(inlined.match(/Footnote ends\./g)).toHaveLength(4);
  });

  it("leaves text without footnotes alone", () => {
    expect(inlineFootnotes("Just words.")).toBe("Just words.");
  });

  it("fails on a pointer with no definition", () => {
    expect(() => inlineFootnotes("Text [3] here.")).toThrow(DanglingFootnoteError);
    try {
      inlineFootnotes("Text [3] here.");
    } catch (err) {
      expect(err).toBeInstanceOf(DanglingFootnoteError);
      if (err instanceof DanglingFootnoteError) {
        expect(err.footnoteId).toBe("3");
        expect(err.message).toBe("Footnote 3 not found.");
      }
    }
  });
});

// ── Dates ───────────────────────────────────────────────────────────

describe("parseMailDate", () => {
  it("parses an RFC 5322 date with a numeric zone", () => {
    expect(parseMailDate("Mon, 27 Jan 2025 23:30:00 -0800")).toEqual({
      year: 2025,
      month: 1,
      day: 27,
      hour: 23,
      minute: 30,
      second: 0,
      offsetMinutes: -480,
    });
  });

  it("keeps the calendar day written in the header", () => {
    const date = parseMailDate("Mon, 27 Jan 2025 23:30:00 -0800");
    expect(date && formatDateStamp(date)).toBe("2025-01-27");
  });

  it("accepts two-digit years, missing seconds and named zones", () => {
    const date = parseMailDate("27 Jan 99 10:00 GMT");
    expect(date?.year).toBe(1999);
    expect(date?.second).toBe(0);
    expect(date?.offsetMinutes).toBe(0);
    expect(parseMailDate("1 Mar 25 10:00 +0000")?.year).toBe(2025);
  });

  it("accepts asctime order", () => {
    const date = parseMailDate("Mon Jan 27 10:00:00 2025");
    expect(date && formatDateStamp(date)).toBe("2025-01-27");
    expect(date?.offsetMinutes).toBeNull();
  });

  it("rejects days that don't exist", () => {
    expect(parseMailDate("Thu, 31 Apr 2025 10:00:00 +0000")).toBeNull();
    expect(parseMailDate("29 Feb 2023 10:00:00 +0000")).toBeNull();
    expect(parseMailDate("29 Feb 2024 10:00:00 +0000")).not.toBeNull();
  });

  it("rejects numeric zones out of range", () => {
    expect(parseMailDate("Mon, 27 Jan 2025 10:00:00 +2500")).toBeNull();
    expect(parseMailDate("Mon, 27 Jan 2025 10:00:00 -0060")).toBeNull();
    expect(parseMailDate("Mon, 27 Jan 2025 10:00:00 +2359")?.offsetMinutes).toBe(1439);
  });

  it("rejects text that isn't a date", () => {
    expect(parseMailDate("")).toBeNull();
    expect(parseMailDate("not a date")).toBeNull();
    expect(parseMailDate("27 Foo 2025 10:00:00")).toBeNull();
    expect(parseMailDate("27 Jan 2025 25:00:00")).toBeNull();
  });
});

// ── Metadata ────────────────────────────────────────────────────────

describe("extractMetadata", () => {
  it("decodes encoded-word subjects", () => {
    const message = decodeMessage(
      "Subject: =?UTF-8?B?Q2Fmw6kgbmV3cw==?=\nDate: Tue, 4 Feb 2025 08:00:00 +0000\n\nbody"
    );
    expect(extractMetadata(message)).toEqual({
      date: "2025-02-04",
      subjectRaw: "Caf\u00e9 news",
      subjectSlug: "Caf\u00e9-news",
    });
  });

  it("falls back to the sentinel date and default subject", () => {
    const message = decodeMessage("From: a@example.com\n\nbody");
    expect(extractMetadata(message)).toEqual({
      date: "9999-12-31",
      subjectRaw: "No Subject",
      subjectSlug: "No-Subject",
    });
  });

  it("uses the sentinel for an unparseable date", () => {
    const message = decodeMessage("Subject: Hi\nDate: sometime soon\n\nbody");
    expect(extractMetadata(message).date).toBe("9999-12-31");
  });
});

// ── Full Pipeline ───────────────────────────────────────────────────

describe("processEmail", () => {
  it("turns a minimal HTML email into a speech document", () => {
    const raw =
      "Subject: My apocalypse: the end is near!\nContent-Type: text/html\n\n<p>Some content here.</p>";

    expect(processEmail(raw)).toEqual({
      date: "9999-12-31",
      subject_slug: "My-apocalypse-the-end-is-near",
      subject_raw: "My apocalypse: the end is near!",
      body: "Some content here.",
    });
  });

  it("processes a full newsletter issue", async () => {
    const doc = processEmail(await fixture("money-stuff.eml"));

    expect(doc.date).toBe("2025-01-27");
    expect(doc.subject_raw).toBe("Money Stuff: Bond Market Notes");
    expect(doc.subject_slug).toBe("Money-Stuff-Bond-Market-Notes");
    expect(doc.body).toBe(
      "Bonds are having a moment.Footnote begins. Mostly Treasuries. Footnote ends.\n\n" +
        "Block quote begins.\nRates went up.\n\nBlock quote ends.\n\n" +
        "That is the news.Footnote begins. Not investing advice. Footnote ends."
    );
  });

  it("returns a frozen document", () => {
    const doc = processEmail("Subject: x\nContent-Type: text/html\n\n<p>y</p>");
    expect(Object.isFrozen(doc)).toBe(true);
  });

  it("gives the same result for bytes and text input", () => {
    const raw = "Subject: Same\nContent-Type: text/html; charset=utf-8\n\n<p>Text</p>";
    expect(processEmail(Buffer.from(raw, "utf-8"))).toEqual(processEmail(raw));
  });

  it("fails when there is no HTML part", () => {
    expect(() => processEmail("Subject: Plain\nContent-Type: text/plain\n\nJust text")).toThrow(
      NoRenderableContentError
    );
  });

  it("fails on bytes that don't match the declared charset", () => {
    const raw = Buffer.concat([
      Buffer.from("Subject: Bad\nContent-Type: text/html; charset=utf-8\n\n<p>", "latin1"),
      Buffer.from([0xff, 0xfe]),
      Buffer.from("</p>", "latin1"),
    ]);
    expect(() => processEmail(raw)).toThrow(DecodeError);
  });

  it("inlines a footnote whose number is a paragraph of its own", () => {
    const raw =
      "Subject: x\nContent-Type: text/html\n\n" +
      '<p>Body.[1]</p><div id="footnote-1"><p>[1]</p><p>The note.</p></div>';
    expect(processEmail(raw).body).toBe("Body.Footnote begins. The note. Footnote ends.");
  });

  it("uses the sentinel date for an out-of-range zone", () => {
    const raw =
      "Subject: x\nDate: Mon, 27 Jan 2025 10:00:00 +2500\nContent-Type: text/html\n\n<p>y</p>";
    expect(processEmail(raw).date).toBe("9999-12-31");
  });

  it("fails on a dangling footnote pointer", () => {
    const raw = "Subject: x\nContent-Type: text/html\n\n<p>See [4].</p>";
    expect(() => processEmail(raw)).toThrow(DanglingFootnoteError);
  });
});
