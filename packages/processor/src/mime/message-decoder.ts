import libmime from "libmime";
import { MalformedMessageError } from "../errors.js";

export interface MimeHeader {
  readonly name: string;
  readonly value: string;
}

/**
 * One node of a parsed message. Multipart containers list their parts in
 * `children`; a message/rfc822 part holds the enclosed message as its only
 * child. `body` is the part's raw, still transfer-encoded, bytes.
 */
export interface MimePart {
  readonly headers: readonly MimeHeader[];
  readonly contentType: string;
  readonly params: Readonly<Record<string, string>>;
  readonly charset: string | undefined;
  readonly transferEncoding: string;
  readonly body: Buffer;
  readonly children: readonly MimePart[];
}

export interface MimeMessage {
  readonly root: MimePart;
}

const HEADER_FIELD = /^([!-9;-~]+)[ \t]*:[ \t]*(.*)$/;
const CONTENT_TYPE = /^[^\s/]+\/[^\s/]+$/;

/**
 * Parse raw RFC 822 / MIME source into an immutable part tree.
 * Byte input is read as-is; string input is encoded as UTF-8 first.
 *
 * Throws MalformedMessageError when there is no header block or when
 * multipart framing (boundary parameter, delimiter lines) is missing.
 */
export function decodeMessage(raw: Buffer | string): MimeMessage {
  const bytes = typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw;
  let source = bytes.toString("latin1").replace(/\r\n?/g, "\n");

  if (source.trim() === "") {
    throw new MalformedMessageError("Message is empty");
  }

  // mbox envelope line ("From sender@example.com Mon Jan 27 ...")
  if (source.startsWith("From ")) {
    const newline = source.indexOf("\n");
    source = newline === -1 ? "" : source.slice(newline + 1);
  }

  const root = parsePart(source, "text/plain");
  if (root.headers.length === 0) {
    throw new MalformedMessageError("Message has no header block");
  }

  return Object.freeze({ root });
}

/**
 * Case-insensitive header lookup; the first occurrence wins.
 */
export function getHeader(part: MimePart, name: string): string | undefined;
export function getHeader(part: MimePart, name: string, fallback: string): string;
export function getHeader(
  part: MimePart,
  name: string,
  fallback?: string
): string | undefined {
  const wanted = name.toLowerCase();
  const header = part.headers.find((h) => h.name.toLowerCase() === wanted);
  return header ? header.value : fallback;
}

/**
 * Depth-first, document-order traversal: a part is visited before its
 * children, and children in the order they were declared.
 */
export function* walkParts(part: MimePart): Generator<MimePart> {
  yield part;
  for (const child of part.children) {
    yield* walkParts(child);
  }
}

function parsePart(source: string, defaultType: string): MimePart {
  const { headers, body } = splitHeaders(source);

  const contentTypeHeader = headers.find(
    (h) => h.name.toLowerCase() === "content-type"
  );
  const { contentType, params } = parseContentType(
    contentTypeHeader?.value,
    defaultType
  );
  const transferEncoding = (
    headers.find((h) => h.name.toLowerCase() === "content-transfer-encoding")
      ?.value ?? "7bit"
  )
    .trim()
    .toLowerCase();

  let children: MimePart[] = [];
  if (contentType.startsWith("multipart/")) {
    const childType =
      contentType === "multipart/digest" ? "message/rfc822" : "text/plain";
    children = splitMultipart(body, params.boundary, contentType).map(
      (section) => parsePart(section, childType)
    );
  } else if (contentType === "message/rfc822") {
    children = [parsePart(body, "text/plain")];
  }

  return Object.freeze({
    headers: Object.freeze(headers),
    contentType,
    params: Object.freeze(params),
    charset: params.charset?.trim().toLowerCase() || undefined,
    transferEncoding,
    body: Buffer.from(body, "latin1"),
    children: Object.freeze(children),
  });
}

/**
 * Split a header block from its body. The block ends at the first empty
 * line, or at the first line that is neither a field nor a continuation.
 * Continuation lines are unfolded; header bytes are read as UTF-8.
 */
function splitHeaders(source: string): { headers: MimeHeader[]; body: string } {
  const lines = source.split("\n");
  const fields: string[] = [];

  let i = 0;
  for (; i < lines.length; i++) {
    const line = lines[i];
    if (line === "") {
      i++;
      break;
    }
    if (/^[ \t]/.test(line) && fields.length > 0) {
      fields[fields.length - 1] += line;
      continue;
    }
    if (!HEADER_FIELD.test(line)) break;
    fields.push(line);
  }

  const headers: MimeHeader[] = [];
  for (const field of fields) {
    const match = HEADER_FIELD.exec(field);
    if (!match) continue;
    headers.push(
      Object.freeze({
        name: match[1],
        value: Buffer.from(match[2], "latin1").toString("utf-8").trim(),
      })
    );
  }

  return { headers, body: lines.slice(i).join("\n") };
}

function parseContentType(
  value: string | undefined,
  defaultType: string
): { contentType: string; params: Record<string, string> } {
  if (value === undefined) {
    return { contentType: defaultType, params: {} };
  }

  const parsed = libmime.parseHeaderValue(value);
  const params: Record<string, string> = {};
  for (const [key, paramValue] of Object.entries(parsed.params)) {
    if (typeof paramValue === "string") {
      params[key.toLowerCase()] = paramValue;
    }
  }

  const type = parsed.value.trim().toLowerCase();
  return {
    contentType: CONTENT_TYPE.test(type) ? type : "text/plain",
    params,
  };
}

/**
 * Cut a multipart body into its sections. The preamble and the epilogue
 * are dropped; a missing close delimiter ends the last section at the end
 * of the input.
 */
function splitMultipart(
  body: string,
  boundary: string | undefined,
  contentType: string
): string[] {
  if (!boundary) {
    throw new MalformedMessageError(`${contentType} part has no boundary`);
  }

  const delimiter = `--${boundary}`;
  const sections: string[] = [];
  let current: string[] | null = null;
  let sawDelimiter = false;

  for (const line of body.split("\n")) {
    const rest = line.startsWith(delimiter)
      ? line.slice(delimiter.length)
      : null;

    if (rest !== null && /^[ \t]*$/.test(rest)) {
      if (current) sections.push(current.join("\n"));
      current = [];
      sawDelimiter = true;
    } else if (rest !== null && /^--[ \t]*$/.test(rest)) {
      if (current) sections.push(current.join("\n"));
      current = null;
      sawDelimiter = true;
      break;
    } else if (current) {
      current.push(line);
    }
  }

  if (current) sections.push(current.join("\n"));

  if (!sawDelimiter) {
    throw new MalformedMessageError(
      `Boundary "${boundary}" never appears in ${contentType} body`
    );
  }

  return sections;
}
