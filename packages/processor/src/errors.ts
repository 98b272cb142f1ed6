export type EngineErrorCode =
  | "MALFORMED_MESSAGE"
  | "NO_RENDERABLE_CONTENT"
  | "DECODE_FAILED"
  | "DANGLING_FOOTNOTE";

/**
 * Base class for every failure the email-to-speech engine reports.
 * Callers switch on `code`; nothing is retried inside the engine.
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;
}

/** The input is not a structured message (no header block, broken multipart framing). */
export class MalformedMessageError extends EngineError {
  readonly code = "MALFORMED_MESSAGE";

  constructor(message: string) {
    super(message);
    this.name = "MalformedMessageError";
  }
}

/** No text/html part anywhere in the message: nothing to synthesize. */
export class NoRenderableContentError extends EngineError {
  readonly code = "NO_RENDERABLE_CONTENT";

  constructor() {
    super("No HTML part found in the email");
    this.name = "NoRenderableContentError";
  }
}

export class DecodeError extends EngineError {
  readonly code = "DECODE_FAILED";

  constructor(
    readonly charset: string,
    reason: string
  ) {
    super(`Cannot decode part as ${charset}: ${reason}`);
    this.name = "DecodeError";
  }
}

export class DanglingFootnoteError extends EngineError {
  readonly code = "DANGLING_FOOTNOTE";

  constructor(readonly footnoteId: string) {
    super(`Footnote ${footnoteId} not found.`);
    this.name = "DanglingFootnoteError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
