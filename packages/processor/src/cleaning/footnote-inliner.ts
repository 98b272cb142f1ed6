import { SPOKEN_MARKERS } from "@inboxcast/shared";
import { DanglingFootnoteError } from "../errors.js";

/**
 * "[12] definition text". The text may start on a later line ("[12]" alone,
 * then the note), as when the number and the note are separate paragraphs.
 * The line break after the definition stays in place.
 */
const DEFINITION_LINE = /^\[(\d+)\]\s*(.+)$/gm;
const POINTER = /\[(\d+)\]/g;

export interface CollectedFootnotes {
  footnotes: Map<string, string>;
  remaining: string;
}

/**
 * Record every footnote definition line and cut it out of the text.
 * A repeated id keeps its last definition.
 */
export function collectFootnotes(text: string): CollectedFootnotes {
  const footnotes = new Map<string, string>();
  const remaining = text.replace(
    DEFINITION_LINE,
    (_line, id: string, definition: string) => {
      footnotes.set(id, definition);
      return "";
    }
  );
  return { footnotes, remaining };
}

/**
 * Replace each [n] pointer with a spoken aside built from the matching
 * definition, e.g. "[1]" → "Footnote begins. Mostly bonds. Footnote ends."
 *
 * Substitution runs on the text left after the definitions are removed,
 * so definition lines are never treated as pointers.
 *
 * @throws DanglingFootnoteError for a pointer with no definition
 */
export function inlineFootnotes(text: string): string {
  const { footnotes, remaining } = collectFootnotes(text);

  const inlined = remaining.replace(POINTER, (_pointer, id: string) => {
    const definition = footnotes.get(id);
    if (definition === undefined) {
      throw new DanglingFootnoteError(id);
    }
    return `${SPOKEN_MARKERS.footnoteBegins} ${definition.trim()} ${SPOKEN_MARKERS.footnoteEnds}`;
  });

  return inlined.trim();
}
