import { DEFAULTS, atomicWriteFile, textFilePath, type SpeechDocument } from "@inboxcast/shared";

/**
 * Save the document body as <outputDir>/<date>-<subject_slug>.txt.
 * Returns the path written.
 */
export async function writeTextFile(
  doc: SpeechDocument,
  outputDir: string = DEFAULTS.outputDir
): Promise<string> {
  const path = textFilePath(outputDir, doc.date, doc.subject_slug);
  await atomicWriteFile(path, doc.body);
  return path;
}
