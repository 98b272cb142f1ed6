import { join } from "node:path";
import { INBOXCAST_BASE_DIR, BASE_FILES, DEFAULTS } from "../constants.js";

/** Resolve the root inboxcast directory, with optional override for testing. */
export function baseDir(override?: string): string {
  return override ?? INBOXCAST_BASE_DIR;
}

/** ~/.inboxcast/config.json */
export function configPath(base?: string): string {
  return join(baseDir(base), BASE_FILES.config);
}

/** ~/.inboxcast/logs/ */
export function logsDir(base?: string): string {
  return join(baseDir(base), "logs");
}

/** ~/.inboxcast/logs/processor.log */
export function logFilePath(base?: string): string {
  return join(logsDir(base), BASE_FILES.log);
}

/** <outputDir>/<date>-<subjectSlug>.txt */
export function textFilePath(
  outputDir: string,
  date: string,
  subjectSlug: string
): string {
  return join(outputDir, `${date}-${subjectSlug}${DEFAULTS.textExtension}`);
}

/** episodes/<feedSlug>/<episodeSlug>.mp3 (object-storage key, always "/") */
export function episodeAudioKey(feedSlug: string, episodeSlug: string): string {
  return `episodes/${feedSlug}/${episodeSlug}${DEFAULTS.audioExtension}`;
}
