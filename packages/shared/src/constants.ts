import { homedir } from "node:os";
import { join } from "node:path";

/** Root data directory */
export const INBOXCAST_BASE_DIR = join(homedir(), ".inboxcast");

/** Date used when a message has no parseable Date header; sorts last. */
export const UNKNOWN_DATE = "9999-12-31";

/** Subject used when a message has no Subject header */
export const DEFAULT_SUBJECT = "No Subject";

/** Spoken markers inserted into the cleaned text */
export const SPOKEN_MARKERS = {
  blockQuoteBegins: "Block quote begins.",
  blockQuoteEnds: "Block quote ends.",
  footnoteBegins: "Footnote begins.",
  footnoteEnds: "Footnote ends.",
} as const;

/** File names within the base directory */
export const BASE_FILES = {
  config: "config.json",
  log: "processor.log",
} as const;

/** Default config values */
export const DEFAULTS = {
  outputDir: "emails",
  ttsModel: "tts-1-hd",
  ttsVoice: "ash",
  audioExtension: ".mp3",
  textExtension: ".txt",
} as const;
