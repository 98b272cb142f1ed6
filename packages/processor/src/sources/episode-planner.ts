import {
  episodeAudioKey,
  episodeSlug,
  type EpisodePlan,
  type SpeechDocument,
} from "@inboxcast/shared";
import type { MimeMessage } from "../mime/message-decoder.js";
import { resolvePreset } from "./presets.js";
import {
  cleanSourceBody,
  extractSourceUrl,
  formatTitle,
  getSourceAdapter,
} from "./adapters.js";

export interface PlanOptions {
  routeTag?: string | null;
  /** Voice overrides from config.json; the environment wins over these */
  ttsModel?: string | null;
  ttsVoice?: string | null;
  env?: NodeJS.ProcessEnv;
}

/**
 * Describe the podcast episode a processed newsletter would become:
 * preset, title, storage key, voice and canonical web address.
 */
export function planEpisode(
  doc: SpeechDocument,
  message: MimeMessage,
  options: PlanOptions = {}
): EpisodePlan {
  const env = options.env ?? process.env;
  const preset = resolvePreset(options.routeTag);
  const adapter = getSourceAdapter(preset.feed_slug);
  const slug = episodeSlug(doc.date, doc.subject_slug);

  return {
    slug,
    audio_key: episodeAudioKey(preset.feed_slug, slug),
    title: formatTitle(adapter, {
      date: doc.date,
      subjectRaw: doc.subject_raw,
      subjectSlug: doc.subject_slug,
    }),
    feed_slug: preset.feed_slug,
    category: preset.category,
    preset_name: preset.name,
    tts_model: env.TTS_MODEL || options.ttsModel || preset.tts_model,
    tts_voice: env.TTS_VOICE || options.ttsVoice || preset.tts_voice,
    source_url: extractSourceUrl(adapter, message, {
      date: doc.date,
      subjectRaw: doc.subject_raw,
    }),
    body: cleanSourceBody(adapter, message, doc.body),
  };
}
