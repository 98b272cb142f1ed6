// ── Speech Document (engine output) ─────────────────────────────────

export interface SpeechDocument {
  readonly date: string; // YYYY-MM-DD, or the 9999-12-31 sentinel
  readonly subject_slug: string;
  readonly subject_raw: string;
  readonly body: string;
}

// ── Newsletter Preset ───────────────────────────────────────────────

export interface NewsletterPreset {
  name: string;
  route_tags: readonly string[];
  tts_model: string;
  tts_voice: string;
  category: string;
  feed_slug: string;
}

// ── Episode Plan ────────────────────────────────────────────────────

export interface EpisodePlan {
  slug: string;
  audio_key: string; // episodes/<feed_slug>/<slug>.mp3
  title: string;
  feed_slug: string;
  category: string;
  preset_name: string;
  tts_model: string;
  tts_voice: string;
  source_url: string | null;
  body: string;
}

// ── App Config (config.json) ────────────────────────────────────────

export interface AppConfig {
  output_dir: string;
  default_route_tag: string | null;
  tts_model: string | null;
  tts_voice: string | null;
}
