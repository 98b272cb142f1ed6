import { DEFAULTS, type NewsletterPreset } from "@inboxcast/shared";

export const PRESETS: readonly NewsletterPreset[] = [
  {
    name: "Matt Levine - Money Stuff",
    route_tags: ["levine", "money-stuff", "moneystuff", "bloomberg"],
    tts_model: DEFAULTS.ttsModel,
    tts_voice: "ash",
    category: "Business",
    feed_slug: "levine",
  },
  {
    name: "Yglesias Substack",
    route_tags: ["yglesias", "slowboring", "substack-yglesias"],
    tts_model: DEFAULTS.ttsModel,
    tts_voice: "sage",
    category: "News",
    feed_slug: "yglesias",
  },
  {
    name: "Nate Silver - Silver Bulletin",
    route_tags: ["silver", "natesilver", "silverbulletin"],
    tts_model: DEFAULTS.ttsModel,
    tts_voice: "echo",
    category: "News",
    feed_slug: "silver",
  },
];

export const DEFAULT_PRESET: NewsletterPreset = {
  name: "General Newsletter",
  route_tags: [],
  tts_model: DEFAULTS.ttsModel,
  tts_voice: DEFAULTS.ttsVoice,
  category: "News",
  feed_slug: "general",
};

/**
 * Preset whose route tags contain `routeTag` (case-insensitive).
 * Missing, blank or unknown tags fall back to the general preset.
 */
export function resolvePreset(routeTag?: string | null): NewsletterPreset {
  const tag = routeTag?.trim().toLowerCase();
  if (!tag) return DEFAULT_PRESET;
  return PRESETS.find((preset) => preset.route_tags.includes(tag)) ?? DEFAULT_PRESET;
}
