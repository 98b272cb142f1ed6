export { resolvePreset, PRESETS, DEFAULT_PRESET } from "./presets.js";
export {
  getSourceAdapter,
  formatTitle,
  cleanSourceBody,
  cleanSubstackText,
  extractSourceUrl,
  DEFAULT_ADAPTER,
  type SourceAdapter,
  type TitleInput,
  type SourceUrlInput,
} from "./adapters.js";
export { extractCandidateLinks, canonicalizeUrl } from "./links.js";
export { planEpisode, type PlanOptions } from "./episode-planner.js";
