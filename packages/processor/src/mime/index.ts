export {
  decodeMessage,
  getHeader,
  walkParts,
  type MimeMessage,
  type MimePart,
  type MimeHeader,
} from "./message-decoder.js";
export {
  selectRenderableContent,
  findFirstPart,
  RENDERABLE_CONTENT_TYPE,
} from "./content-selector.js";
export {
  decodePartText,
  decodeCharset,
  decodeTransferEncoding,
  type DecodeOptions,
} from "./charset.js";
