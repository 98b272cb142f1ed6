// Engine
export * from "./cleaning/index.js";
export * from "./mime/index.js";
export {
  EngineError,
  MalformedMessageError,
  NoRenderableContentError,
  DecodeError,
  DanglingFootnoteError,
  isEngineError,
  type EngineErrorCode,
} from "./errors.js";

// Orchestration
export * from "./sources/index.js";
export { writeTextFile } from "./storage/text-writer.js";
export { loadConfig, parseConfig, validateConfig, DEFAULT_CONFIG, type ValidationResult } from "./config.js";
export { initLogger, log, resetLogger, type LogLevel } from "./logger.js";
export { runCli, parseArgs, type CliOptions, type CliIo } from "./cli/run.js";
