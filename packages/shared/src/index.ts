export * from "./types.js";
export * from "./constants.js";
export * from "./utils/paths.js";
export * from "./utils/slug.js";
export { atomicWriteFile, atomicWriteJson } from "./utils/atomic-write.js";
