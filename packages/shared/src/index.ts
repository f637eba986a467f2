export {
  type Brand,
  type Branded,
  type StringId,
  type NormalizedPath,
  type CanonicalPath,
  type ContentHash,
  brandString,
  unbrand,
  normalizePathForId,
} from "./identity.js";
export { type Logger, SILENT_LOGGER, createConsoleLogger, describeError } from "./logger.js";
export {
  type DebugData,
  type DebugChannel,
  type DebugConfig,
  type Debug,
  debug,
  refreshDebugChannels,
  configureDebug,
  isDebugEnabled,
} from "./debug.js";
export { hashContent } from "./hash.js";
export {
  toSlashes,
  normalise,
  isAbsolutePath,
  dropTrailingSeparator,
  equalFilePath,
  takeDirectory,
  ancestors,
  stripFilePath,
  isFilePathPrefixOf,
  makeRelative,
  relativeTo,
  joinPath,
  dropExtension,
  moduleNameFromPath,
} from "./path-matcher.js";
export type { FileSystemContext, FileSystemContextOptions } from "./fs/context.js";
export { createNodeFileSystem } from "./fs/node-context.js";
export {
  type MockFileSystemOptions,
  type MockFileSystemContext,
  createMockFileSystem,
} from "./fs/mock-context.js";
export { toFsPath, canonicalPath } from "./paths.js";
