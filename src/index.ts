export { ExportCoordinator, exportManuscript, exportFailure, type ExportCoordinatorOptions } from "./core/coordinator.js";
export {
  FormatRegistry,
  createDefaultRegistry,
  normalizeFormatName,
  type EmitterContext,
  type FormatDescriptor,
  type FormatRegistration
} from "./core/registry.js";
export {
  EMPTY_SCENE_PLACEHOLDER,
  assembleDocument,
  buildCoverMetadata,
  buildTocEntries,
  outlineManuscript,
  type AssemblySummary,
  type ManuscriptOutline
} from "./core/assembler.js";
export { BASELINE_PROFILE, PROJECT_TYPE_PROFILES, resolveFormattingProfile } from "./core/formatting.js";
export { detectContentMode, parseSceneContent, type ContentMode } from "./core/markup/parse.js";
export { serializeMarkup } from "./core/markup/serialize.js";
export type { CoverMetadata, OutlineBlock, OutlineRun, RunEmitter, TocEntry } from "./core/emitters/contracts.js";
export { PrintEmitter } from "./core/emitters/print.js";
export { WordEmitter } from "./core/emitters/word.js";
export { MarkdownEmitter } from "./core/emitters/markdown.js";
export {
  countManuscriptWords,
  loadManuscript,
  parseManuscript,
  projectTypeLabel
} from "./core/manuscript.js";
export { DEFAULT_EXPORT_OPTIONS, exportOptionsSchema, loadOptionsFile, mergeExportOptions } from "./core/options.js";
export { createClackLogger, silentLogger, type ExportLogger } from "./core/logger.js";
export { writeArtifact } from "./core/write.js";
export {
  ConfigError,
  ExecutionError,
  FolioError,
  InternalInconsistencyError,
  UserInputError,
  normalizeError
} from "./core/errors.js";
export type * from "./core/types.js";
