export type { FontFamily, FormatKind, ProjectType, ReportFormat, TextAlignment } from "./types/common.js";
export type { Chapter, ManuscriptDocument, Scene } from "./types/manuscript.js";
export type { InlineStyle, LineBreakRun, ParagraphBlock, RunStyle, StyledRun, TextRun } from "./types/runs.js";
export type { FontSizes, FormattingProfile, PageMargins, ProfileOverrides } from "./types/profile.js";
export type {
  ExportArtifact,
  ExportCommandOptions,
  ExportFailure,
  ExportFailureCategory,
  ExportFailureReason,
  ExportOptions,
  ExportResult,
  ExportSuccess,
  OutlineCommandOptions
} from "./types/export.js";
