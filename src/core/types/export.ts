import type { ProfileOverrides } from "./profile.js";

export interface ExportOptions extends ProfileOverrides {
  includeCover: boolean;
  includeToc: boolean;
  includeFrontmatter: boolean;
  /** Clock for the cover and preamble dates. */
  now?: () => Date;
}

export type ExportFailureCategory = "validation" | "io" | "internal";

export type ExportFailureReason =
  | "NoProject"
  | "UnsupportedFormat"
  | "InvalidOptions"
  | "InvalidOutputPath"
  | "WriteFailed"
  | "EmitterMissing"
  | "RenderFailed";

export interface ExportArtifact {
  path: string;
  format: string;
  bytes: number;
  paragraphs: number;
  pageBreaks: number;
}

export interface ExportSuccess {
  ok: true;
  artifact: ExportArtifact;
}

export interface ExportFailure {
  ok: false;
  category: ExportFailureCategory;
  reason: ExportFailureReason;
  message: string;
}

export type ExportResult = ExportSuccess | ExportFailure;

export interface ExportCommandOptions {
  format?: string;
  out?: string;
  config?: string;
  cover?: boolean;
  toc?: boolean;
  chapterPageBreak?: boolean;
  sceneSeparators?: boolean;
  separator?: string;
  frontmatter?: boolean;
  report?: string;
  verbose?: boolean;
}

export interface OutlineCommandOptions {
  report?: string;
}
