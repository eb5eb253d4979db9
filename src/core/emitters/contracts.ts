import type { FormatKind, FormattingProfile, ParagraphBlock } from "../types.js";
import { pluralize } from "../text.js";

export interface CoverMetadata {
  title: string;
  author: string;
  projectType: string;
  typeLabel: string;
  genre?: string;
  language: string;
  tags: string[];
  wordCount: number;
  chapterCount: number;
  exportedAt: Date;
}

export interface TocEntry {
  number: number;
  heading: string;
  sceneCount: number;
}

export type OutlineRole =
  | "cover"
  | "toc"
  | "chapter-heading"
  | "scene-heading"
  | "paragraph"
  | "separator"
  | "page-break";

export interface OutlineRun {
  kind: "text" | "break";
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

export interface OutlineBlock {
  role: OutlineRole;
  text: string;
  runs: OutlineRun[];
}

export interface RunEmitter {
  readonly kind: FormatKind;
  emitCoverPage(metadata: CoverMetadata, profile: FormattingProfile): void;
  emitTableOfContents(entries: readonly TocEntry[], profile: FormattingProfile): void;
  emitChapterHeading(text: string, profile: FormattingProfile): void;
  emitSceneHeading(text: string, profile: FormattingProfile): void;
  emitParagraph(block: ParagraphBlock, profile: FormattingProfile): void;
  emitSceneSeparator(profile: FormattingProfile): void;
  emitPageOrSectionBreak(): void;
  render(): Promise<Uint8Array>;
  outline(): OutlineBlock[];
}

export const TOC_TITLE = "Table of Contents";

export function tocLabel(entry: TocEntry): string {
  return entry.sceneCount > 0 ? `${entry.heading} (${pluralize(entry.sceneCount, "scene")})` : entry.heading;
}

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
] as const;

function monthName(date: Date): string {
  return MONTH_NAMES[date.getMonth()] ?? "";
}

/** `05 March 2026` */
export function formatCoverDate(date: Date): string {
  return `${String(date.getDate()).padStart(2, "0")} ${monthName(date)} ${date.getFullYear()}`;
}

/** `March 05, 2026` */
export function formatLongDate(date: Date): string {
  return `${monthName(date)} ${String(date.getDate()).padStart(2, "0")}, ${date.getFullYear()}`;
}

/** `2026-03-05` */
export function formatIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function textOutlineRun(text: string, style: { bold: boolean; italic: boolean; underline: boolean }): OutlineRun {
  return { kind: "text", text, bold: style.bold, italic: style.italic, underline: style.underline };
}

export const BREAK_OUTLINE_RUN: Readonly<OutlineRun> = Object.freeze({
  kind: "break",
  text: "\n",
  bold: false,
  italic: false,
  underline: false
});

export function outlineText(runs: readonly OutlineRun[]): string {
  return runs.map((run) => run.text).join("");
}
