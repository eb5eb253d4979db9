export type ProjectType =
  | "novel"
  | "short_story"
  | "article_magazine"
  | "article_social"
  | "poetry"
  | "screenplay"
  | "essay"
  | "research_paper";

export type FormatKind = "print" | "word" | "markup";
export type FontFamily = "serif" | "sans" | "mono";
export type TextAlignment = "left" | "center" | "justify";
export type ReportFormat = "text" | "json";
