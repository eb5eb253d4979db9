import type { FontFamily, TextAlignment } from "./common.js";

export interface PageMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface FontSizes {
  title: number;
  chapter: number;
  scene: number;
  body: number;
  toc: number;
}

export interface FormattingProfile {
  projectType: string;
  fonts: {
    body: FontFamily;
    heading: FontFamily;
  };
  fontSizes: FontSizes;
  /** Multiple of the body font size. */
  lineSpacing: number;
  /** Points. */
  paragraphSpacing: {
    before: number;
    after: number;
  };
  /** Centimetres. */
  margins: PageMargins;
  alignment: TextAlignment;
  chapterStartsNewPage: boolean;
  sceneSeparator: string | null;
  /** Centimetres; only print and word backends indent. */
  firstLineIndent: number;
  sceneHeadingCase: "as-written" | "upper";
  preserveLineBreaks: boolean;
}

export interface ProfileOverrides {
  marginTop?: number;
  marginRight?: number;
  marginBottom?: number;
  marginLeft?: number;
  chapterFontSize?: number;
  sceneFontSize?: number;
  contentFontSize?: number;
  chapterPageBreak?: boolean;
  sceneSeparators?: boolean;
  separatorStyle?: string;
}
