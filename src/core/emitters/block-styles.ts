import type { FontFamily, FormattingProfile, TextAlignment } from "../types.js";

export type BlockRole =
  | "cover-title"
  | "cover-author"
  | "cover-info"
  | "toc-title"
  | "toc-entry"
  | "chapter-heading"
  | "scene-heading"
  | "paragraph"
  | "separator";

export interface BlockStyle {
  font: FontFamily;
  /** Points. */
  size: number;
  bold: boolean;
  align: TextAlignment;
  /** Points. */
  spaceBefore: number;
  /** Points. */
  spaceAfter: number;
  lineSpacing: number;
  /** Centimetres. */
  firstLineIndent: number;
}

export const CM_TO_PT = 72 / 2.54;

export function blockStyleFor(role: BlockRole, profile: FormattingProfile): BlockStyle {
  const { fonts, fontSizes } = profile;
  const centered = { align: "center" as const, lineSpacing: 1.2, firstLineIndent: 0 };
  switch (role) {
    case "cover-title":
      return { ...centered, font: fonts.heading, size: fontSizes.title, bold: true, spaceBefore: 0, spaceAfter: 30 };
    case "cover-author":
      return { ...centered, font: fonts.heading, size: fontSizes.scene + 2, bold: false, spaceBefore: 0, spaceAfter: 12 };
    case "cover-info":
      return { ...centered, font: fonts.heading, size: fontSizes.toc, bold: false, spaceBefore: 0, spaceAfter: 8 };
    case "toc-title":
      return { ...centered, font: fonts.heading, size: fontSizes.chapter + 2, bold: true, spaceBefore: 0, spaceAfter: 20 };
    case "toc-entry":
      return {
        font: fonts.body,
        size: fontSizes.toc,
        bold: false,
        align: "left",
        spaceBefore: 0,
        spaceAfter: 8,
        lineSpacing: 1.2,
        firstLineIndent: 0
      };
    case "chapter-heading":
      return {
        font: fonts.heading,
        size: fontSizes.chapter,
        bold: true,
        align: "left",
        spaceBefore: 30,
        spaceAfter: 20,
        lineSpacing: 1.2,
        firstLineIndent: 0
      };
    case "scene-heading":
      return {
        font: fonts.heading,
        size: fontSizes.scene,
        bold: true,
        align: "left",
        spaceBefore: 20,
        spaceAfter: 12,
        lineSpacing: 1.2,
        firstLineIndent: 0
      };
    case "separator":
      return { ...centered, font: fonts.body, size: fontSizes.body, bold: false, spaceBefore: 12, spaceAfter: 12 };
    case "paragraph":
      return {
        font: fonts.body,
        size: fontSizes.body,
        bold: false,
        align: profile.alignment,
        spaceBefore: profile.paragraphSpacing.before,
        spaceAfter: profile.paragraphSpacing.after,
        lineSpacing: profile.lineSpacing,
        firstLineIndent: profile.firstLineIndent
      };
  }
}
