import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  PageBreak,
  Paragraph,
  TextRun,
  convertMillimetersToTwip,
  type IRunOptions
} from "docx";

import type { FontFamily, FormattingProfile, ParagraphBlock, TextAlignment } from "../types.js";
import { CM_TO_PT, blockStyleFor, type BlockRole } from "./block-styles.js";
import {
  BREAK_OUTLINE_RUN,
  TOC_TITLE,
  formatCoverDate,
  outlineText,
  textOutlineRun,
  tocLabel,
  type CoverMetadata,
  type OutlineBlock,
  type OutlineRole,
  type OutlineRun,
  type RunEmitter,
  type TocEntry
} from "./contracts.js";

export type WordFragment = IRunOptions;

export type WordBlock =
  | { type: "paragraph"; role: BlockRole; fragments: WordFragment[]; extraBefore: number }
  | { type: "page-break" };

const WORD_FONTS: Record<FontFamily, string> = {
  serif: "Times New Roman",
  sans: "Arial",
  mono: "Courier New"
};

const ALIGNMENTS = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  justify: AlignmentType.JUSTIFIED
} as const satisfies Record<TextAlignment, unknown>;

const HEADINGS: Partial<Record<BlockRole, (typeof HeadingLevel)[keyof typeof HeadingLevel]>> = {
  "cover-title": HeadingLevel.TITLE,
  "toc-title": HeadingLevel.HEADING_1,
  "chapter-heading": HeadingLevel.HEADING_1,
  "scene-heading": HeadingLevel.HEADING_2
};

const OUTLINE_ROLES: Record<BlockRole, OutlineRole> = {
  "cover-title": "cover",
  "cover-author": "cover",
  "cover-info": "cover",
  "toc-title": "toc",
  "toc-entry": "toc",
  "chapter-heading": "chapter-heading",
  "scene-heading": "scene-heading",
  paragraph: "paragraph",
  separator: "separator"
};

const LINE_BREAK: WordFragment = Object.freeze({ break: 1 });

function toTwip(points: number): number {
  return Math.round(points * 20);
}

function fragmentToOutline(fragment: WordFragment): OutlineRun {
  if (fragment.text === undefined) return { ...BREAK_OUTLINE_RUN };
  return textOutlineRun(fragment.text, {
    bold: fragment.bold === true,
    italic: fragment.italics === true,
    underline: fragment.underline !== undefined
  });
}

export interface WordEmitterOptions {
  profile: FormattingProfile;
  metadata: CoverMetadata;
}

export class WordEmitter implements RunEmitter {
  readonly kind = "word" as const;
  private readonly blocks: WordBlock[] = [];

  constructor(private readonly options: WordEmitterOptions) {}

  get wordBlocks(): readonly WordBlock[] {
    return this.blocks;
  }

  emitCoverPage(metadata: CoverMetadata, _profile: FormattingProfile): void {
    this.pushText("cover-title", metadata.title, 5 * CM_TO_PT);
    this.pushText("cover-author", `by ${metadata.author}`);
    this.pushText("cover-info", metadata.typeLabel, 2 * CM_TO_PT);
    if (metadata.genre) this.pushText("cover-info", metadata.genre);
    this.pushText("cover-info", formatCoverDate(metadata.exportedAt), 2 * CM_TO_PT);
  }

  emitTableOfContents(entries: readonly TocEntry[], _profile: FormattingProfile): void {
    this.pushText("toc-title", TOC_TITLE);
    entries.forEach((entry, index) => {
      this.pushText("toc-entry", tocLabel(entry), index === 0 ? CM_TO_PT : 0);
    });
  }

  emitChapterHeading(text: string, _profile: FormattingProfile): void {
    this.pushText("chapter-heading", text);
  }

  emitSceneHeading(text: string, _profile: FormattingProfile): void {
    this.pushText("scene-heading", text);
  }

  emitParagraph(block: ParagraphBlock, _profile: FormattingProfile): void {
    const fragments: WordFragment[] = block.runs.map((run) => {
      if (run.kind === "break") return LINE_BREAK;
      return {
        text: run.text,
        ...(run.style.bold ? { bold: true } : {}),
        ...(run.style.italic ? { italics: true } : {}),
        ...(run.style.underline ? { underline: {} } : {})
      };
    });
    this.blocks.push({ type: "paragraph", role: "paragraph", fragments, extraBefore: 0 });
  }

  emitSceneSeparator(profile: FormattingProfile): void {
    if (profile.sceneSeparator) this.pushText("separator", profile.sceneSeparator);
  }

  emitPageOrSectionBreak(): void {
    this.blocks.push({ type: "page-break" });
  }

  toDocument(): Document {
    const { profile, metadata } = this.options;
    const children: Paragraph[] = [];
    let breakPending = false;

    for (const block of this.blocks) {
      if (block.type === "page-break") {
        if (breakPending) children.push(new Paragraph({ children: [new PageBreak()] }));
        breakPending = true;
        continue;
      }
      children.push(this.toParagraph(block, breakPending));
      breakPending = false;
    }
    if (breakPending) children.push(new Paragraph({ children: [new PageBreak()] }));

    return new Document({
      creator: "folio-press",
      title: metadata.title,
      description: metadata.genre ? `${metadata.typeLabel} · ${metadata.genre}` : metadata.typeLabel,
      sections: [
        {
          properties: {
            page: {
              margin: {
                top: convertMillimetersToTwip(profile.margins.top * 10),
                right: convertMillimetersToTwip(profile.margins.right * 10),
                bottom: convertMillimetersToTwip(profile.margins.bottom * 10),
                left: convertMillimetersToTwip(profile.margins.left * 10)
              }
            }
          },
          children
        }
      ]
    });
  }

  async render(): Promise<Uint8Array> {
    const buffer = await Packer.toBuffer(this.toDocument());
    return new Uint8Array(buffer);
  }

  outline(): OutlineBlock[] {
    return this.blocks.map((block) => {
      if (block.type === "page-break") return { role: "page-break", text: "", runs: [] };
      const runs = block.fragments.map(fragmentToOutline);
      return { role: OUTLINE_ROLES[block.role], text: outlineText(runs), runs };
    });
  }

  private toParagraph(block: Extract<WordBlock, { type: "paragraph" }>, pageBreakBefore: boolean): Paragraph {
    const style = blockStyleFor(block.role, this.options.profile);
    const heading = HEADINGS[block.role];
    const runs = block.fragments.map(
      (fragment) =>
        new TextRun({
          ...fragment,
          font: WORD_FONTS[style.font],
          size: Math.round(style.size * 2),
          ...(style.bold ? { bold: true } : {})
        })
    );
    return new Paragraph({
      children: runs,
      alignment: ALIGNMENTS[style.align],
      spacing: {
        before: toTwip(style.spaceBefore + block.extraBefore),
        after: toTwip(style.spaceAfter),
        line: Math.round(240 * style.lineSpacing)
      },
      ...(heading ? { heading } : {}),
      ...(style.firstLineIndent > 0 ? { indent: { firstLine: convertMillimetersToTwip(style.firstLineIndent * 10) } } : {}),
      ...(pageBreakBefore ? { pageBreakBefore: true } : {})
    });
  }

  private pushText(role: BlockRole, text: string, extraBefore = 0): void {
    this.blocks.push({ type: "paragraph", role, fragments: [{ text }], extraBefore });
  }
}
