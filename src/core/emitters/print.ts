import { escapeMarkupText, serializeRuns } from "../markup/serialize.js";
import type { FormattingProfile, ParagraphBlock } from "../types.js";
import { CM_TO_PT, type BlockRole } from "./block-styles.js";
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
  type RunEmitter,
  type TocEntry
} from "./contracts.js";
import { PdfLayout, fragmentRuns, type PrintBlock } from "./pdf-layout.js";

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

export interface PrintEmitterOptions {
  profile: FormattingProfile;
  metadata: CoverMetadata;
}

export class PrintEmitter implements RunEmitter {
  readonly kind = "print" as const;
  private readonly blocks: PrintBlock[] = [];

  constructor(private readonly options: PrintEmitterOptions) {}

  get printBlocks(): readonly PrintBlock[] {
    return this.blocks;
  }

  emitCoverPage(metadata: CoverMetadata, _profile: FormattingProfile): void {
    this.blocks.push({ type: "spacer", height: 5 * CM_TO_PT });
    this.pushText("cover-title", metadata.title);
    this.pushText("cover-author", `by ${metadata.author}`);
    this.blocks.push({ type: "spacer", height: 2 * CM_TO_PT });
    this.pushText("cover-info", metadata.typeLabel);
    if (metadata.genre) this.pushText("cover-info", metadata.genre);
    this.blocks.push({ type: "spacer", height: 2 * CM_TO_PT });
    this.pushText("cover-info", formatCoverDate(metadata.exportedAt));
  }

  emitTableOfContents(entries: readonly TocEntry[], _profile: FormattingProfile): void {
    this.pushText("toc-title", TOC_TITLE);
    this.blocks.push({ type: "spacer", height: CM_TO_PT });
    for (const entry of entries) {
      this.pushText("toc-entry", tocLabel(entry));
    }
  }

  emitChapterHeading(text: string, _profile: FormattingProfile): void {
    this.pushText("chapter-heading", text);
  }

  emitSceneHeading(text: string, _profile: FormattingProfile): void {
    this.pushText("scene-heading", text);
  }

  emitParagraph(block: ParagraphBlock, _profile: FormattingProfile): void {
    this.blocks.push({ type: "paragraph", role: "paragraph", markup: serializeRuns(block.runs) });
  }

  emitSceneSeparator(profile: FormattingProfile): void {
    if (profile.sceneSeparator) this.pushText("separator", profile.sceneSeparator);
  }

  emitPageOrSectionBreak(): void {
    this.blocks.push({ type: "page-break" });
  }

  async render(): Promise<Uint8Array> {
    const { metadata, profile } = this.options;
    const layout = new PdfLayout(profile);
    return layout.render(this.blocks, {
      title: metadata.title,
      author: metadata.author,
      subject: metadata.genre ? `${metadata.typeLabel} · ${metadata.genre}` : metadata.typeLabel
    });
  }

  outline(): OutlineBlock[] {
    const outline: OutlineBlock[] = [];
    for (const block of this.blocks) {
      if (block.type === "spacer") continue;
      if (block.type === "page-break") {
        outline.push({ role: "page-break", text: "", runs: [] });
        continue;
      }
      const runs = fragmentRuns(block.markup).map((run) =>
        run.kind === "break" ? { ...BREAK_OUTLINE_RUN } : textOutlineRun(run.text, run.style)
      );
      outline.push({ role: OUTLINE_ROLES[block.role], text: outlineText(runs), runs });
    }
    return outline;
  }

  private pushText(role: BlockRole, text: string): void {
    this.blocks.push({ type: "paragraph", role, markup: escapeMarkupText(text) });
  }
}
