import { jsPDF } from "jspdf";

import { parseMarkupFragment } from "../markup/html.js";
import type { FontFamily, FormattingProfile, StyledRun } from "../types.js";
import { CM_TO_PT, blockStyleFor, type BlockRole, type BlockStyle } from "./block-styles.js";

export type PrintBlock =
  | { type: "paragraph"; role: BlockRole; markup: string }
  | { type: "spacer"; height: number }
  | { type: "page-break" };

export interface PdfDocumentProperties {
  title: string;
  author: string;
  subject?: string;
}

const FONT_NAMES: Record<FontFamily, string> = {
  serif: "times",
  sans: "helvetica",
  mono: "courier"
};
const TURNOVER_INDENT_CM = 1;

interface Piece {
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  width: number;
}

interface Word {
  pieces: Piece[];
  width: number;
}

interface WordGroup {
  /** Width of the whitespace that opens the group. */
  lead: number;
  words: Word[];
}

interface Line {
  words: Word[];
  width: number;
  indent: number;
  /** Ends at an explicit break or the end of the paragraph. */
  hard: boolean;
}

/** Runs of a stored block fragment, whitespace kept as the paragraph had it. */
export function fragmentRuns(markup: string): StyledRun[] {
  return parseMarkupFragment(markup, { preserveWhitespace: true });
}

function fontStyle(bold: boolean, italic: boolean): string {
  if (bold && italic) return "bolditalic";
  if (bold) return "bold";
  if (italic) return "italic";
  return "normal";
}

export class PdfLayout {
  private readonly doc: jsPDF;
  private readonly pageWidth: number;
  private readonly pageHeight: number;
  private readonly margins: { top: number; right: number; bottom: number; left: number };
  private cursorY: number;

  constructor(private readonly profile: FormattingProfile) {
    this.doc = new jsPDF({ unit: "pt", format: "a4" });
    this.pageWidth = this.doc.internal.pageSize.getWidth();
    this.pageHeight = this.doc.internal.pageSize.getHeight();
    this.margins = {
      top: profile.margins.top * CM_TO_PT,
      right: profile.margins.right * CM_TO_PT,
      bottom: profile.margins.bottom * CM_TO_PT,
      left: profile.margins.left * CM_TO_PT
    };
    this.cursorY = this.margins.top;
  }

  render(blocks: readonly PrintBlock[], properties: PdfDocumentProperties): Uint8Array {
    this.doc.setProperties({
      title: properties.title,
      author: properties.author,
      subject: properties.subject ?? "",
      creator: "folio-press"
    });

    for (const block of blocks) {
      if (block.type === "page-break") {
        this.newPage();
      } else if (block.type === "spacer") {
        this.advance(block.height);
      } else {
        this.renderParagraph(fragmentRuns(block.markup), blockStyleFor(block.role, this.profile));
      }
    }
    return new Uint8Array(this.doc.output("arraybuffer"));
  }

  private get contentWidth(): number {
    return this.pageWidth - this.margins.left - this.margins.right;
  }

  private get bottomLimit(): number {
    return this.pageHeight - this.margins.bottom;
  }

  private newPage(): void {
    this.doc.addPage();
    this.cursorY = this.margins.top;
  }

  private advance(height: number): void {
    if (this.cursorY + height > this.bottomLimit) {
      this.newPage();
      return;
    }
    this.cursorY += height;
  }

  private measure(text: string, style: BlockStyle, bold: boolean, italic: boolean): number {
    this.doc.setFont(FONT_NAMES[style.font], fontStyle(bold, italic));
    this.doc.setFontSize(style.size);
    return this.doc.getTextWidth(text);
  }

  private toWordGroups(runs: readonly StyledRun[], style: BlockStyle): WordGroup[] {
    const groups: WordGroup[] = [{ lead: 0, words: [] }];
    let word: Word | undefined;
    const endWord = (): void => {
      if (word && word.pieces.length > 0) groups.at(-1)?.words.push(word);
      word = undefined;
    };

    for (const run of runs) {
      if (run.kind === "break") {
        endWord();
        groups.push({ lead: 0, words: [] });
        continue;
      }
      for (const token of run.text.split(/(\s+)/)) {
        if (token.length === 0) continue;
        if (/^\s+$/.test(token)) {
          endWord();
          const group = groups.at(-1);
          if (group && group.words.length === 0) {
            group.lead += this.measure(token, style, style.bold || run.style.bold, run.style.italic);
          }
          continue;
        }
        const bold = style.bold || run.style.bold;
        const width = this.measure(token, style, bold, run.style.italic);
        word ??= { pieces: [], width: 0 };
        word.pieces.push({ text: token, bold, italic: run.style.italic, underline: run.style.underline, width });
        word.width += width;
      }
    }
    endWord();
    return groups;
  }

  private wrap(groups: WordGroup[], style: BlockStyle, spaceWidth: number): Line[] {
    const lines: Line[] = [];
    const firstIndent = style.firstLineIndent * CM_TO_PT;
    const turnoverIndent = this.profile.preserveLineBreaks && style.align !== "center" ? TURNOVER_INDENT_CM * CM_TO_PT : 0;

    groups.forEach(({ lead, words }, groupIndex) => {
      let current: Line = { words: [], width: 0, indent: (groupIndex === 0 ? firstIndent : 0) + lead, hard: false };
      for (const word of words) {
        const gap = current.words.length > 0 ? spaceWidth : 0;
        const available = this.contentWidth - current.indent;
        if (current.words.length > 0 && current.width + gap + word.width > available) {
          lines.push(current);
          current = { words: [], width: 0, indent: turnoverIndent, hard: false };
        }
        current.width += (current.words.length > 0 ? spaceWidth : 0) + word.width;
        current.words.push(word);
      }
      current.hard = true;
      lines.push(current);
    });
    return lines;
  }

  private renderParagraph(runs: readonly StyledRun[], style: BlockStyle): void {
    if (this.cursorY > this.margins.top) this.cursorY += style.spaceBefore;
    const spaceWidth = this.measure(" ", style, style.bold, false);
    const lineHeight = style.size * style.lineSpacing;

    for (const line of this.wrap(this.toWordGroups(runs, style), style, spaceWidth)) {
      if (this.cursorY + lineHeight > this.bottomLimit && this.cursorY > this.margins.top) {
        this.newPage();
      }
      this.drawLine(line, style, spaceWidth);
      this.cursorY += lineHeight;
    }
    this.cursorY += style.spaceAfter;
  }

  private drawLine(line: Line, style: BlockStyle, spaceWidth: number): void {
    const available = this.contentWidth - line.indent;
    const free = Math.max(0, available - line.width);
    const gaps = line.words.length - 1;
    let x = this.margins.left + line.indent;
    if (style.align === "center") x += free / 2;
    const extraGap = style.align === "justify" && !line.hard && gaps > 0 ? free / gaps : 0;
    const baseline = this.cursorY + style.size;

    for (const word of line.words) {
      for (const piece of word.pieces) {
        this.doc.setFont(FONT_NAMES[style.font], fontStyle(piece.bold, piece.italic));
        this.doc.setFontSize(style.size);
        this.doc.text(piece.text, x, baseline);
        if (piece.underline) {
          this.doc.setLineWidth(Math.max(0.5, style.size / 20));
          this.doc.line(x, baseline + style.size * 0.12, x + piece.width, baseline + style.size * 0.12);
        }
        x += piece.width;
      }
      x += spaceWidth + extraGap;
    }
  }
}
