import { beforeEach, describe, expect, it, vi } from "vitest";

import { buildCoverMetadata } from "../src/core/assembler.js";
import { CM_TO_PT } from "../src/core/emitters/block-styles.js";
import { PrintEmitter } from "../src/core/emitters/print.js";
import { resolveFormattingProfile } from "../src/core/formatting.js";
import { parseSceneContent } from "../src/core/markup/parse.js";
import type { FormattingProfile, ParagraphBlock } from "../src/core/types.js";
import { FIXED_NOW, makeManuscript } from "./fixtures.js";

const PAGE_WIDTH = 595.28;

const pdf = vi.hoisted(() => ({
  text: vi.fn(),
  line: vi.fn(),
  addPage: vi.fn(),
  setProperties: vi.fn()
}));

vi.mock("jspdf", () => ({
  jsPDF: vi.fn().mockImplementation(() => ({
    internal: { pageSize: { getWidth: () => 595.28, getHeight: () => 841.89 } },
    setFont: vi.fn(),
    setFontSize: vi.fn(),
    setLineWidth: vi.fn(),
    getTextWidth: (text: string) => text.length * 5,
    text: pdf.text,
    line: pdf.line,
    addPage: pdf.addPage,
    setProperties: pdf.setProperties,
    output: () => new Uint8Array([37, 80, 68, 70]).buffer
  }))
}));

function paragraph(content: string): ParagraphBlock {
  const [block] = parseSceneContent(content);
  if (!block) throw new Error(`no paragraph in ${content}`);
  return block;
}

function makeEmitter(profile: FormattingProfile): PrintEmitter {
  return new PrintEmitter({ profile, metadata: buildCoverMetadata(makeManuscript(), FIXED_NOW()) });
}

function drawnText(): unknown[] {
  return pdf.text.mock.calls.map((call) => call[0]);
}

describe("PrintEmitter", () => {
  beforeEach(() => {
    pdf.text.mockClear();
    pdf.line.mockClear();
    pdf.addPage.mockClear();
    pdf.setProperties.mockClear();
  });

  it("stores paragraphs as escaped markup", () => {
    const profile = resolveFormattingProfile("novel");
    const emitter = makeEmitter(profile);
    emitter.emitParagraph(paragraph("Hello **world**"), profile);
    emitter.emitParagraph({ runs: [{ kind: "text", text: "a < b & c", style: { bold: false, italic: false, underline: false } }] }, profile);
    emitter.emitSceneSeparator(profile);

    expect(emitter.printBlocks).toEqual([
      { type: "paragraph", role: "paragraph", markup: "Hello <b>world</b>" },
      { type: "paragraph", role: "paragraph", markup: "a &lt; b &amp; c" },
      { type: "paragraph", role: "separator", markup: "* * *" }
    ]);
    expect(emitter.outline().map((block) => block.text)).toEqual(["Hello world", "a < b & c", "* * *"]);
  });

  it("lays out the cover with spacers that stay out of the outline", () => {
    const profile = resolveFormattingProfile("novel");
    const emitter = makeEmitter(profile);
    emitter.emitCoverPage(buildCoverMetadata(makeManuscript(), FIXED_NOW()), profile);

    expect(emitter.printBlocks.filter((block) => block.type === "spacer")).toEqual([
      { type: "spacer", height: 5 * CM_TO_PT },
      { type: "spacer", height: 2 * CM_TO_PT },
      { type: "spacer", height: 2 * CM_TO_PT }
    ]);
    expect(emitter.outline().map((block) => block.text)).toEqual([
      "The Lantern Road",
      "by Test Author",
      "Novel",
      "Fantasy",
      "05 March 2026"
    ]);
  });

  it("renders pieces, underlines and explicit page breaks", async () => {
    const profile = resolveFormattingProfile("default");
    const emitter = makeEmitter(profile);
    emitter.emitChapterHeading("Chapter 1: Start", profile);
    emitter.emitParagraph(paragraph("Hello **world**"), profile);
    emitter.emitPageOrSectionBreak();
    emitter.emitParagraph(paragraph("<p>Dark <u>sky</u></p>"), profile);

    const bytes = await emitter.render();

    expect(Array.from(bytes)).toEqual([37, 80, 68, 70]);
    expect(drawnText()).toEqual(["Chapter", "1:", "Start", "Hello", "world", "Dark", "sky"]);
    expect(pdf.addPage).toHaveBeenCalledTimes(1);
    expect(pdf.line).toHaveBeenCalledTimes(1);
    expect(pdf.setProperties).toHaveBeenCalledWith({
      title: "The Lantern Road",
      author: "Test Author",
      subject: "Novel · Fantasy",
      creator: "folio-press"
    });
  });

  it("keeps spacing inside typed lines and indents lines that open with spaces", async () => {
    const profile = resolveFormattingProfile("default");
    const emitter = makeEmitter(profile);
    emitter.emitParagraph(paragraph("Roses are red\n    violets   blue"), profile);

    expect(emitter.outline().map((block) => block.text)).toEqual(["Roses are red\n    violets   blue"]);

    await emitter.render();

    const calls = pdf.text.mock.calls;
    expect(calls.map((call) => call[0])).toEqual(["Roses", "are", "red", "violets", "blue"]);
    expect(Number(calls[3]?.[1])).toBeCloseTo(2.5 * CM_TO_PT + 20, 5);
  });

  it("starts new pages when the body overflows", async () => {
    const profile = resolveFormattingProfile("default");
    const emitter = makeEmitter(profile);
    for (let index = 1; index <= 60; index += 1) {
      emitter.emitParagraph(paragraph(`Paragraph ${index}`), profile);
    }

    await emitter.render();

    expect(pdf.addPage).toHaveBeenCalledTimes(2);
  });

  it("wraps long paragraphs and justifies all but the last line", async () => {
    const profile = resolveFormattingProfile("default");
    const emitter = makeEmitter(profile);
    emitter.emitParagraph(paragraph(Array.from({ length: 30 }, () => "aaaa").join(" ")), profile);

    await emitter.render();

    const calls = pdf.text.mock.calls;
    expect(calls).toHaveLength(30);
    const rightEdge = PAGE_WIDTH - 2.5 * CM_TO_PT;
    const firstLineEnd = calls[17];
    const secondLineStart = calls[18];
    expect(Number(firstLineEnd?.[1]) + 20).toBeCloseTo(rightEdge, 5);
    expect(Number(secondLineStart?.[1])).toBeCloseTo(2.5 * CM_TO_PT, 5);
    expect(Number(secondLineStart?.[2])).toBeGreaterThan(Number(calls[0]?.[2]));
    expect(Number(calls[29]?.[1])).toBeCloseTo(2.5 * CM_TO_PT + 11 * 25, 5);
  });
});
