import { describe, expect, it } from "vitest";

import { assembleDocument, buildCoverMetadata } from "../src/core/assembler.js";
import { MarkdownEmitter, renderInlineRuns } from "../src/core/emitters/markdown.js";
import { resolveFormattingProfile } from "../src/core/formatting.js";
import { parseSceneContent } from "../src/core/markup/parse.js";
import type { StyledRun } from "../src/core/types.js";
import { FIXED_NOW, makeManuscript } from "./fixtures.js";

const PLAIN = { bold: false, italic: false, underline: false };

describe("renderInlineRuns", () => {
  it("wraps bold runs in double stars", () => {
    const [block] = parseSceneContent("Hello **world**");
    expect(renderInlineRuns(block?.runs ?? [])).toBe("Hello **world**");
  });

  it("escapes markdown syntax inside text", () => {
    const runs: StyledRun[] = [{ kind: "text", text: "# not a heading * star_", style: PLAIN }];
    expect(renderInlineRuns(runs)).toBe("\\# not a heading \\* star\\_");
    expect(renderInlineRuns([{ kind: "text", text: "1. Numbered", style: PLAIN }])).toBe("1\\. Numbered");
    expect(renderInlineRuns([{ kind: "text", text: "1) Numbered", style: PLAIN }])).toBe("1\\) Numbered");
  });

  it("renders hard line breaks and closes styles around them", () => {
    const runs: StyledRun[] = [
      { kind: "text", text: "a", style: PLAIN },
      { kind: "break" },
      { kind: "text", text: "b", style: { ...PLAIN, italic: true } }
    ];
    expect(renderInlineRuns(runs)).toBe("a  \n*b*");
  });

  it("writes a break on an empty line as a backslash break", () => {
    const [block] = parseSceneContent("<p>one<br><br>two</p>");
    expect(renderInlineRuns(block?.runs ?? [])).toBe("one  \n\\\ntwo");
    expect(renderInlineRuns([{ kind: "break" }, { kind: "text", text: "a", style: PLAIN }])).toBe("\\\na");
  });
});

describe("MarkdownEmitter", () => {
  it("writes a full manuscript with preamble, cover and contents", () => {
    const manuscript = makeManuscript();
    const profile = resolveFormattingProfile(manuscript.projectType);
    const metadata = buildCoverMetadata(manuscript, FIXED_NOW());
    const emitter = new MarkdownEmitter({ frontmatter: metadata });
    const summary = assembleDocument(manuscript, profile, { includeCover: true, includeToc: true }, emitter, metadata);

    expect(summary).toEqual({ chapters: 2, scenes: 3, paragraphs: 4, placeholders: 1, pageBreaks: 3 });
    expect(emitter.toMarkdown()).toBe(
      [
        "---",
        'title: "The Lantern Road"',
        'author: "Test Author"',
        'type: "Novel"',
        'genre: "Fantasy"',
        'language: "en"',
        "date: 2026-03-05",
        "word_count: 7",
        "chapters: 2",
        'tags: ["draft", "series"]',
        "---",
        "",
        "# The Lantern Road",
        "",
        "**by Test Author**",
        "",
        "*Novel* | *Fantasy*",
        "",
        "**7 words** | **2 chapters**  ",
        "Exported: March 05, 2026",
        "",
        "---",
        "",
        "## Table of Contents",
        "",
        "1. [Chapter 1: Departure](#chapter-1-departure) *(2 scenes)*",
        "2. [Chapter 2: Chapter 2](#chapter-2-chapter-2) *(1 scene)*",
        "",
        "---",
        "",
        "## Chapter 1: Departure",
        "",
        "### At the Gate",
        "",
        "Hello **world**",
        "",
        "Second *line* here.",
        "",
        "* * *",
        "",
        "### Scene 2",
        "",
        "*[Scene content not yet written]*",
        "",
        "---",
        "",
        "## Chapter 2: Chapter 2",
        "",
        "### Night",
        "",
        "Dark <u>sky</u>",
        ""
      ].join("\n")
    );
  });

  it("omits the preamble when no metadata is given", async () => {
    const emitter = new MarkdownEmitter();
    emitter.emitChapterHeading("Chapter 1: Start", resolveFormattingProfile("novel"));
    const bytes = await emitter.render();
    expect(new TextDecoder().decode(bytes)).toBe("## Chapter 1: Start\n");
  });

  it("escapes separator tokens that are not thematic breaks", () => {
    const emitter = new MarkdownEmitter();
    emitter.emitSceneSeparator(resolveFormattingProfile("short_story"));
    emitter.emitSceneSeparator(resolveFormattingProfile("novel", { separatorStyle: "- - -" }));
    emitter.emitSceneSeparator(resolveFormattingProfile("article_social"));
    expect(emitter.toMarkdown()).toBe("\\#\n\n- - -\n");
  });

  it("outlines paragraphs from the written markdown", () => {
    const emitter = new MarkdownEmitter();
    const profile = resolveFormattingProfile("novel");
    for (const block of parseSceneContent("Plain *soft* and **loud**\n\n<u>marked</u>")) {
      emitter.emitParagraph(block, profile);
    }
    emitter.emitPageOrSectionBreak();

    const outline = emitter.outline();
    expect(outline.map((block) => block.role)).toEqual(["paragraph", "paragraph", "page-break"]);
    expect(outline[0]?.text).toBe("Plain soft and loud");
    expect(outline[0]?.runs.filter((run) => run.italic).map((run) => run.text)).toEqual(["soft"]);
    expect(outline[0]?.runs.filter((run) => run.bold).map((run) => run.text)).toEqual(["loud"]);
    expect(outline[1]?.runs).toEqual([{ kind: "text", text: "marked", bold: false, italic: false, underline: true }]);
  });

  it("keeps repeated breaks inside one outlined paragraph", () => {
    const emitter = new MarkdownEmitter();
    const [block] = parseSceneContent("<p>one<br><br>two</p>");
    if (block) emitter.emitParagraph(block, resolveFormattingProfile("novel"));

    const outline = emitter.outline();
    expect(outline).toHaveLength(1);
    expect(outline[0]?.text).toBe("one\n\ntwo");
  });

  it("outlines every paragraph a reader of the markdown would see", () => {
    const emitter = new MarkdownEmitter();
    emitter.emitParagraph({ runs: [{ kind: "text", text: "first\n\nsecond", style: PLAIN }] }, resolveFormattingProfile("novel"));

    expect(emitter.outline().map((block) => [block.role, block.text])).toEqual([
      ["paragraph", "first"],
      ["paragraph", "second"]
    ]);
  });
});
