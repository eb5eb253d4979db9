import { describe, expect, it } from "vitest";

import { parseMarkupFragment } from "../src/core/markup/html.js";
import { detectContentMode, parseSceneContent } from "../src/core/markup/parse.js";
import { serializeMarkup, serializeRuns } from "../src/core/markup/serialize.js";
import { StyleStack } from "../src/core/markup/style-stack.js";
import type { RunStyle } from "../src/core/types.js";

const PLAIN: RunStyle = { bold: false, italic: false, underline: false };
const BOLD: RunStyle = { bold: true, italic: false, underline: false };
const ITALIC: RunStyle = { bold: false, italic: true, underline: false };
const UNDERLINE: RunStyle = { bold: false, italic: false, underline: true };

describe("content mode detection", () => {
  it("treats leading block tags and documents as markup", () => {
    expect(detectContentMode("  <p>Hi</p>")).toBe("markup");
    expect(detectContentMode("<!DOCTYPE html><html></html>")).toBe("markup");
    expect(detectContentMode("<div>Hi</div>")).toBe("markup");
    expect(detectContentMode("Intro <html> later")).toBe("markup");
  });

  it("treats leading inline style tags as markup", () => {
    expect(detectContentMode("<b>Bold</b> text")).toBe("markup");
    expect(detectContentMode("<br/>after")).toBe("markup");
    expect(parseSceneContent("<b>Bold</b> text")).toEqual([
      {
        runs: [
          { kind: "text", text: "Bold", style: BOLD },
          { kind: "text", text: " text", style: PLAIN }
        ]
      }
    ]);
    expect(parseSceneContent('<span style="font-weight:700">Heavy</span> words')).toEqual([
      {
        runs: [
          { kind: "text", text: "Heavy", style: BOLD },
          { kind: "text", text: " words", style: PLAIN }
        ]
      }
    ]);
  });

  it("keeps inline-only tags in plain mode", () => {
    expect(detectContentMode("<u>under</u> text")).toBe("plain");
    expect(detectContentMode("<pre>code</pre>")).toBe("plain");
    expect(detectContentMode("Just words.")).toBe("plain");
  });
});

describe("plain text parsing", () => {
  it("splits bold markers into styled runs", () => {
    expect(parseSceneContent("Hello **world**")).toEqual([
      {
        runs: [
          { kind: "text", text: "Hello ", style: PLAIN },
          { kind: "text", text: "world", style: BOLD }
        ]
      }
    ]);
  });

  it("collapses runs of blank lines into one paragraph boundary", () => {
    const blocks = parseSceneContent("one\n\n\ntwo\n\n\n\nthree");
    expect(blocks.map((block) => block.runs)).toEqual([
      [{ kind: "text", text: "one", style: PLAIN }],
      [{ kind: "text", text: "two", style: PLAIN }],
      [{ kind: "text", text: "three", style: PLAIN }]
    ]);
  });

  it("turns single newlines into line breaks and trims line ends", () => {
    expect(parseSceneContent("first line  \nsecond line")).toEqual([
      {
        runs: [
          { kind: "text", text: "first line", style: PLAIN },
          { kind: "break" },
          { kind: "text", text: "second line", style: PLAIN }
        ]
      }
    ]);
  });

  it("keeps stars that cannot open or close as text", () => {
    expect(parseSceneContent("5 * 3 = 15")).toEqual([{ runs: [{ kind: "text", text: "5 * 3 = 15", style: PLAIN }] }]);
  });

  it("honours backslash escapes", () => {
    expect(parseSceneContent("\\*not italic\\*")).toEqual([
      { runs: [{ kind: "text", text: "*not italic*", style: PLAIN }] }
    ]);
  });

  it("reads italic markers and underline tags", () => {
    expect(parseSceneContent("Second *line* here.")[0]?.runs).toEqual([
      { kind: "text", text: "Second ", style: PLAIN },
      { kind: "text", text: "line", style: ITALIC },
      { kind: "text", text: " here.", style: PLAIN }
    ]);
    expect(parseSceneContent("<u>under</u> text")[0]?.runs).toEqual([
      { kind: "text", text: "under", style: UNDERLINE },
      { kind: "text", text: " text", style: PLAIN }
    ]);
  });

  it("reads a backslash at the end of a line as a line break", () => {
    expect(parseSceneContent("one\n\\\ntwo")[0]?.runs).toEqual([
      { kind: "text", text: "one", style: PLAIN },
      { kind: "break" },
      { kind: "break" },
      { kind: "text", text: "two", style: PLAIN }
    ]);
  });

  it("returns no paragraphs for blank content", () => {
    expect(parseSceneContent("")).toEqual([]);
    expect(parseSceneContent("   \n\n  ")).toEqual([]);
  });
});

describe("markup parsing", () => {
  it("pops only the styles a span pushed", () => {
    const blocks = parseSceneContent(
      '<p><b>x<span style="font-weight:700;text-decoration:underline">y</span>z</b></p>'
    );
    expect(blocks).toEqual([
      {
        runs: [
          { kind: "text", text: "x", style: BOLD },
          { kind: "text", text: "y", style: { bold: true, italic: false, underline: true } },
          { kind: "text", text: "z", style: BOLD }
        ]
      }
    ]);
  });

  it("ignores unmatched closing tags", () => {
    expect(parseSceneContent("<p>a</i>b</p>")).toEqual([{ runs: [{ kind: "text", text: "ab", style: PLAIN }] }]);
  });

  it("closes open styles at paragraph boundaries", () => {
    expect(parseSceneContent("<p><b>bold</p><p>plain</p>")).toEqual([
      { runs: [{ kind: "text", text: "bold", style: BOLD }] },
      { runs: [{ kind: "text", text: "plain", style: PLAIN }] }
    ]);
  });

  it("drops head, style and script content", () => {
    const content =
      '<html><head><title>T</title><style>p { color: red; }</style></head><body><p>Body</p><script>var x = "<p>no</p>";</script></body></html>';
    expect(parseSceneContent(content)).toEqual([{ runs: [{ kind: "text", text: "Body", style: PLAIN }] }]);
  });

  it("collapses whitespace around line breaks", () => {
    expect(parseSceneContent("<p>  lots   of\n  space  <br>  next </p>")).toEqual([
      {
        runs: [
          { kind: "text", text: "lots of space", style: PLAIN },
          { kind: "break" },
          { kind: "text", text: "next", style: PLAIN }
        ]
      }
    ]);
  });

  it("decodes character references", () => {
    expect(parseSceneContent("<p>Fish &amp; chips&nbsp;&#33; &bogus;</p>")).toEqual([
      { runs: [{ kind: "text", text: "Fish & chips\u00a0! &bogus;", style: PLAIN }] }
    ]);
  });

  it("keeps repeated line breaks but drops trailing ones", () => {
    expect(parseSceneContent("<p>one<br><br>two<br></p>")[0]?.runs).toEqual([
      { kind: "text", text: "one", style: PLAIN },
      { kind: "break" },
      { kind: "break" },
      { kind: "text", text: "two", style: PLAIN }
    ]);
  });

  it("folds whitespace-only styled text into a neighbouring run", () => {
    expect(parseSceneContent("<p>a<b> </b>b</p>")).toEqual([{ runs: [{ kind: "text", text: "a b", style: PLAIN }] }]);
    expect(parseSceneContent("<p>x<br><b>&nbsp;</b><i>y</i></p>")[0]?.runs).toEqual([
      { kind: "text", text: "x", style: PLAIN },
      { kind: "break" },
      { kind: "text", text: "\u00a0y", style: ITALIC }
    ]);
  });

  it("drops empty paragraphs", () => {
    expect(parseSceneContent("<p></p><p> </p>")).toEqual([]);
  });

  it("flattens fragments into runs joined by breaks", () => {
    expect(parseMarkupFragment("<p>a</p><p><i>b</i></p>")).toEqual([
      { kind: "text", text: "a", style: PLAIN },
      { kind: "break" },
      { kind: "text", text: "b", style: ITALIC }
    ]);
  });

  it("keeps fragment whitespace when asked", () => {
    expect(parseMarkupFragment("Roses   red", { preserveWhitespace: true })).toEqual([
      { kind: "text", text: "Roses   red", style: PLAIN }
    ]);
    const [block] = parseSceneContent("Roses are red\n    violets   blue");
    const runs = block?.runs ?? [];
    expect(runs).toEqual([
      { kind: "text", text: "Roses are red", style: PLAIN },
      { kind: "break" },
      { kind: "text", text: "    violets   blue", style: PLAIN }
    ]);
    expect(parseMarkupFragment(serializeRuns(runs), { preserveWhitespace: true })).toEqual(runs);
  });
});

describe("markup serialization", () => {
  it("re-parses to the same paragraphs", () => {
    const blocks = parseSceneContent(
      "<p>Plain <b>bold <i>both</i></b> and <u>under</u>.</p><p>Line one<br>Line two &amp; more</p>"
    );
    const markup = serializeMarkup(blocks);
    expect(markup).toBe(
      "<p>Plain <b>bold </b><b><i>both</i></b> and <u>under</u>.</p>\n<p>Line one<br/>Line two &amp; more</p>"
    );
    expect(parseSceneContent(markup)).toEqual(blocks);
  });

  it("carries plain paragraphs into markup", () => {
    const blocks = parseSceneContent("Hello **world**");
    expect(serializeMarkup(blocks)).toBe("<p>Hello <b>world</b></p>");
    expect(parseSceneContent(serializeMarkup(blocks))).toEqual(blocks);
  });
});

describe("style stack", () => {
  it("tracks groups per opener", () => {
    const stack = new StyleStack();
    stack.open("b", ["bold"]);
    stack.open("span", ["bold", "underline"]);
    stack.open("span", []);
    expect(stack.active()).toEqual({ bold: true, italic: false, underline: true });

    expect(stack.close("span")).toBe(true);
    expect(stack.active()).toEqual({ bold: true, italic: false, underline: true });
    expect(stack.close("span")).toBe(true);
    expect(stack.active()).toEqual(BOLD);
    expect(stack.close("i")).toBe(false);

    stack.drain();
    expect(stack.active()).toEqual(PLAIN);
    expect(stack.isOpen("b")).toBe(false);
  });

  it("reports the latest of several openers", () => {
    const stack = new StyleStack();
    stack.open("**", ["bold"]);
    stack.open("*", ["italic"]);
    expect(stack.latestOf(["**", "*"])).toBe("*");
    stack.close("*");
    expect(stack.latestOf(["**", "*"])).toBe("**");
    expect(stack.latestOf(["<u>"])).toBeUndefined();
  });
});
