import type { ParagraphBlock } from "../types.js";
import { normalizeNewlines } from "../text.js";
import { ParagraphBuilder } from "./paragraph-builder.js";
import { StyleStack } from "./style-stack.js";

const PARAGRAPH_SEPARATOR = /\n[ \t]*\n/;
const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;
const UNDERLINE_OPEN = /^<u>/i;
const UNDERLINE_CLOSE = /^<\/u>/i;

function isWhitespace(char: string | undefined): boolean {
  return char === undefined || /\s/.test(char);
}

function splitParagraphs(content: string): string[] {
  return normalizeNewlines(content)
    .split(PARAGRAPH_SEPARATOR)
    .map((paragraph) =>
      paragraph
        .trim()
        .split("\n")
        .map((line) => line.trimEnd())
        .join("\n")
    )
    .filter((paragraph) => paragraph.length > 0);
}

function parseParagraph(paragraph: string, builder: ParagraphBuilder): void {
  const stack = new StyleStack();
  let literal = "";
  const flush = (): void => {
    builder.append(literal, stack.active());
    literal = "";
  };

  let index = 0;
  while (index < paragraph.length) {
    const char = paragraph.charAt(index);

    if (char === "\\") {
      const next = paragraph.charAt(index + 1);
      if (next === "\n") {
        flush();
        builder.lineBreak();
        index += 2;
        continue;
      }
      if (next.length > 0 && ASCII_PUNCTUATION.test(next)) {
        literal += next;
        index += 2;
        continue;
      }
      literal += char;
      index += 1;
      continue;
    }

    if (char === "\n") {
      flush();
      builder.lineBreak();
      index += 1;
      continue;
    }

    if (char === "<") {
      const rest = paragraph.slice(index);
      const open = UNDERLINE_OPEN.exec(rest);
      if (open) {
        flush();
        stack.open("<u>", ["underline"]);
        index += open[0].length;
        continue;
      }
      const close = UNDERLINE_CLOSE.exec(rest);
      if (close && stack.isOpen("<u>")) {
        flush();
        stack.close("<u>");
        index += close[0].length;
        continue;
      }
    }

    if (char === "*") {
      let end = index;
      while (paragraph.charAt(end) === "*") end += 1;
      const previous = index > 0 ? paragraph.charAt(index - 1) : undefined;
      const following = end < paragraph.length ? paragraph.charAt(end) : undefined;
      const leftover = applyStarRun(end - index, !isWhitespace(previous), !isWhitespace(following), stack, flush);
      literal += "*".repeat(leftover);
      index = end;
      continue;
    }

    literal += char;
    index += 1;
  }

  flush();
  builder.endParagraph();
}

// Returns how many stars of the run stay literal.
function applyStarRun(
  length: number,
  canClose: boolean,
  canOpen: boolean,
  stack: StyleStack,
  flush: () => void
): number {
  let remaining = length;

  if (canClose) {
    for (;;) {
      const opener = stack.latestOf(["**", "*"]);
      if (!opener || opener.length > remaining) break;
      flush();
      stack.close(opener);
      remaining -= opener.length;
    }
  }

  if (remaining > 0 && canOpen) {
    flush();
    if (remaining >= 2) {
      stack.open("**", ["bold"]);
      remaining -= 2;
    }
    if (remaining >= 1) {
      stack.open("*", ["italic"]);
      remaining -= 1;
    }
  }

  return remaining;
}

export function parsePlainText(content: string): ParagraphBlock[] {
  const builder = new ParagraphBuilder();
  for (const paragraph of splitParagraphs(content)) {
    parseParagraph(paragraph, builder);
  }
  return builder.finish();
}
