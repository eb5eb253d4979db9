import type { InlineStyle, ParagraphBlock, StyledRun } from "../types.js";
import { ParagraphBuilder } from "./paragraph-builder.js";
import { StyleStack } from "./style-stack.js";

const TOKEN_PATTERN = /<!--[\s\S]*?(?:-->|$)|<![^>]*>|<\/?([a-zA-Z][a-zA-Z0-9-]*)((?:"[^"]*"|'[^']*'|[^'">])*)>/g;
const SIMPLE_STYLE_TAGS: Record<string, InlineStyle> = {
  b: "bold",
  strong: "bold",
  i: "italic",
  em: "italic",
  u: "underline"
};
const PARAGRAPH_TAGS = new Set(["p", "div"]);
const META_TAGS = new Set(["head", "style", "script", "title"]);
const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0"
};

export function decodeCharacterReferences(text: string): string {
  return text.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (reference, body: string) => {
    if (body.startsWith("#")) {
      const hex = body[1] === "x" || body[1] === "X";
      const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      if (!Number.isFinite(codePoint) || codePoint <= 0 || codePoint > 0x10ffff) return reference;
      return String.fromCodePoint(codePoint);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? reference;
  });
}

function readStyleAttribute(attributes: string): string | undefined {
  const match = /(?:^|\s)style\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i.exec(attributes);
  if (!match) return undefined;
  return decodeCharacterReferences(match[1] ?? match[2] ?? match[3] ?? "");
}

function isBoldWeight(value: string): boolean {
  if (value === "bold" || value === "bolder") return true;
  const numeric = Number.parseInt(value, 10);
  return Number.isFinite(numeric) && numeric >= 600;
}

export function stylesFromDeclarations(declarations: string): InlineStyle[] {
  const styles = new Set<InlineStyle>();
  for (const declaration of declarations.split(";")) {
    const separator = declaration.indexOf(":");
    if (separator < 0) continue;
    const property = declaration.slice(0, separator).trim().toLowerCase();
    const value = declaration.slice(separator + 1).trim().toLowerCase();
    if (property === "font-weight" && isBoldWeight(value)) styles.add("bold");
    if (property === "font-style" && /^(italic|oblique)\b/.test(value)) styles.add("italic");
    if ((property === "text-decoration" || property === "text-decoration-line") && value.includes("underline")) {
      styles.add("underline");
    }
  }
  return [...styles];
}

// Offset just past the close that balances an already-open meta tag, or the end of input.
function skipMetaContent(content: string, tag: string, from: number): number {
  const pattern = new RegExp(`<(/?)${tag}\\b(?:"[^"]*"|'[^']*'|[^'">])*>`, "gi");
  pattern.lastIndex = from;
  let depth = 1;
  for (let match = pattern.exec(content); match; match = pattern.exec(content)) {
    depth += match[1] === "/" ? -1 : 1;
    if (depth === 0) return pattern.lastIndex;
  }
  return content.length;
}

export interface MarkupParseOptions {
  /** Keep text whitespace as written instead of collapsing it. */
  preserveWhitespace?: boolean;
}

export function parseMarkup(content: string, options: MarkupParseOptions = {}): ParagraphBlock[] {
  const builder = new ParagraphBuilder();
  const stack = new StyleStack();
  const trimTrailing = !options.preserveWhitespace;
  const appendText = (raw: string): void => {
    const text = decodeCharacterReferences(raw);
    if (options.preserveWhitespace) {
      builder.append(text, stack.active());
    } else {
      builder.appendCollapsed(text, stack.active());
    }
  };
  const endParagraph = (): void => {
    builder.endParagraph({ trimTrailing });
    stack.drain();
  };

  const pattern = new RegExp(TOKEN_PATTERN.source, "g");
  let cursor = 0;
  for (let match = pattern.exec(content); match; match = pattern.exec(content)) {
    if (match.index > cursor) {
      appendText(content.slice(cursor, match.index));
    }
    cursor = pattern.lastIndex;

    const name = match[1]?.toLowerCase();
    if (!name) continue;
    const closing = match[0].startsWith("</");
    const attributes = match[2] ?? "";

    if (META_TAGS.has(name)) {
      if (!closing) {
        cursor = skipMetaContent(content, name, cursor);
        pattern.lastIndex = cursor;
      }
      continue;
    }

    if (PARAGRAPH_TAGS.has(name)) {
      endParagraph();
      continue;
    }

    if (name === "br") {
      builder.lineBreak({ trimTrailing });
      continue;
    }

    const simple = SIMPLE_STYLE_TAGS[name];
    if (simple) {
      if (closing) {
        stack.close(name);
      } else if (!attributes.trimEnd().endsWith("/")) {
        stack.open(name, [simple]);
      }
      continue;
    }

    if (name === "span") {
      if (closing) {
        stack.close("span");
      } else if (!attributes.trimEnd().endsWith("/")) {
        stack.open("span", stylesFromDeclarations(readStyleAttribute(attributes) ?? ""));
      }
    }
  }

  if (cursor < content.length) {
    appendText(content.slice(cursor));
  }
  return builder.finish({ trimTrailing });
}

/** Runs of a single markup fragment, paragraph boundaries flattened into line breaks. */
export function parseMarkupFragment(fragment: string, options: MarkupParseOptions = {}): StyledRun[] {
  const runs: StyledRun[] = [];
  for (const [index, block] of parseMarkup(fragment, options).entries()) {
    if (index > 0) runs.push({ kind: "break" });
    runs.push(...block.runs);
  }
  return runs;
}
