import type { ParagraphBlock } from "../types.js";
import { parseMarkup } from "./html.js";
import { parsePlainText } from "./plain.js";

export type ContentMode = "markup" | "plain";

const MARKUP_LEAD = /^<(?:!doctype|html|head|body|meta|style|p|div|b|strong|i|em|span|br)(?=[\s/>])|^<!--/i;

export function detectContentMode(content: string): ContentMode {
  const trimmed = content.trimStart();
  if (MARKUP_LEAD.test(trimmed)) return "markup";
  return /<html[\s>]/i.test(content) ? "markup" : "plain";
}

export function parseSceneContent(content: string): ParagraphBlock[] {
  if (content.trim().length === 0) return [];
  return detectContentMode(content) === "markup" ? parseMarkup(content) : parsePlainText(content);
}

export function paragraphText(block: ParagraphBlock): string {
  return block.runs.map((run) => (run.kind === "text" ? run.text : "\n")).join("");
}
