import type { ParagraphBlock, RunStyle, StyledRun } from "../types.js";
import { sameStyle } from "./style-stack.js";

const COLLAPSIBLE_WHITESPACE = /[ \t\n\r\f]+/g;
const BLANK = /^\s+$/;

export class ParagraphBuilder {
  private runs: StyledRun[] = [];
  private readonly blocks: ParagraphBlock[] = [];

  /**
   * Appends text in `style`. Whitespace-only text never forms a run of its own: it joins the
   * run before it, or lends the run that follows it that run's style.
   */
  append(text: string, style: RunStyle): void {
    if (text.length === 0) return;
    const last = this.runs.at(-1);
    if (last?.kind === "text") {
      if (sameStyle(last.style, style) || BLANK.test(text)) {
        last.text += text;
        return;
      }
      if (BLANK.test(last.text)) {
        last.text += text;
        last.style = { ...style };
        return;
      }
    }
    this.runs.push({ kind: "text", text, style: { ...style } });
  }

  /** Appends source text whose whitespace collapses to single spaces. */
  appendCollapsed(text: string, style: RunStyle): void {
    let collapsed = text.replace(COLLAPSIBLE_WHITESPACE, " ");
    if (collapsed.startsWith(" ") && this.atCollapsePoint()) {
      collapsed = collapsed.slice(1);
    }
    this.append(collapsed, style);
  }

  lineBreak(options: { trimTrailing?: boolean } = {}): void {
    if (options.trimTrailing) this.trimTrailingSpaces();
    this.runs.push({ kind: "break" });
  }

  endParagraph(options: { trimTrailing?: boolean } = {}): void {
    if (options.trimTrailing) {
      this.trimTrailingSpaces();
      while (this.runs.at(-1)?.kind === "break") {
        this.runs.pop();
        this.trimTrailingSpaces();
      }
    }
    const hasText = this.runs.some((run) => run.kind === "text");
    if (hasText) {
      this.blocks.push({ runs: this.runs });
    }
    this.runs = [];
  }

  finish(options: { trimTrailing?: boolean } = {}): ParagraphBlock[] {
    this.endParagraph(options);
    return this.blocks;
  }

  private atCollapsePoint(): boolean {
    const last = this.runs.at(-1);
    if (!last || last.kind === "break") return true;
    return last.text.endsWith(" ");
  }

  private trimTrailingSpaces(): void {
    for (;;) {
      const last = this.runs.at(-1);
      if (!last || last.kind !== "text") return;
      const trimmed = last.text.replace(/ +$/, "");
      if (trimmed.length > 0) {
        last.text = trimmed;
        return;
      }
      this.runs.pop();
    }
  }
}
