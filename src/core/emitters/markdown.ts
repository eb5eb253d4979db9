import { parsePlainText } from "../markup/plain.js";
import { toHeadingAnchor } from "../text.js";
import type { FormattingProfile, InlineStyle, ParagraphBlock, RunStyle, StyledRun } from "../types.js";
import {
  BREAK_OUTLINE_RUN,
  TOC_TITLE,
  formatIsoDate,
  formatLongDate,
  outlineText,
  textOutlineRun,
  type CoverMetadata,
  type OutlineBlock,
  type OutlineRole,
  type OutlineRun,
  type RunEmitter,
  type TocEntry
} from "./contracts.js";

const MARKERS: ReadonlyArray<{ style: InlineStyle; open: string; close: string }> = [
  { style: "bold", open: "**", close: "**" },
  { style: "italic", open: "*", close: "*" },
  { style: "underline", open: "<u>", close: "</u>" }
];
const THEMATIC_BREAK = /^([*_-])(?: ?\1){2,}$/;

interface MarkdownChunk {
  role: OutlineRole;
  markdown: string;
  /** Markdown that re-parses to the chunk's runs; absent for structural chunks. */
  inline?: string;
}

export interface MarkdownEmitterOptions {
  frontmatter?: CoverMetadata;
}

export function escapeInline(text: string): string {
  return text.replace(/[\\*_<`]/g, (char) => `\\${char}`);
}

function escapeLineStart(text: string): string {
  return text
    .replace(/^([#>+=-])/, "\\$1")
    .replace(/^(\d+)([.)])/, "$1\\$2");
}

function atLineStart(markdown: string): boolean {
  const lastLine = markdown.slice(markdown.lastIndexOf("\n") + 1);
  return lastLine.trim().length === 0;
}

function formatThousands(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

function countLabel(count: number, singular: string): string {
  return `${formatThousands(count)} ${count === 1 ? singular : `${singular}s`}`;
}

export function renderInlineRuns(runs: readonly StyledRun[]): string {
  let markdown = "";
  let open: InlineStyle[] = [];
  let pendingSpace = "";

  const closeAll = (): void => {
    for (const style of [...open].reverse()) {
      markdown += MARKERS.find((marker) => marker.style === style)?.close ?? "";
    }
    open = [];
  };
  const sameAsOpen = (style: RunStyle): boolean =>
    MARKERS.every((marker) => style[marker.style] === open.includes(marker.style));

  for (const run of runs) {
    if (run.kind === "break") {
      closeAll();
      // A blank line would end the paragraph, so a break on an empty line is a backslash break.
      markdown += atLineStart(markdown) ? "\\\n" : "  \n";
      pendingSpace = "";
      continue;
    }

    const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(run.text);
    const lead = match?.[1] ?? "";
    const core = match?.[2] ?? run.text;
    const trail = match?.[3] ?? "";
    if (core.length === 0) {
      pendingSpace += run.text;
      continue;
    }

    if (!sameAsOpen(run.style)) {
      closeAll();
    }
    markdown += pendingSpace + lead;
    pendingSpace = "";
    const lineStart = open.length === 0 && atLineStart(markdown);
    for (const marker of MARKERS) {
      if (run.style[marker.style] && !open.includes(marker.style)) {
        markdown += marker.open;
        open.push(marker.style);
      }
    }
    const escaped = escapeInline(core);
    markdown += lineStart ? escapeLineStart(escaped) : escaped;
    pendingSpace = trail;
  }

  closeAll();
  return markdown;
}

// One entry per paragraph a Markdown reader would see in `inline`.
function outlineFromInline(inline: string): OutlineRun[][] {
  return parsePlainText(inline).map((block) =>
    block.runs.map((run) => (run.kind === "break" ? { ...BREAK_OUTLINE_RUN } : textOutlineRun(run.text, run.style)))
  );
}

export class MarkdownEmitter implements RunEmitter {
  readonly kind = "markup" as const;
  private readonly chunks: MarkdownChunk[] = [];
  private readonly frontmatter: CoverMetadata | undefined;

  constructor(options: MarkdownEmitterOptions = {}) {
    this.frontmatter = options.frontmatter;
  }

  emitCoverPage(metadata: CoverMetadata, _profile: FormattingProfile): void {
    const lines = [`# ${escapeInline(metadata.title)}`, "", `**by ${escapeInline(metadata.author)}**`, ""];
    const info = [`*${escapeInline(metadata.typeLabel)}*`];
    if (metadata.genre) info.push(`*${escapeInline(metadata.genre)}*`);
    lines.push(info.join(" | "), "");
    lines.push(`**${countLabel(metadata.wordCount, "word")}** | **${countLabel(metadata.chapterCount, "chapter")}**  `);
    lines.push(`Exported: ${formatLongDate(metadata.exportedAt)}`);
    this.chunks.push({ role: "cover", markdown: lines.join("\n") });
  }

  emitTableOfContents(entries: readonly TocEntry[], _profile: FormattingProfile): void {
    const lines = [`## ${TOC_TITLE}`, ""];
    for (const entry of entries) {
      let line = `${entry.number}. [${escapeInline(entry.heading)}](#${toHeadingAnchor(entry.heading)})`;
      if (entry.sceneCount > 0) {
        line += ` *(${entry.sceneCount} ${entry.sceneCount === 1 ? "scene" : "scenes"})*`;
      }
      lines.push(line);
    }
    this.chunks.push({ role: "toc", markdown: lines.join("\n") });
  }

  emitChapterHeading(text: string, _profile: FormattingProfile): void {
    const inline = escapeInline(text);
    this.chunks.push({ role: "chapter-heading", markdown: `## ${inline}`, inline });
  }

  emitSceneHeading(text: string, _profile: FormattingProfile): void {
    const inline = escapeInline(text);
    this.chunks.push({ role: "scene-heading", markdown: `### ${inline}`, inline });
  }

  emitParagraph(block: ParagraphBlock, _profile: FormattingProfile): void {
    const inline = renderInlineRuns(block.runs);
    this.chunks.push({ role: "paragraph", markdown: inline, inline });
  }

  emitSceneSeparator(profile: FormattingProfile): void {
    const token = profile.sceneSeparator;
    if (!token) return;
    const markdown = THEMATIC_BREAK.test(token) ? token : escapeLineStart(escapeInline(token));
    this.chunks.push({ role: "separator", markdown });
  }

  emitPageOrSectionBreak(): void {
    this.chunks.push({ role: "page-break", markdown: "---" });
  }

  toMarkdown(): string {
    const parts = this.chunks.map((chunk) => chunk.markdown);
    if (this.frontmatter) parts.unshift(renderFrontmatter(this.frontmatter));
    return `${parts.join("\n\n")}\n`;
  }

  async render(): Promise<Uint8Array> {
    return new TextEncoder().encode(this.toMarkdown());
  }

  outline(): OutlineBlock[] {
    return this.chunks.flatMap((chunk) => {
      if (chunk.inline === undefined) return [{ role: chunk.role, text: chunk.markdown, runs: [] }];
      return outlineFromInline(chunk.inline).map((runs) => ({ role: chunk.role, text: outlineText(runs), runs }));
    });
  }
}

export function renderFrontmatter(metadata: CoverMetadata): string {
  const lines = ["---", `title: ${JSON.stringify(metadata.title)}`, `author: ${JSON.stringify(metadata.author)}`];
  lines.push(`type: ${JSON.stringify(metadata.typeLabel)}`);
  if (metadata.genre) lines.push(`genre: ${JSON.stringify(metadata.genre)}`);
  lines.push(`language: ${JSON.stringify(metadata.language)}`);
  lines.push(`date: ${formatIsoDate(metadata.exportedAt)}`);
  lines.push(`word_count: ${metadata.wordCount}`);
  lines.push(`chapters: ${metadata.chapterCount}`);
  if (metadata.tags.length > 0) {
    lines.push(`tags: [${metadata.tags.map((tag) => JSON.stringify(tag)).join(", ")}]`);
  }
  lines.push("---");
  return lines.join("\n");
}
