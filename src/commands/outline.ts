import { resolve } from "node:path";

import { log } from "@clack/prompts";

import { outlineManuscript, type ManuscriptOutline } from "../core/assembler.js";
import { UserInputError, normalizeReportFormat } from "../core/errors.js";
import { resolveFormattingProfile } from "../core/formatting.js";
import { loadManuscript } from "../core/manuscript.js";
import type { OutlineCommandOptions } from "../core/types.js";

export async function runOutline(
  manuscriptPath: string | undefined,
  rawOptions: OutlineCommandOptions,
  cwd: string = process.cwd()
): Promise<ManuscriptOutline> {
  const report = normalizeReportFormat(rawOptions.report);
  if (!manuscriptPath?.trim()) {
    throw new UserInputError("A manuscript file is required: folio outline <manuscript.json>.");
  }

  const document = await loadManuscript(resolve(cwd, manuscriptPath));
  const outline = outlineManuscript(document, resolveFormattingProfile(document.projectType));

  if (report === "json") {
    console.log(JSON.stringify(outline, null, 2));
    return outline;
  }

  log.info(`${outline.title} by ${outline.author} (${outline.typeLabel}, ${outline.words} words)`);
  if (outline.chapters.length === 0) {
    log.warn("The manuscript has no chapters.");
    return outline;
  }
  for (const chapter of outline.chapters) {
    const scenes = chapter.scenes.map((scene) => {
      const paragraphs = scene.paragraphs === 0 ? "empty" : `${scene.paragraphs} ¶`;
      return `  ${scene.heading}: ${paragraphs}, ${scene.words} words`;
    });
    log.message([chapter.tocLabel, ...scenes].join("\n"));
  }
  return outline;
}
