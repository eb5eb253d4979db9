import { readFile } from "node:fs/promises";

import { z } from "zod";

import projectTypeLabels from "./data/project-types.json" with { type: "json" };
import { UserInputError } from "./errors.js";
import { paragraphText, parseSceneContent } from "./markup/parse.js";
import { countWords, toTitleCase } from "./text.js";
import type { Chapter, ManuscriptDocument, Scene } from "./types.js";

const DEFAULT_TITLE = "Untitled";
const DEFAULT_AUTHOR = "Unknown";
const DEFAULT_LANGUAGE = "en";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const sceneSchema = z.object({
  title: optionalText,
  content: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  order: z.number().int().optional()
});

const chapterSchema = z.object({
  title: optionalText,
  order: z.number().int().optional(),
  scenes: z.array(sceneSchema).default([])
});

export const manuscriptFileSchema = z.object({
  title: optionalText,
  author: optionalText,
  genre: optionalText,
  language: optionalText,
  project_type: optionalText,
  projectType: optionalText,
  tags: z.array(z.string()).optional(),
  chapters: z.array(chapterSchema).default([])
});

export type ManuscriptFile = z.infer<typeof manuscriptFileSchema>;

function byOrder<T extends { order?: number | undefined }>(items: T[]): T[] {
  if (!items.some((item) => item.order !== undefined)) return items;
  return items
    .map((item, index) => ({ item, index }))
    .sort((left, right) => {
      const leftOrder = left.item.order ?? Number.MAX_SAFE_INTEGER;
      const rightOrder = right.item.order ?? Number.MAX_SAFE_INTEGER;
      return leftOrder - rightOrder || left.index - right.index;
    })
    .map(({ item }) => item);
}

function toScene(raw: z.infer<typeof sceneSchema>): Scene {
  return raw.title !== undefined ? { title: raw.title, content: raw.content } : { content: raw.content };
}

function toChapter(raw: z.infer<typeof chapterSchema>): Chapter {
  const scenes = byOrder(raw.scenes).map(toScene);
  return raw.title !== undefined ? { title: raw.title, scenes } : { scenes };
}

export function toManuscriptDocument(file: ManuscriptFile): ManuscriptDocument {
  const document: ManuscriptDocument = {
    title: file.title ?? DEFAULT_TITLE,
    author: file.author ?? DEFAULT_AUTHOR,
    language: file.language ?? DEFAULT_LANGUAGE,
    projectType: file.projectType ?? file.project_type ?? "novel",
    chapters: byOrder(file.chapters).map(toChapter)
  };
  if (file.genre !== undefined) document.genre = file.genre;
  if (file.tags !== undefined && file.tags.length > 0) document.tags = file.tags;
  return document;
}

export function parseManuscript(raw: unknown, source = "manuscript"): ManuscriptDocument {
  const parsed = manuscriptFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new UserInputError(`Invalid ${source} at ${path}: ${issue?.message ?? "unrecognized shape"}`, {
      details: { issues: parsed.error.issues.map((entry) => ({ path: entry.path.join("."), message: entry.message })) }
    });
  }
  return toManuscriptDocument(parsed.data);
}

export async function loadManuscript(path: string): Promise<ManuscriptDocument> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new UserInputError(`Cannot read manuscript file: ${path}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new UserInputError(`Manuscript file is not valid JSON: ${path}`, { cause: error });
  }
  return parseManuscript(json, path);
}

export function countSceneWords(scene: Scene): number {
  return parseSceneContent(scene.content).reduce((total, block) => total + countWords(paragraphText(block)), 0);
}

export function countManuscriptWords(document: ManuscriptDocument): number {
  let total = 0;
  for (const chapter of document.chapters) {
    for (const scene of chapter.scenes) {
      total += countSceneWords(scene);
    }
  }
  return total;
}

const LABELS: Record<string, Record<string, string> | undefined> = projectTypeLabels;

export function projectTypeLabel(projectType: string, language: string): string {
  const primary = language.trim().toLowerCase().split(/[-_]/)[0] ?? "";
  const table = LABELS[primary] ?? LABELS[DEFAULT_LANGUAGE];
  return table?.[projectType] ?? toTitleCase(projectType);
}
