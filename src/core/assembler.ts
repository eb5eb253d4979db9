import { tocLabel, type CoverMetadata, type RunEmitter, type TocEntry } from "./emitters/contracts.js";
import { countManuscriptWords, countSceneWords, projectTypeLabel } from "./manuscript.js";
import { parseSceneContent } from "./markup/parse.js";
import { PLAIN_STYLE } from "./markup/style-stack.js";
import type { Chapter, ExportOptions, FormattingProfile, ManuscriptDocument, ParagraphBlock, Scene } from "./types.js";

export const EMPTY_SCENE_PLACEHOLDER = "[Scene content not yet written]";

export interface AssemblySummary {
  chapters: number;
  scenes: number;
  paragraphs: number;
  placeholders: number;
  pageBreaks: number;
}

export function chapterHeading(chapter: Chapter, number: number): string {
  return `Chapter ${number}: ${chapter.title ?? `Chapter ${number}`}`;
}

export function sceneHeading(scene: Scene, number: number, profile: FormattingProfile): string {
  const heading = scene.title ?? `Scene ${number}`;
  return profile.sceneHeadingCase === "upper" ? heading.toUpperCase() : heading;
}

export function buildTocEntries(document: ManuscriptDocument): TocEntry[] {
  return document.chapters.map((chapter, index) => ({
    number: index + 1,
    heading: chapterHeading(chapter, index + 1),
    sceneCount: chapter.scenes.length
  }));
}

export function buildCoverMetadata(document: ManuscriptDocument, exportedAt: Date): CoverMetadata {
  const metadata: CoverMetadata = {
    title: document.title,
    author: document.author,
    projectType: document.projectType,
    typeLabel: projectTypeLabel(document.projectType, document.language),
    language: document.language,
    tags: document.tags ?? [],
    wordCount: countManuscriptWords(document),
    chapterCount: document.chapters.length,
    exportedAt
  };
  if (document.genre) metadata.genre = document.genre;
  return metadata;
}

export function placeholderBlock(): ParagraphBlock {
  return { runs: [{ kind: "text", text: EMPTY_SCENE_PLACEHOLDER, style: { ...PLAIN_STYLE, italic: true } }] };
}

export function assembleDocument(
  document: ManuscriptDocument,
  profile: FormattingProfile,
  options: Pick<ExportOptions, "includeCover" | "includeToc" | "now">,
  emitter: RunEmitter,
  metadata: CoverMetadata = buildCoverMetadata(document, options.now?.() ?? new Date())
): AssemblySummary {
  const summary: AssemblySummary = { chapters: 0, scenes: 0, paragraphs: 0, placeholders: 0, pageBreaks: 0 };
  const pageBreak = (): void => {
    emitter.emitPageOrSectionBreak();
    summary.pageBreaks += 1;
  };

  if (options.includeCover) {
    emitter.emitCoverPage(metadata, profile);
    pageBreak();
  }

  if (options.includeToc) {
    emitter.emitTableOfContents(buildTocEntries(document), profile);
    pageBreak();
  }

  document.chapters.forEach((chapter, chapterIndex) => {
    emitter.emitChapterHeading(chapterHeading(chapter, chapterIndex + 1), profile);
    summary.chapters += 1;

    chapter.scenes.forEach((scene, sceneIndex) => {
      emitter.emitSceneHeading(sceneHeading(scene, sceneIndex + 1, profile), profile);
      summary.scenes += 1;

      const blocks = parseSceneContent(scene.content);
      if (blocks.length === 0) {
        emitter.emitParagraph(placeholderBlock(), profile);
        summary.paragraphs += 1;
        summary.placeholders += 1;
      }
      for (const block of blocks) {
        emitter.emitParagraph(block, profile);
        summary.paragraphs += 1;
      }

      if (profile.sceneSeparator && sceneIndex < chapter.scenes.length - 1) {
        emitter.emitSceneSeparator(profile);
      }
    });

    if (profile.chapterStartsNewPage && chapterIndex < document.chapters.length - 1) {
      pageBreak();
    }
  });

  return summary;
}

export interface SceneOutline {
  heading: string;
  paragraphs: number;
  words: number;
}

export interface ChapterOutline {
  heading: string;
  tocLabel: string;
  scenes: SceneOutline[];
}

export interface ManuscriptOutline {
  title: string;
  author: string;
  typeLabel: string;
  words: number;
  chapters: ChapterOutline[];
}

export function outlineManuscript(document: ManuscriptDocument, profile: FormattingProfile): ManuscriptOutline {
  const entries = buildTocEntries(document);
  return {
    title: document.title,
    author: document.author,
    typeLabel: projectTypeLabel(document.projectType, document.language),
    words: countManuscriptWords(document),
    chapters: document.chapters.map((chapter, chapterIndex) => {
      const entry = entries[chapterIndex];
      return {
        heading: chapterHeading(chapter, chapterIndex + 1),
        tocLabel: entry ? tocLabel(entry) : chapterHeading(chapter, chapterIndex + 1),
        scenes: chapter.scenes.map((scene, sceneIndex) => ({
          heading: sceneHeading(scene, sceneIndex + 1, profile),
          paragraphs: parseSceneContent(scene.content).length,
          words: countSceneWords(scene)
        }))
      };
    })
  };
}
