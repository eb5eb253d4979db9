import type { FormattingProfile, ProfileOverrides, ProjectType } from "./types.js";

type ProfilePatch = Partial<Omit<FormattingProfile, "fonts" | "fontSizes" | "margins" | "paragraphSpacing">> & {
  fonts?: Partial<FormattingProfile["fonts"]>;
  fontSizes?: Partial<FormattingProfile["fontSizes"]>;
  margins?: Partial<FormattingProfile["margins"]>;
  paragraphSpacing?: Partial<FormattingProfile["paragraphSpacing"]>;
};

export const BASELINE_PROFILE: Readonly<FormattingProfile> = Object.freeze<FormattingProfile>({
  projectType: "default",
  fonts: { body: "serif", heading: "sans" },
  fontSizes: { title: 28, chapter: 20, scene: 14, body: 11, toc: 12 },
  lineSpacing: 1.45,
  paragraphSpacing: { before: 0, after: 12 },
  margins: { top: 2.5, right: 2.5, bottom: 2.5, left: 2.5 },
  alignment: "justify",
  chapterStartsNewPage: true,
  sceneSeparator: "* * *",
  firstLineIndent: 0,
  sceneHeadingCase: "as-written",
  preserveLineBreaks: false
});

export const PROJECT_TYPE_PROFILES: Readonly<Record<ProjectType, ProfilePatch>> = {
  novel: {
    fontSizes: { body: 12 },
    firstLineIndent: 0.8,
    paragraphSpacing: { after: 6 }
  },
  short_story: {
    fontSizes: { body: 12 },
    firstLineIndent: 0.8,
    paragraphSpacing: { after: 6 },
    sceneSeparator: "#"
  },
  article_magazine: {
    fonts: { body: "sans" },
    alignment: "left",
    chapterStartsNewPage: false
  },
  article_social: {
    fonts: { body: "sans" },
    fontSizes: { body: 11 },
    alignment: "left",
    chapterStartsNewPage: false,
    sceneSeparator: null
  },
  poetry: {
    alignment: "left",
    lineSpacing: 1.2,
    preserveLineBreaks: true,
    sceneSeparator: "~"
  },
  screenplay: {
    fonts: { body: "mono", heading: "mono" },
    fontSizes: { title: 12, chapter: 12, scene: 12, body: 12, toc: 12 },
    lineSpacing: 1,
    alignment: "left",
    margins: { left: 3.8 },
    sceneHeadingCase: "upper",
    sceneSeparator: null
  },
  essay: {
    lineSpacing: 2,
    alignment: "justify",
    chapterStartsNewPage: false
  },
  research_paper: {
    lineSpacing: 2,
    margins: { top: 2.54, right: 2.54, bottom: 2.54, left: 2.54 },
    sceneSeparator: null
  }
};

function isKnownProjectType(value: string): value is ProjectType {
  return Object.hasOwn(PROJECT_TYPE_PROFILES, value);
}

function applyPatch(base: FormattingProfile, patch: ProfilePatch): FormattingProfile {
  const { fonts, fontSizes, margins, paragraphSpacing, ...flat } = patch;
  return {
    ...base,
    ...flat,
    fonts: { ...base.fonts, ...fonts },
    fontSizes: { ...base.fontSizes, ...fontSizes },
    margins: { ...base.margins, ...margins },
    paragraphSpacing: { ...base.paragraphSpacing, ...paragraphSpacing }
  };
}

function overridesToPatch(overrides: ProfileOverrides): ProfilePatch {
  const patch: ProfilePatch = {};
  const margins: Partial<FormattingProfile["margins"]> = {};
  if (overrides.marginTop !== undefined) margins.top = overrides.marginTop;
  if (overrides.marginRight !== undefined) margins.right = overrides.marginRight;
  if (overrides.marginBottom !== undefined) margins.bottom = overrides.marginBottom;
  if (overrides.marginLeft !== undefined) margins.left = overrides.marginLeft;
  patch.margins = margins;

  const fontSizes: Partial<FormattingProfile["fontSizes"]> = {};
  if (overrides.chapterFontSize !== undefined) fontSizes.chapter = overrides.chapterFontSize;
  if (overrides.sceneFontSize !== undefined) fontSizes.scene = overrides.sceneFontSize;
  if (overrides.contentFontSize !== undefined) fontSizes.body = overrides.contentFontSize;
  patch.fontSizes = fontSizes;

  if (overrides.chapterPageBreak !== undefined) patch.chapterStartsNewPage = overrides.chapterPageBreak;
  if (overrides.separatorStyle !== undefined) {
    const token = overrides.separatorStyle.trim();
    patch.sceneSeparator = token.length > 0 ? token : null;
  }
  if (overrides.sceneSeparators === false) patch.sceneSeparator = null;
  return patch;
}

export function resolveFormattingProfile(projectType: string, overrides: ProfileOverrides = {}): FormattingProfile {
  const baseline = applyPatch(BASELINE_PROFILE, {});
  const typed = isKnownProjectType(projectType)
    ? { ...applyPatch(baseline, PROJECT_TYPE_PROFILES[projectType]), projectType }
    : baseline;
  return applyPatch(typed, overridesToPatch(overrides));
}
