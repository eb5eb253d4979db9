import { readFile } from "node:fs/promises";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { ExportOptions } from "./types.js";

const margin = z.number().finite().min(0).max(20);
const fontSize = z.number().finite().positive().max(144);

export const exportOptionsSchema = z
  .object({
    include_cover: z.boolean().optional(),
    include_toc: z.boolean().optional(),
    include_frontmatter: z.boolean().optional(),
    chapter_page_break: z.boolean().optional(),
    scene_separators: z.boolean().optional(),
    separator_style: z.string().max(40).optional(),
    margin_top: margin.optional(),
    margin_right: margin.optional(),
    margin_bottom: margin.optional(),
    margin_left: margin.optional(),
    chapter_font_size: fontSize.optional(),
    scene_font_size: fontSize.optional(),
    content_font_size: fontSize.optional()
  })
  .strip();

export type ExportOptionsFile = z.infer<typeof exportOptionsSchema>;

const resolvedOptionsSchema = z.object({
  includeCover: z.boolean(),
  includeToc: z.boolean(),
  includeFrontmatter: z.boolean(),
  chapterPageBreak: z.boolean().optional(),
  sceneSeparators: z.boolean().optional(),
  separatorStyle: z.string().max(40).optional(),
  marginTop: margin.optional(),
  marginRight: margin.optional(),
  marginBottom: margin.optional(),
  marginLeft: margin.optional(),
  chapterFontSize: fontSize.optional(),
  sceneFontSize: fontSize.optional(),
  contentFontSize: fontSize.optional()
});

export const DEFAULT_EXPORT_OPTIONS: Readonly<ExportOptions> = Object.freeze({
  includeCover: true,
  includeToc: true,
  includeFrontmatter: true
});

export function fromOptionsFile(file: ExportOptionsFile): Partial<ExportOptions> {
  const options: Partial<ExportOptions> = {};
  if (file.include_cover !== undefined) options.includeCover = file.include_cover;
  if (file.include_toc !== undefined) options.includeToc = file.include_toc;
  if (file.include_frontmatter !== undefined) options.includeFrontmatter = file.include_frontmatter;
  if (file.chapter_page_break !== undefined) options.chapterPageBreak = file.chapter_page_break;
  if (file.scene_separators !== undefined) options.sceneSeparators = file.scene_separators;
  if (file.separator_style !== undefined) options.separatorStyle = file.separator_style;
  if (file.margin_top !== undefined) options.marginTop = file.margin_top;
  if (file.margin_right !== undefined) options.marginRight = file.margin_right;
  if (file.margin_bottom !== undefined) options.marginBottom = file.margin_bottom;
  if (file.margin_left !== undefined) options.marginLeft = file.margin_left;
  if (file.chapter_font_size !== undefined) options.chapterFontSize = file.chapter_font_size;
  if (file.scene_font_size !== undefined) options.sceneFontSize = file.scene_font_size;
  if (file.content_font_size !== undefined) options.contentFontSize = file.content_font_size;
  return options;
}

export async function loadOptionsFile(path: string): Promise<Partial<ExportOptions>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read options file: ${path}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Options file is not valid JSON: ${path}`, { cause: error });
  }

  const parsed = exportOptionsSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "(root)";
    throw new ConfigError(`Invalid option ${key} in ${path}: ${issue?.message ?? "unrecognized shape"}`);
  }
  return fromOptionsFile(parsed.data);
}

export function mergeExportOptions(...layers: Array<Partial<ExportOptions>>): ExportOptions {
  const merged: ExportOptions = { ...DEFAULT_EXPORT_OPTIONS };
  for (const layer of layers) {
    Object.assign(merged, layer);
  }
  return merged;
}

/** Problem description for options that cannot drive an export, or undefined. */
export function describeInvalidOptions(options: ExportOptions): string | undefined {
  const { now, ...values } = options;
  if (now !== undefined && typeof now !== "function") return "now must be a function";
  const parsed = resolvedOptionsSchema.safeParse(values);
  if (parsed.success) return undefined;
  return parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}
