import { resolve } from "node:path";

import { log, spinner } from "@clack/prompts";

import { ExportCoordinator } from "../core/coordinator.js";
import { UserInputError, failureToError, normalizeReportFormat } from "../core/errors.js";
import { createClackLogger, silentLogger } from "../core/logger.js";
import { loadManuscript } from "../core/manuscript.js";
import { loadOptionsFile } from "../core/options.js";
import { toFileStem } from "../core/text.js";
import type { ExportArtifact, ExportCommandOptions, ExportOptions } from "../core/types.js";

export interface ExportCommandDependencies {
  cwd?: string;
  now?: () => Date;
  coordinator?: ExportCoordinator;
}

export function flagsToExportOptions(rawOptions: ExportCommandOptions): Partial<ExportOptions> {
  const options: Partial<ExportOptions> = {};
  if (rawOptions.cover !== undefined) options.includeCover = rawOptions.cover;
  if (rawOptions.toc !== undefined) options.includeToc = rawOptions.toc;
  if (rawOptions.frontmatter !== undefined) options.includeFrontmatter = rawOptions.frontmatter;
  if (rawOptions.chapterPageBreak !== undefined) options.chapterPageBreak = rawOptions.chapterPageBreak;
  if (rawOptions.sceneSeparators !== undefined) options.sceneSeparators = rawOptions.sceneSeparators;
  if (rawOptions.separator !== undefined) options.separatorStyle = rawOptions.separator;
  return options;
}

export function defaultOutputPath(title: string, extension: string, cwd: string): string {
  return resolve(cwd, `${toFileStem(title)}${extension}`);
}

function describeArtifact(artifact: ExportArtifact): string {
  const breaks = artifact.pageBreaks === 1 ? "1 page break" : `${artifact.pageBreaks} page breaks`;
  return `${artifact.paragraphs} paragraphs, ${breaks}, ${artifact.bytes} bytes`;
}

export async function runExport(
  manuscriptPath: string | undefined,
  rawOptions: ExportCommandOptions,
  dependencies: ExportCommandDependencies = {}
): Promise<ExportArtifact> {
  const report = normalizeReportFormat(rawOptions.report);
  const cwd = dependencies.cwd ?? process.cwd();
  if (!manuscriptPath?.trim()) {
    throw new UserInputError("A manuscript file is required: folio export <manuscript.json> --format <name>.");
  }
  const formatName = rawOptions.format?.trim();
  if (!formatName) {
    throw new UserInputError("Missing --format. Run `folio formats` to list the available formats.");
  }

  const document = await loadManuscript(resolve(cwd, manuscriptPath));
  const fileOptions = rawOptions.config ? await loadOptionsFile(resolve(cwd, rawOptions.config)) : {};
  const options: Partial<ExportOptions> = { ...fileOptions, ...flagsToExportOptions(rawOptions) };
  if (dependencies.now) options.now = dependencies.now;

  const logger = report === "json" ? silentLogger : createClackLogger({ verbose: rawOptions.verbose === true });
  const coordinator = dependencies.coordinator ?? new ExportCoordinator({ logger });
  const extension = coordinator.extensionFor(formatName) ?? `.${formatName.toLowerCase()}`;
  const outputPath = rawOptions.out ? resolve(cwd, rawOptions.out) : defaultOutputPath(document.title, extension, cwd);

  const exportSpinner = report === "text" ? spinner({ indicator: "dots" }) : null;
  exportSpinner?.start(`Exporting "${document.title}" as ${formatName}...`);
  const result = await coordinator.export(document, formatName, options, outputPath);
  if (!result.ok) {
    exportSpinner?.stop("Export failed.");
    throw failureToError(result);
  }
  exportSpinner?.stop("Export complete.");

  if (report === "json") {
    console.log(JSON.stringify({ artifact: result.artifact }, null, 2));
  } else {
    log.success(`Wrote ${result.artifact.path}`);
    log.info(describeArtifact(result.artifact));
  }
  return result.artifact;
}
