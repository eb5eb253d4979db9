import { resolve } from "node:path";

import { assembleDocument, buildCoverMetadata, type AssemblySummary } from "./assembler.js";
import type { RunEmitter } from "./emitters/contracts.js";
import { resolveFormattingProfile } from "./formatting.js";
import { silentLogger, type ExportLogger } from "./logger.js";
import { describeInvalidOptions, mergeExportOptions } from "./options.js";
import {
  createDefaultRegistry,
  type FormatDescriptor,
  type FormatRegistration,
  type FormatRegistry
} from "./registry.js";
import type {
  ExportFailure,
  ExportFailureCategory,
  ExportFailureReason,
  ExportOptions,
  ExportResult,
  ManuscriptDocument
} from "./types.js";
import { writeArtifact } from "./write.js";

const FAILURE_CATEGORIES: Record<ExportFailureReason, ExportFailureCategory> = {
  NoProject: "validation",
  UnsupportedFormat: "validation",
  InvalidOptions: "validation",
  InvalidOutputPath: "validation",
  WriteFailed: "io",
  EmitterMissing: "internal",
  RenderFailed: "internal"
};

export function exportFailure(reason: ExportFailureReason, message: string): ExportFailure {
  return { ok: false, category: FAILURE_CATEGORIES[reason], reason, message };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ExportCoordinatorOptions {
  logger?: ExportLogger;
  registry?: FormatRegistry;
}

export class ExportCoordinator {
  private readonly logger: ExportLogger;
  private readonly registry: FormatRegistry;

  constructor(options: ExportCoordinatorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? createDefaultRegistry();
  }

  registerFormat(name: string, registration: FormatRegistration): void {
    this.registry.register(name, registration);
    this.logger.debug(`Registered export format "${name}".`);
  }

  getSupportedFormats(): string[] {
    return this.registry.names();
  }

  isFormatSupported(name: string): boolean {
    return this.registry.isSupported(name);
  }

  describeFormats(): FormatDescriptor[] {
    return this.registry.describe();
  }

  extensionFor(name: string): string | undefined {
    return this.registry.lookup(name)?.extension;
  }

  async export(
    document: ManuscriptDocument | null | undefined,
    formatName: string,
    options: Partial<ExportOptions>,
    outputPath: string
  ): Promise<ExportResult> {
    if (!document) {
      return this.fail(exportFailure("NoProject", "No manuscript is loaded; open a project before exporting."));
    }
    if (!this.registry.isSupported(formatName)) {
      const supported = this.registry.names().join(", ");
      return this.fail(exportFailure("UnsupportedFormat", `Unsupported export format "${formatName}". Supported: ${supported}.`));
    }

    const resolvedOptions = mergeExportOptions(options);
    const optionsProblem = describeInvalidOptions(resolvedOptions);
    if (optionsProblem) {
      return this.fail(exportFailure("InvalidOptions", `Invalid export options: ${optionsProblem}`));
    }
    if (outputPath.trim().length === 0) {
      return this.fail(exportFailure("InvalidOutputPath", "Output path must not be empty."));
    }

    const format = this.registry.canonicalName(formatName);
    const registration = this.registry.lookup(formatName);
    if (!registration) {
      return this.fail(exportFailure("EmitterMissing", `Format "${formatName}" points at "${format}", which has no emitter.`));
    }

    const profile = resolveFormattingProfile(document.projectType, resolvedOptions);
    const metadata = buildCoverMetadata(document, resolvedOptions.now?.() ?? new Date());
    this.logger.debug(`Resolved ${profile.projectType} layout for "${document.title}".`);

    let emitter: RunEmitter;
    try {
      emitter = registration.create({ profile, metadata, options: resolvedOptions });
    } catch (error) {
      return this.fail(exportFailure("EmitterMissing", `Could not create the ${format} emitter: ${describeError(error)}`));
    }

    let summary: AssemblySummary;
    let bytes: Uint8Array;
    try {
      summary = assembleDocument(document, profile, resolvedOptions, emitter, metadata);
      this.logger.debug(
        `Assembled ${summary.chapters} chapters, ${summary.scenes} scenes and ${summary.paragraphs} paragraphs.`
      );
      bytes = await emitter.render();
    } catch (error) {
      return this.fail(exportFailure("RenderFailed", `Rendering ${format} failed: ${describeError(error)}`));
    }

    const path = resolve(outputPath);
    try {
      await writeArtifact(path, bytes, {
        onProgress: (event) => this.logger.debug(`Artifact ${event.stage}: ${event.path}`)
      });
    } catch (error) {
      return this.fail(exportFailure("WriteFailed", `Could not write ${path}: ${describeError(error)}`));
    }

    this.logger.success(`Exported ${format} to ${path} (${bytes.byteLength} bytes).`);
    return {
      ok: true,
      artifact: {
        path,
        format,
        bytes: bytes.byteLength,
        paragraphs: summary.paragraphs,
        pageBreaks: summary.pageBreaks
      }
    };
  }

  private fail(failure: ExportFailure): ExportFailure {
    if (failure.category === "validation") {
      this.logger.warn(failure.message);
    } else {
      this.logger.error(`${failure.reason}: ${failure.message}`);
    }
    return failure;
  }
}

export async function exportManuscript(
  document: ManuscriptDocument | null | undefined,
  formatName: string,
  options: Partial<ExportOptions>,
  outputPath: string,
  coordinatorOptions: ExportCoordinatorOptions = {}
): Promise<ExportResult> {
  return new ExportCoordinator(coordinatorOptions).export(document, formatName, options, outputPath);
}
