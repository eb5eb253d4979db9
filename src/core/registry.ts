import type { CoverMetadata, RunEmitter } from "./emitters/contracts.js";
import { MarkdownEmitter } from "./emitters/markdown.js";
import { PrintEmitter } from "./emitters/print.js";
import { WordEmitter } from "./emitters/word.js";
import { UserInputError } from "./errors.js";
import type { ExportOptions, FormatKind, FormattingProfile } from "./types.js";

export interface EmitterContext {
  profile: FormattingProfile;
  metadata: CoverMetadata;
  options: ExportOptions;
}

export interface FormatRegistration {
  kind: FormatKind;
  extension: string;
  description: string;
  create(context: EmitterContext): RunEmitter;
}

export interface FormatDescriptor {
  name: string;
  kind: FormatKind;
  extension: string;
  description: string;
  aliases: string[];
}

export function normalizeFormatName(name: string): string {
  return name.trim().toLowerCase();
}

export class FormatRegistry {
  private readonly formats = new Map<string, FormatRegistration>();
  private readonly aliases = new Map<string, string>();

  register(name: string, registration: FormatRegistration): void {
    const key = normalizeFormatName(name);
    if (!key) throw new UserInputError("Format name must not be empty.");
    this.formats.set(key, registration);
  }

  alias(alias: string, target: string): void {
    const key = normalizeFormatName(alias);
    if (!key) throw new UserInputError("Format alias must not be empty.");
    this.aliases.set(key, normalizeFormatName(target));
  }

  /** Canonical name for `name`; aliases resolve even when their target is gone. */
  canonicalName(name: string): string {
    const key = normalizeFormatName(name);
    if (this.formats.has(key)) return key;
    return this.aliases.get(key) ?? key;
  }

  isSupported(name: string): boolean {
    const key = normalizeFormatName(name);
    return this.formats.has(key) || this.aliases.has(key);
  }

  lookup(name: string): FormatRegistration | undefined {
    return this.formats.get(this.canonicalName(name));
  }

  names(): string[] {
    return [...this.formats.keys()].sort();
  }

  describe(): FormatDescriptor[] {
    return this.names().flatMap((name) => {
      const registration = this.formats.get(name);
      if (!registration) return [];
      const aliases = [...this.aliases.entries()].filter(([, target]) => target === name).map(([alias]) => alias);
      return [
        {
          name,
          kind: registration.kind,
          extension: registration.extension,
          description: registration.description,
          aliases: aliases.sort()
        }
      ];
    });
  }
}

export const BUILT_IN_FORMATS: ReadonlyArray<[string, FormatRegistration]> = [
  [
    "pdf",
    {
      kind: "print",
      extension: ".pdf",
      description: "Paginated A4 document for print",
      create: ({ profile, metadata }) => new PrintEmitter({ profile, metadata })
    }
  ],
  [
    "docx",
    {
      kind: "word",
      extension: ".docx",
      description: "Editable Word document",
      create: ({ profile, metadata }) => new WordEmitter({ profile, metadata })
    }
  ],
  [
    "markdown",
    {
      kind: "markup",
      extension: ".md",
      description: "Markdown with a YAML preamble",
      create: ({ metadata, options }) =>
        new MarkdownEmitter(options.includeFrontmatter ? { frontmatter: metadata } : {})
    }
  ]
];

export function createDefaultRegistry(): FormatRegistry {
  const registry = new FormatRegistry();
  for (const [name, registration] of BUILT_IN_FORMATS) {
    registry.register(name, registration);
  }
  registry.alias("md", "markdown");
  registry.alias("word", "docx");
  return registry;
}
