import { homedir } from "node:os";

import { log } from "@clack/prompts";
import { Command, CommanderError } from "commander";

import { runExport } from "./commands/export.js";
import { runFormats } from "./commands/formats.js";
import { runOutline } from "./commands/outline.js";
import { normalizeError, resolveReportFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { ExportCommandOptions, OutlineCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const CLI_VERSION = packageJson.version;
const NEGATABLE_FLAGS = ["cover", "toc", "frontmatter", "chapterPageBreak", "sceneSeparators"] as const;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  teal: "\u001B[38;5;37m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  return `…${text.slice(text.length - maxWidth + 1)}`;
}

function renderBrandHeader(source: string | undefined): void {
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(72, Math.max(36, terminalWidth - 4));
  const rows: Array<{ plain: string; styled: string }> = [
    { plain: "folio-press", styled: paint("folio-press", ANSI.bold, ANSI.teal) },
    { plain: "manuscript export engine", styled: paint("manuscript export engine", ANSI.white) },
    { plain: "", styled: "" }
  ];
  const info: Array<[string, string]> = [
    ["version", `v${CLI_VERSION}`],
    ["directory", compactPath(process.cwd())]
  ];
  if (source) info.push(["source", source]);
  for (const [label, value] of info) {
    const labelBlock = `${label}:`.padEnd(11, " ");
    const fitted = ellipsize(value, innerWidth - labelBlock.length);
    rows.push({ plain: `${labelBlock}${fitted}`, styled: `${paint(labelBlock, ANSI.mutedGray)}${paint(fitted, ANSI.white)}` });
  }

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    const padding = " ".repeat(Math.max(0, innerWidth - row.plain.length));
    console.log(`${vertical} ${row.styled}${padding} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

// Negatable flags default to true; only flags typed on the command line override the config file.
function explicitExportOptions(rawOptions: ExportCommandOptions, command: Command): ExportCommandOptions {
  const options: ExportCommandOptions = { ...rawOptions };
  for (const flag of NEGATABLE_FLAGS) {
    if (command.getOptionValueSource(flag) !== "cli") delete options[flag];
  }
  return options;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name("folio")
    .description("Export chaptered manuscripts to PDF, DOCX and Markdown with per-project-type layout rules.")
    .version(CLI_VERSION)
    .exitOverride();

  program
    .command("export")
    .description("Export a manuscript JSON file to the requested format.")
    .argument("<manuscript>", "Path to the manuscript JSON file")
    .option("-f, --format <name>", "pdf | docx | markdown (aliases: word, md)")
    .option("-o, --out <path>", "Output file (defaults to the title with spaces as underscores)")
    .option("-c, --config <path>", "JSON file with export options (snake_case keys)")
    .option("--no-cover", "Skip the cover page")
    .option("--no-toc", "Skip the table of contents")
    .option("--no-frontmatter", "Skip the YAML preamble (markdown only)")
    .option("--no-chapter-page-break", "Do not start each chapter on a new page")
    .option("--no-scene-separators", "Do not place separators between scenes")
    .option("--separator <token>", "Scene separator token, e.g. \"* * *\"")
    .option("--report <format>", "text | json", "text")
    .option("--verbose", "Show debug output", false)
    .action(async (manuscriptPath: string, rawOptions: ExportCommandOptions, command: Command) => {
      if (rawOptions.report !== "json") renderBrandHeader(manuscriptPath);
      await runExport(manuscriptPath, explicitExportOptions(rawOptions, command));
    });

  program
    .command("formats")
    .description("List the registered export formats.")
    .option("--report <format>", "text | json", "text")
    .action((rawOptions: { report?: string }) => {
      runFormats(rawOptions);
    });

  program
    .command("outline")
    .description("Show the table of contents and per-scene paragraph counts of a manuscript.")
    .argument("<manuscript>", "Path to the manuscript JSON file")
    .option("--report <format>", "text | json", "text")
    .action(async (manuscriptPath: string, rawOptions: OutlineCommandOptions) => {
      if (rawOptions.report !== "json") renderBrandHeader(manuscriptPath);
      await runOutline(manuscriptPath, rawOptions);
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode === 0) return;
    const normalized = normalizeError(error);
    if (resolveReportFormatFromArgv(process.argv) === "json") {
      console.log(JSON.stringify(toJsonErrorPayload(normalized), null, 2));
    } else if (!(error instanceof CommanderError)) {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
