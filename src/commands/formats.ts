import { log } from "@clack/prompts";

import { ExportCoordinator } from "../core/coordinator.js";
import { normalizeReportFormat } from "../core/errors.js";
import type { FormatDescriptor } from "../core/registry.js";

export function runFormats(
  rawOptions: { report?: string },
  coordinator: ExportCoordinator = new ExportCoordinator()
): FormatDescriptor[] {
  const report = normalizeReportFormat(rawOptions.report);
  const formats = coordinator.describeFormats();

  if (report === "json") {
    console.log(JSON.stringify({ formats }, null, 2));
    return formats;
  }

  for (const format of formats) {
    const aliases = format.aliases.length > 0 ? ` (alias: ${format.aliases.join(", ")})` : "";
    log.info(`${format.name}${aliases}: ${format.description} (${format.extension})`);
  }
  return formats;
}
