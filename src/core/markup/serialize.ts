import type { ParagraphBlock, RunStyle, StyledRun } from "../types.js";

export function escapeMarkupText(text: string): string {
  return text.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}

function wrap(text: string, style: RunStyle): string {
  let markup = escapeMarkupText(text);
  if (style.underline) markup = `<u>${markup}</u>`;
  if (style.italic) markup = `<i>${markup}</i>`;
  if (style.bold) markup = `<b>${markup}</b>`;
  return markup;
}

export function serializeRuns(runs: readonly StyledRun[]): string {
  return runs.map((run) => (run.kind === "break" ? "<br/>" : wrap(run.text, run.style))).join("");
}

export function serializeMarkup(blocks: readonly ParagraphBlock[]): string {
  return blocks.map((block) => `<p>${serializeRuns(block.runs)}</p>`).join("\n");
}
