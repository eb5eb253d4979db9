export function toTitleCase(value: string): string {
  return value
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

export function toHeadingAnchor(value: string): string {
  return value
    .toLowerCase()
    .replace(/\s/g, "-")
    .replace(/[^\p{L}\p{N}-]/gu, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function toFileStem(title: string): string {
  const stem = title.trim().replace(/\s+/g, "_").replace(/[\\/:*?"<>|]/g, "");
  return stem.length > 0 ? stem : "Untitled";
}

export function normalizeNewlines(content: string): string {
  return content.replace(/\r\n?/g, "\n");
}

export function countWords(content: string): number {
  const trimmed = content.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
