import type { InlineStyle, RunStyle } from "../types.js";

export interface StyleEntry {
  style: InlineStyle;
  opener: string;
  group: number;
}

export const PLAIN_STYLE: RunStyle = Object.freeze({ bold: false, italic: false, underline: false });

export function sameStyle(left: RunStyle, right: RunStyle): boolean {
  return left.bold === right.bold && left.italic === right.italic && left.underline === right.underline;
}

export class StyleStack {
  private entries: StyleEntry[] = [];
  // Openers whose marker declared no style still need a group so their close pops nothing else.
  private emptyGroups: Array<{ opener: string; group: number }> = [];
  private nextGroup = 0;

  open(opener: string, styles: readonly InlineStyle[]): void {
    const group = this.nextGroup;
    this.nextGroup += 1;
    if (styles.length === 0) {
      this.emptyGroups.push({ opener, group });
      return;
    }
    for (const style of styles) {
      this.entries.push({ style, opener, group });
    }
  }

  close(opener: string): boolean {
    const group = this.latestGroup(opener);
    if (group === undefined) return false;
    this.entries = this.entries.filter((entry) => entry.group !== group);
    this.emptyGroups = this.emptyGroups.filter((entry) => entry.group !== group);
    return true;
  }

  isOpen(opener: string): boolean {
    return this.latestGroup(opener) !== undefined;
  }

  /** Most recently opened opener among `candidates`, or undefined. */
  latestOf(candidates: readonly string[]): string | undefined {
    let latest: { opener: string; group: number } | undefined;
    for (const entry of [...this.entries, ...this.emptyGroups]) {
      if (!candidates.includes(entry.opener)) continue;
      if (!latest || entry.group > latest.group) latest = entry;
    }
    return latest?.opener;
  }

  drain(): void {
    this.entries = [];
    this.emptyGroups = [];
  }

  active(): RunStyle {
    return {
      bold: this.entries.some((entry) => entry.style === "bold"),
      italic: this.entries.some((entry) => entry.style === "italic"),
      underline: this.entries.some((entry) => entry.style === "underline")
    };
  }

  private latestGroup(opener: string): number | undefined {
    let latest: number | undefined;
    for (const entry of [...this.entries, ...this.emptyGroups]) {
      if (entry.opener !== opener) continue;
      if (latest === undefined || entry.group > latest) latest = entry.group;
    }
    return latest;
  }
}
