export interface RunStyle {
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

export type InlineStyle = keyof RunStyle;

export interface TextRun {
  kind: "text";
  text: string;
  style: RunStyle;
}

export interface LineBreakRun {
  kind: "break";
}

export type StyledRun = TextRun | LineBreakRun;

export interface ParagraphBlock {
  runs: StyledRun[];
}
