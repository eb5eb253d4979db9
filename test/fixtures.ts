import type { ManuscriptDocument } from "../src/core/types.js";

export const FIXED_NOW = (): Date => new Date(2026, 2, 5, 12, 0, 0);

export function makeManuscript(overrides: Partial<ManuscriptDocument> = {}): ManuscriptDocument {
  return {
    title: "The Lantern Road",
    author: "Test Author",
    genre: "Fantasy",
    language: "en",
    projectType: "novel",
    tags: ["draft", "series"],
    chapters: [
      {
        title: "Departure",
        scenes: [
          { title: "At the Gate", content: "Hello **world**\n\nSecond *line* here." },
          { content: "" }
        ]
      },
      {
        scenes: [{ title: "Night", content: "<p>Dark <u>sky</u></p>" }]
      }
    ],
    ...overrides
  };
}
