import type { ProjectType } from "./common.js";

export interface Scene {
  title?: string;
  content: string;
}

export interface Chapter {
  title?: string;
  scenes: Scene[];
}

export interface ManuscriptDocument {
  title: string;
  author: string;
  genre?: string;
  language: string;
  /** Known tags are typed; anything else falls back to the baseline layout. */
  projectType: ProjectType | (string & {});
  tags?: string[];
  chapters: Chapter[];
}
