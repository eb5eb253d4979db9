import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { tempPathFor, writeArtifact, type ArtifactWriteProgress } from "../src/core/write.js";

const BYTES = new TextEncoder().encode("new content");

describe("writeArtifact", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function makeTempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), "folio-write-"));
    tempDirs.push(dir);
    return dir;
  }

  it("places temp files beside the target", () => {
    const path = tempPathFor("/books/out.pdf");
    expect(path).toMatch(/^\/books\/\.out\.pdf\.[0-9a-f-]{36}\.tmp$/);
  });

  it("commits through a temp file and reports both stages", async () => {
    const dir = makeTempDir();
    const target = join(dir, "out.md");
    const events: ArtifactWriteProgress[] = [];

    await writeArtifact(target, BYTES, { onProgress: (event) => events.push(event) });

    expect(await readFile(target, "utf8")).toBe("new content");
    expect(await readdir(dir)).toEqual(["out.md"]);
    expect(events.map((event) => event.stage)).toEqual(["temp", "commit"]);
    expect(events[0]?.path.startsWith(join(dir, ".out.md."))).toBe(true);
    expect(events[1]?.path).toBe(target);
  });

  it("replaces an existing file", async () => {
    const dir = makeTempDir();
    const target = join(dir, "out.md");
    await writeFile(target, "old content", "utf8");

    await writeArtifact(target, BYTES);

    expect(await readFile(target, "utf8")).toBe("new content");
  });

  it("fails when the directory does not exist", async () => {
    const dir = makeTempDir();
    await expect(writeArtifact(join(dir, "missing", "out.md"), BYTES)).rejects.toThrow();
    expect(await readdir(dir)).toEqual([]);
  });

  it("removes the temp file when the commit fails", async () => {
    const dir = makeTempDir();
    const target = join(dir, "taken");
    mkdirSync(target);

    await expect(writeArtifact(target, BYTES)).rejects.toThrow();
    expect(await readdir(dir)).toEqual(["taken"]);
  });
});
