import { randomUUID } from "node:crypto";
import { rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export type ArtifactWriteStage = "temp" | "commit";

export interface ArtifactWriteProgress {
  stage: ArtifactWriteStage;
  path: string;
}

export interface WriteArtifactOptions {
  onProgress?: (event: ArtifactWriteProgress) => void;
}

export function tempPathFor(targetPath: string): string {
  return join(dirname(targetPath), `.${basename(targetPath)}.${randomUUID()}.tmp`);
}

// Readers of targetPath see either the previous file or the complete new one.
export async function writeArtifact(
  targetPath: string,
  bytes: Uint8Array,
  options: WriteArtifactOptions = {}
): Promise<void> {
  const directory = dirname(targetPath);
  const directoryStats = await stat(directory);
  if (!directoryStats.isDirectory()) {
    throw new Error(`Output directory is not a directory: ${directory}`);
  }

  const tempPath = tempPathFor(targetPath);
  try {
    await writeFile(tempPath, bytes, { flag: "wx" });
    options.onProgress?.({ stage: "temp", path: tempPath });
    await rename(tempPath, targetPath);
    options.onProgress?.({ stage: "commit", path: targetPath });
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
