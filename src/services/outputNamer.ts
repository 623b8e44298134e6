import fs from "fs/promises";
import path from "path";
import { WEBP_EXTENSION } from "../models";

function candidateName(stem: string, counter: number, extension: string): string {
  return counter === 0 ? `${stem}${extension}` : `${stem}_${counter}${extension}`;
}

function isAlreadyExists(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "EEXIST";
}

/**
 * Claims `outputDir/stem.webp`, or the first free `stem_N.webp`, by creating
 * it exclusively. The empty placeholder is what makes the name taken; the
 * encoder later overwrites it. Safe to call from concurrent jobs.
 */
export async function reserveOutputPath(
  stem: string,
  outputDir: string,
  extension: string = WEBP_EXTENSION
): Promise<string> {
  for (let counter = 0; ; counter++) {
    const outputPath = path.join(outputDir, candidateName(stem, counter, extension));
    try {
      const handle = await fs.open(outputPath, "wx");
      await handle.close();
      return outputPath;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
}

/**
 * Same naming as {@link reserveOutputPath} without claiming anything; used by
 * dry runs. `planned` holds names already handed out in this run.
 */
export async function previewOutputPath(
  stem: string,
  outputDir: string,
  planned: Set<string>,
  extension: string = WEBP_EXTENSION
): Promise<string> {
  for (let counter = 0; ; counter++) {
    const outputPath = path.join(outputDir, candidateName(stem, counter, extension));
    if (planned.has(outputPath)) continue;
    try {
      await fs.access(outputPath);
    } catch {
      planned.add(outputPath);
      return outputPath;
    }
  }
}
