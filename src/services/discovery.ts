import fs from "fs/promises";
import path from "path";
import { Candidate, SUPPORTED_EXTENSIONS } from "../models";

/**
 * Literal, case-sensitive suffix match against the listed extensions.
 * `a.JPEG` matches because it is listed; `a.Jpeg` does not.
 */
export function matchExtension(
  fileName: string,
  extensions: readonly string[] = SUPPORTED_EXTENSIONS
): string | undefined {
  return extensions.find(
    (extension) => fileName.length > extension.length && fileName.endsWith(extension)
  );
}

/**
 * Yields image files directly inside `rootDir`, in directory order.
 * Subdirectories are not descended into.
 */
export async function* discover(
  rootDir: string,
  extensions: readonly string[] = SUPPORTED_EXTENSIONS
): AsyncGenerator<Candidate> {
  const dir = await fs.opendir(rootDir);

  for await (const entry of dir) {
    if (!entry.isFile()) continue;

    const extension = matchExtension(entry.name, extensions);
    if (!extension) continue;

    yield {
      path: path.join(rootDir, entry.name),
      name: entry.name,
      extension,
      stem: entry.name.slice(0, -extension.length),
    };
  }
}
