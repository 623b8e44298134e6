import { DATE_TAGS, DateTag } from "../models";
import { MetadataCopyError, ToolInvocationError } from "../utils/error";
import logger from "../utils/logger";
import { MetadataTool } from "./exifTool";

export type PropagationResult =
  | { ok: true }
  | { ok: false; error: MetadataCopyError };

export type VerificationResult =
  | { ok: true; missing: DateTag[] }
  | { ok: false; error: ToolInvocationError };

export class MetadataPropagator {
  constructor(private readonly tool: MetadataTool) {}

  /**
   * Copies every tag, then writes the date tags a second time: the bulk copy
   * does not reliably set the file-system dates.
   */
  async propagate(sourcePath: string, outputPath: string): Promise<PropagationResult> {
    const allTags = await this.tool.copyAllTags(sourcePath, outputPath);
    if (!allTags.ok) {
      return { ok: false, error: new MetadataCopyError("all-tags", allTags) };
    }

    const dateTags = await this.tool.copyDateTags(sourcePath, outputPath);
    if (!dateTags.ok) {
      return { ok: false, error: new MetadataCopyError("date-tags", dateTags) };
    }

    return { ok: true };
  }

  /** Date tags present on the source but absent from the output. */
  async verify(sourcePath: string, outputPath: string): Promise<VerificationResult> {
    const source = await this.tool.readTags(sourcePath);
    if (!source.ok) {
      return { ok: false, error: new ToolInvocationError(source.failure) };
    }
    const output = await this.tool.readTags(outputPath);
    if (!output.ok) {
      return { ok: false, error: new ToolInvocationError(output.failure) };
    }

    const missing = DATE_TAGS.filter(
      (tag) => tag in source.tags && !(tag in output.tags)
    );
    if (missing.length > 0) {
      logger.debug(`Date tags missing after copy: ${missing.join(", ")}`, {
        operation: "metadata.verify",
        sourcePath,
        outputPath,
        missing,
      });
    }
    return { ok: true, missing };
  }
}
