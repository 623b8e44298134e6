import { DATE_TAGS, MetadataTags, ToolFailure, ToolResult } from "../models";
import logger from "../utils/logger";
import { ProcessRunner } from "./processRunner";

export type ReadTagsResult =
  | { ok: true; tags: MetadataTags }
  | { ok: false; failure: ToolFailure };

export interface MetadataTool {
  probe(): Promise<boolean>;
  readTags(filePath: string): Promise<ReadTagsResult>;
  copyAllTags(sourcePath: string, targetPath: string): Promise<ToolResult>;
  copyDateTags(sourcePath: string, targetPath: string): Promise<ToolResult>;
}

function isTagRecord(value: unknown): value is MetadataTags {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ExifToolService implements MetadataTool {
  private availability?: boolean;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly executable: string = "exiftool"
  ) {}

  /** Runs `-ver` once; the answer is kept for the lifetime of the service. */
  async probe(): Promise<boolean> {
    if (this.availability !== undefined) {
      return this.availability;
    }

    const result = await this.runner.run(this.executable, ["-ver"]);
    this.availability = result.ok;

    if (result.ok) {
      logger.debug(`Using exiftool ${result.stdout.trim()}`, {
        operation: "exiftool.probe",
        version: result.stdout.trim(),
      });
    }
    return this.availability;
  }

  async readTags(filePath: string): Promise<ReadTagsResult> {
    const result = await this.runner.run(this.executable, ["-j", filePath]);
    if (!result.ok) {
      return { ok: false, failure: result };
    }

    try {
      const parsed: unknown = JSON.parse(result.stdout);
      const first: unknown = Array.isArray(parsed) ? parsed[0] : undefined;
      if (isTagRecord(first)) {
        return { ok: true, tags: first };
      }
      return {
        ok: false,
        failure: {
          ...result,
          ok: false,
          exitCode: 0,
          reason: `exiftool returned no tag object for ${filePath}`,
        },
      };
    } catch (error) {
      return {
        ok: false,
        failure: {
          ...result,
          ok: false,
          exitCode: 0,
          reason: `Malformed exiftool JSON for ${filePath}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        },
      };
    }
  }

  copyAllTags(sourcePath: string, targetPath: string): Promise<ToolResult> {
    return this.runner.run(this.executable, [
      "-TagsFromFile",
      sourcePath,
      "-all:all",
      "-overwrite_original",
      targetPath,
    ]);
  }

  copyDateTags(sourcePath: string, targetPath: string): Promise<ToolResult> {
    return this.runner.run(this.executable, [
      "-TagsFromFile",
      sourcePath,
      ...DATE_TAGS.map((tag) => `-${tag}`),
      "-overwrite_original",
      targetPath,
    ]);
  }
}
