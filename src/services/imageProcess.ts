import sharp from "sharp";
import { ToolResult } from "../models";
import { ProcessRunner } from "./processRunner";

export interface WebPEncoder {
  readonly name: string;
  /** Encodes `inputPath` to `outputPath` at `quality`, carrying all metadata. */
  encode(inputPath: string, outputPath: string, quality: number): Promise<ToolResult>;
  isAvailable(): Promise<boolean>;
}

function clampQuality(quality: number): number {
  return Math.max(1, Math.min(100, Math.round(quality)));
}

export class CwebpEncoder implements WebPEncoder {
  readonly name = "cwebp";

  constructor(
    private readonly runner: ProcessRunner,
    private readonly executable: string = "cwebp"
  ) {}

  encode(inputPath: string, outputPath: string, quality: number): Promise<ToolResult> {
    return this.runner.run(this.executable, [
      "-q",
      String(clampQuality(quality)),
      "-metadata",
      "all",
      inputPath,
      "-o",
      outputPath,
    ]);
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.runner.run(this.executable, ["-version"]);
    return result.ok;
  }
}

/**
 * In-process encoder on libvips. Failures are reported in the same shape as
 * an external tool so the converter treats both encoders alike.
 */
export class SharpImageProcessor implements WebPEncoder {
  readonly name = "sharp";

  async encode(inputPath: string, outputPath: string, quality: number): Promise<ToolResult> {
    const validQuality = clampQuality(quality);
    const invocation = {
      command: "sharp",
      args: ["webp", `quality=${validQuality}`, "metadata=all", inputPath, outputPath],
    };

    try {
      const info = await sharp(inputPath)
        .withMetadata()
        .webp({
          quality: validQuality,
          effort: 6, // Higher effort for better compression
          lossless: false,
        })
        .toFile(outputPath);
      return {
        ok: true,
        invocation,
        stdout: `${info.width}x${info.height} ${info.size} bytes`,
        stderr: "",
      };
    } catch (error) {
      return {
        ok: false,
        invocation,
        exitCode: null,
        stdout: "",
        stderr: error instanceof Error ? error.message : String(error),
        reason: `sharp could not encode ${inputPath}`,
      };
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const testBuffer = await sharp({
        create: {
          width: 10,
          height: 10,
          channels: 3,
          background: { r: 255, g: 255, b: 255 },
        },
      })
        .png()
        .toBuffer();

      const webpBuffer = await sharp(testBuffer).webp({ quality: 80 }).toBuffer();
      return webpBuffer.length > 0;
    } catch {
      return false;
    }
  }
}
