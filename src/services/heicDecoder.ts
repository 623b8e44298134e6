import { ToolResult } from "../models";
import { ProcessRunner } from "./processRunner";

export interface ImageDecoder {
  readonly name: string;
  decodeToJpeg(inputPath: string, outputPath: string): Promise<ToolResult>;
  isAvailable(): Promise<boolean>;
}

/** HEIC → JPEG through macOS `sips`. */
export class SipsDecoder implements ImageDecoder {
  readonly name = "sips";

  constructor(
    private readonly runner: ProcessRunner,
    private readonly executable: string = "sips"
  ) {}

  decodeToJpeg(inputPath: string, outputPath: string): Promise<ToolResult> {
    return this.runner.run(this.executable, [
      "-s",
      "format",
      "jpeg",
      inputPath,
      "--out",
      outputPath,
    ]);
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.runner.run(this.executable, ["--version"]);
    return result.ok;
  }
}
