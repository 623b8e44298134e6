import { formatInvocation, ToolFailure } from "../models";

export class ImageProcessingError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "ImageProcessingError";
  }
}

export class CapabilityUnavailableError extends ImageProcessingError {
  constructor(tool: string, cause?: Error) {
    super(`Required tool is not available: ${tool}`, cause);
    this.name = "CapabilityUnavailableError";
  }
}

export class ToolInvocationError extends ImageProcessingError {
  constructor(public readonly failure: ToolFailure, cause?: Error) {
    super(
      failure.reason ??
        `${failure.invocation.command} exited with code ${failure.exitCode}`,
      cause
    );
    this.name = "ToolInvocationError";
  }

  get command(): string {
    return formatInvocation(this.failure.invocation);
  }

  /** Lines for the console: command, exit code, then captured output. */
  details(): string[] {
    const lines = [
      `Command that failed: ${this.command}`,
      `Return code: ${this.failure.exitCode ?? "none"}`,
    ];
    if (this.failure.stdout.trim()) {
      lines.push(`Output: ${this.failure.stdout.trim()}`);
    }
    if (this.failure.stderr.trim()) {
      lines.push(`Error: ${this.failure.stderr.trim()}`);
    }
    return lines;
  }
}

export class ConversionError extends ToolInvocationError {
  constructor(stage: string, failure: ToolFailure, cause?: Error) {
    super(failure, cause);
    this.message = `Image conversion failed during ${stage}: ${this.message}`;
    this.name = "ConversionError";
  }
}

export class DecodeError extends ConversionError {
  constructor(failure: ToolFailure, cause?: Error) {
    super("decode", failure, cause);
    this.name = "DecodeError";
  }
}

export class EncodeError extends ConversionError {
  constructor(failure: ToolFailure, cause?: Error) {
    super("encode", failure, cause);
    this.name = "EncodeError";
  }
}

export class MetadataCopyError extends ToolInvocationError {
  constructor(pass: "all-tags" | "date-tags", failure: ToolFailure) {
    super(failure);
    this.message = `Metadata copy (${pass}) failed: ${this.message}`;
    this.name = "MetadataCopyError";
  }
}

export class UnexpectedConversionError extends ImageProcessingError {
  constructor(sourcePath: string, cause: unknown) {
    super(
      `Unexpected error converting ${sourcePath}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      cause instanceof Error ? cause : undefined
    );
    this.name = "UnexpectedConversionError";
  }
}
