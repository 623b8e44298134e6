import fs from "fs/promises";
import { Config } from "../config";
import {
  Candidate,
  ConversionJob,
  ConversionResult,
  ConversionRoute,
  INTERMEDIATE_EXTENSION,
  RunSummary,
  TWO_STEP_EXTENSION,
} from "../models";
import {
  ConversionError,
  DecodeError,
  EncodeError,
  CapabilityUnavailableError,
  UnexpectedConversionError,
} from "../utils/error";
import logger from "../utils/logger";
import { discover } from "./discovery";
import { MetadataTool } from "./exifTool";
import { ImageDecoder } from "./heicDecoder";
import { WebPEncoder } from "./imageProcess";
import { MetadataPropagator } from "./metadataPropagator";
import { previewOutputPath, reserveOutputPath } from "./outputNamer";
import { createSummary, recordOutcome } from "./runSummary";

export type ProgressCallback = (message: string) => void;

export interface ConversionService {
  processAllImages(onProgress?: ProgressCallback): Promise<RunSummary>;
  processImage(candidate: Candidate): Promise<ConversionResult>;
}

export interface ConversionDependencies {
  metadataTool: MetadataTool;
  encoder: WebPEncoder;
  decoder: ImageDecoder;
  propagator?: MetadataPropagator;
}

type ConversionOutcome = { ok: true } | { ok: false; error: ConversionError };

export function resolveRoute(extension: string): ConversionRoute {
  return extension.toLowerCase() === TWO_STEP_EXTENSION ? "two-step" : "direct";
}

const INSTALL_HINTS = [
  "Please install exiftool for better metadata handling:",
  "  - macOS: brew install exiftool",
  "  - Linux: sudo apt-get install exiftool",
  "  - Windows: Download from https://exiftool.org/",
];

export class BatchConversionService implements ConversionService {
  private readonly metadataTool: MetadataTool;
  private readonly encoder: WebPEncoder;
  private readonly decoder: ImageDecoder;
  private readonly propagator: MetadataPropagator;
  private readonly config: Config;
  private readonly dryRun: boolean;
  private readonly plannedOutputs = new Set<string>();
  private metadataAvailable = false;

  constructor(deps: ConversionDependencies, config: Config, dryRun: boolean = false) {
    this.metadataTool = deps.metadataTool;
    this.encoder = deps.encoder;
    this.decoder = deps.decoder;
    this.propagator = deps.propagator ?? new MetadataPropagator(deps.metadataTool);
    this.config = config;
    this.dryRun = dryRun;
  }

  async processAllImages(onProgress?: ProgressCallback): Promise<RunSummary> {
    const startTime = Date.now();
    const { inputDir, outputDir } = this.config.conversion;

    if (!this.dryRun) {
      await fs.mkdir(outputDir, { recursive: true });
    }

    this.metadataAvailable = await this.metadataTool.probe();
    if (!this.metadataAvailable) {
      const unavailable = new CapabilityUnavailableError(this.config.tools.exiftool);
      logger.warn(
        [
          "Warning: exiftool not found. Metadata preservation cannot be verified.",
          ...INSTALL_HINTS,
        ].join("\n"),
        { operation: "exiftool.unavailable", error: unavailable.message }
      );
    }

    const candidates: Candidate[] = [];
    for await (const candidate of discover(inputDir)) {
      candidates.push(candidate);
    }
    logger.info(`Found ${candidates.length} images to convert`, {
      operation: "batch.discover",
      inputDir,
      totalImages: candidates.length,
    });

    this.plannedOutputs.clear();
    const results = await this.processConcurrently(candidates, onProgress);

    const summary = results.reduce(
      recordOutcome,
      createSummary(candidates.length, this.metadataAvailable)
    );
    summary.processingDuration = Date.now() - startTime;

    logger.debug("Batch conversion completed", {
      operation: "batch.complete",
      duration: summary.processingDuration,
      successful: summary.successful,
      failed: summary.failed,
      metadataPreserved: summary.metadataPreserved,
      totalImages: summary.totalImages,
    });

    return summary;
  }

  /**
   * Workers pull from one shared queue; with the default concurrency of 1
   * each image is finished before the next one starts.
   */
  private async processConcurrently(
    candidates: Candidate[],
    onProgress?: ProgressCallback
  ): Promise<ConversionResult[]> {
    const pending = [...candidates];
    const results: ConversionResult[] = [];
    let started = 0;
    const workerCount = this.dryRun
      ? 1
      : Math.min(this.config.processing.concurrency, pending.length);

    const worker = async (): Promise<void> => {
      let candidate = pending.shift();
      while (candidate) {
        started++;
        onProgress?.(`[${started}/${candidates.length}] ${candidate.name}`);
        results.push(await this.processImage(candidate));
        candidate = pending.shift();
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  async processImage(candidate: Candidate): Promise<ConversionResult> {
    const startTime = Date.now();
    const result: ConversionResult = {
      sourcePath: candidate.path,
      outputPath: "",
      route: resolveRoute(candidate.extension),
      status: "failed",
      metadata: "skipped",
      processingTime: 0,
    };

    if (this.dryRun) {
      result.outputPath = await previewOutputPath(
        candidate.stem,
        this.config.conversion.outputDir,
        this.plannedOutputs
      );
      logger.info(`DRY RUN: Would convert ${candidate.path} -> ${result.outputPath}`, {
        operation: "conversion.dryrun",
        sourcePath: candidate.path,
        outputPath: result.outputPath,
        route: result.route,
      });
      result.status = "skipped";
      return result;
    }

    let converted = false;
    try {
      const job: ConversionJob = {
        candidate,
        route: result.route,
        outputPath: await reserveOutputPath(
          candidate.stem,
          this.config.conversion.outputDir
        ),
      };
      result.outputPath = job.outputPath;

      const outcome =
        job.route === "two-step"
          ? await this.convertTwoStep(job)
          : await this.convertDirect(job);

      if (!outcome.ok) {
        this.logConversionFailure(candidate, outcome.error);
        await this.discard(job.outputPath);
        result.error = outcome.error.message;
        return result;
      }
      converted = true;

      if (this.metadataAvailable) {
        result.metadata = await this.preserveMetadata(candidate.path, job.outputPath);
      }

      result.status = "success";
      return result;
    } catch (error) {
      const unexpected = new UnexpectedConversionError(candidate.path, error);
      logger.error(unexpected.message, {
        operation: "conversion.unexpectedError",
        sourcePath: candidate.path,
        error: unexpected.cause?.stack ?? unexpected.message,
      });
      if (result.outputPath && !converted) {
        await this.discard(result.outputPath);
      }
      result.status = "failed";
      result.error = unexpected.message;
      return result;
    } finally {
      result.processingTime = Date.now() - startTime;
    }
  }

  private async convertDirect(job: ConversionJob): Promise<ConversionOutcome> {
    logger.info(`Converting ${job.candidate.path} to WebP`, {
      operation: "conversion.direct",
      sourcePath: job.candidate.path,
      outputPath: job.outputPath,
    });

    const encoded = await this.encoder.encode(
      job.candidate.path,
      job.outputPath,
      this.config.conversion.quality
    );
    return encoded.ok ? { ok: true } : { ok: false, error: new EncodeError(encoded) };
  }

  private async convertTwoStep(job: ConversionJob): Promise<ConversionOutcome> {
    const intermediatePath = await reserveOutputPath(
      `${job.candidate.stem}_temp`,
      this.config.conversion.outputDir,
      INTERMEDIATE_EXTENSION
    );
    job.intermediatePath = intermediatePath;

    try {
      logger.info(`Converting HEIC to JPEG: ${job.candidate.path} -> ${intermediatePath}`, {
        operation: "conversion.decode",
        decoder: this.decoder.name,
      });
      const decoded = await this.decoder.decodeToJpeg(job.candidate.path, intermediatePath);
      if (!decoded.ok) {
        return { ok: false, error: new DecodeError(decoded) };
      }

      if (this.metadataAvailable) {
        const copied = await this.metadataTool.copyAllTags(
          job.candidate.path,
          intermediatePath
        );
        if (!copied.ok) {
          logger.warn(`Could not copy metadata from HEIC to JPEG: ${job.candidate.path}`, {
            operation: "conversion.intermediateMetadata",
            exitCode: copied.exitCode,
            stderr: copied.stderr,
          });
        }
      }

      logger.info(`Converting JPEG to WebP: ${intermediatePath} -> ${job.outputPath}`, {
        operation: "conversion.encode",
        encoder: this.encoder.name,
      });
      const encoded = await this.encoder.encode(
        intermediatePath,
        job.outputPath,
        this.config.conversion.quality
      );
      return encoded.ok ? { ok: true } : { ok: false, error: new EncodeError(encoded) };
    } finally {
      await this.discard(intermediatePath);
    }
  }

  private async preserveMetadata(
    sourcePath: string,
    outputPath: string
  ): Promise<ConversionResult["metadata"]> {
    const propagated = await this.propagator.propagate(sourcePath, outputPath);
    if (!propagated.ok) {
      logger.warn(`Warning: Failed to preserve metadata for ${sourcePath}`, {
        operation: "metadata.copyFailed",
        error: propagated.error.message,
        details: propagated.error.details(),
      });
      return "failed";
    }

    logger.info(`Metadata successfully preserved for ${sourcePath}`, {
      operation: "metadata.preserved",
      sourcePath,
      outputPath,
    });

    if (this.config.conversion.verifyMetadata) {
      const verification = await this.propagator.verify(sourcePath, outputPath);
      if (!verification.ok) {
        logger.warn(`Could not verify metadata for ${outputPath}: ${verification.error.message}`, {
          operation: "metadata.verifyFailed",
        });
      } else if (verification.missing.length > 0) {
        logger.warn(
          `Date tags missing on ${outputPath}: ${verification.missing.join(", ")}`,
          { operation: "metadata.verifyMissing", missing: verification.missing }
        );
      }
    }

    return "preserved";
  }

  private logConversionFailure(candidate: Candidate, error: ConversionError): void {
    logger.error(`Error converting ${candidate.path}: ${error.message}`, {
      operation: "conversion.failed",
      sourcePath: candidate.path,
      stage: error.name,
      exitCode: error.failure.exitCode,
    });
    for (const line of error.details()) {
      logger.error(line, { operation: "conversion.failed", sourcePath: candidate.path });
    }
  }

  private async discard(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      logger.warn(`Failed to remove ${filePath}`, {
        operation: "conversion.cleanupError",
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
