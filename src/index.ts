import { Config, ConfigOverrides, loadConfig } from "./config";
import { RunSummary } from "./models";
import {
  BatchConversionService,
  CwebpEncoder,
  ExifToolService,
  ImageDecoder,
  MetadataTool,
  ProcessRunner,
  ProgressCallback,
  ReadTagsResult,
  SharpImageProcessor,
  SipsDecoder,
  SpawnProcessRunner,
  WebPEncoder,
} from "./services";
import { configureLogger } from "./utils/logger";

export interface ApplicationOptions extends ConfigOverrides {
  dryRun?: boolean;
  verbose?: boolean;
  /** Replaces the child-process runner shared by every external tool. */
  runner?: ProcessRunner;
}

export interface HealthReport {
  exiftool: boolean;
  encoder: { name: string; available: boolean };
  decoder: { name: string; available: boolean };
}

export class Application {
  private readonly config: Config;
  private readonly metadataTool: MetadataTool;
  private readonly encoder: WebPEncoder;
  private readonly decoder: ImageDecoder;
  private readonly conversionService: BatchConversionService;

  constructor(options: ApplicationOptions = {}) {
    this.config = loadConfig(options);
    configureLogger({
      level: options.verbose ? "debug" : this.config.logging.level,
      format: this.config.logging.format,
    });

    const runner = options.runner ?? new SpawnProcessRunner();
    this.metadataTool = new ExifToolService(runner, this.config.tools.exiftool);
    this.decoder = new SipsDecoder(runner, this.config.tools.sips);
    this.encoder =
      this.config.conversion.encoder === "sharp"
        ? new SharpImageProcessor()
        : new CwebpEncoder(runner, this.config.tools.cwebp);

    this.conversionService = new BatchConversionService(
      {
        metadataTool: this.metadataTool,
        encoder: this.encoder,
        decoder: this.decoder,
      },
      this.config,
      options.dryRun || false
    );
  }

  async runConversion(onProgress?: ProgressCallback): Promise<RunSummary> {
    return this.conversionService.processAllImages(onProgress);
  }

  async checkHealth(): Promise<HealthReport> {
    const [exiftool, encoderAvailable, decoderAvailable] = await Promise.all([
      this.metadataTool.probe(),
      this.encoder.isAvailable(),
      this.decoder.isAvailable(),
    ]);

    return {
      exiftool,
      encoder: { name: this.encoder.name, available: encoderAvailable },
      decoder: { name: this.decoder.name, available: decoderAvailable },
    };
  }

  readMetadata(filePath: string): Promise<ReadTagsResult> {
    return this.metadataTool.readTags(filePath);
  }

  getConfig(): Config {
    return this.config;
  }
}

export { Config, ConfigurationError, loadConfig } from "./config";
export * from "./models";
export * from "./utils/error";
