import * as dotenv from "dotenv";
import { LogFormat } from "../utils/logger";

// Load environment variables from .env file
dotenv.config();

export type EncoderKind = "cwebp" | "sharp";

export interface Config {
  conversion: {
    inputDir: string;
    outputDir: string;
    quality: number;
    encoder: EncoderKind;
    verifyMetadata: boolean;
  };
  tools: {
    exiftool: string;
    cwebp: string;
    sips: string;
  };
  processing: {
    concurrency: number;
  };
  logging: {
    level: string;
    format: LogFormat;
  };
}

export interface ConfigOverrides {
  inputDir?: string;
  outputDir?: string;
  quality?: number;
  encoder?: string;
  concurrency?: number;
}

export interface ValidationError {
  field: string;
  message: string;
}

export class ConfigurationError extends Error {
  public readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const message = `Configuration validation failed:\n${errors
      .map((e) => `- ${e.field}: ${e.message}`)
      .join("\n")}`;
    super(message);
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}

const ENCODERS: readonly EncoderKind[] = ["cwebp", "sharp"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "simple", "combined"];

function isEncoderKind(value: string): value is EncoderKind {
  return ENCODERS.some((encoder) => encoder === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Validates log level
 */
function validateLogLevel(level: string): boolean {
  const validLevels = ["error", "warn", "info", "debug"];
  return validLevels.includes(level.toLowerCase());
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}

/**
 * Validates configuration object
 */
export function validateConfig(config: Config): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!config.conversion.inputDir.trim()) {
    errors.push({
      field: "conversion.inputDir",
      message: "Input directory must not be empty",
    });
  }

  if (!config.conversion.outputDir.trim()) {
    errors.push({
      field: "conversion.outputDir",
      message: "Output directory must not be empty",
    });
  }

  if (
    !Number.isInteger(config.conversion.quality) ||
    config.conversion.quality < 1 ||
    config.conversion.quality > 100
  ) {
    errors.push({
      field: "conversion.quality",
      message: "WebP quality must be an integer between 1 and 100",
    });
  }

  if (!isEncoderKind(config.conversion.encoder)) {
    errors.push({
      field: "conversion.encoder",
      message: `Encoder must be one of: ${ENCODERS.join(", ")}`,
    });
  }

  for (const [name, executable] of Object.entries(config.tools)) {
    if (!executable.trim()) {
      errors.push({
        field: `tools.${name}`,
        message: "Tool path must not be empty",
      });
    }
  }

  if (
    !Number.isInteger(config.processing.concurrency) ||
    config.processing.concurrency < 1 ||
    config.processing.concurrency > 16
  ) {
    errors.push({
      field: "processing.concurrency",
      message: "Concurrency must be between 1 and 16",
    });
  }

  if (!validateLogLevel(config.logging.level)) {
    errors.push({
      field: "logging.level",
      message: "Log level must be one of: error, warn, info, debug",
    });
  }

  if (!isLogFormat(config.logging.format)) {
    errors.push({
      field: "logging.format",
      message: "Log format must be one of: json, simple, combined",
    });
  }

  return errors;
}

/**
 * Loads configuration from environment variables with defaults
 */
export function loadConfig(overrides: ConfigOverrides = {}): Config {
  const encoder = (overrides.encoder ?? process.env.WEBP_ENCODER ?? "cwebp")
    .trim()
    .toLowerCase();
  const logFormat = (process.env.LOG_FORMAT || "simple").toLowerCase();

  const config: Config = {
    conversion: {
      inputDir: overrides.inputDir ?? process.env.INPUT_DIR ?? ".",
      outputDir: overrides.outputDir ?? process.env.OUTPUT_DIR ?? "webp_output",
      quality:
        overrides.quality ?? parseInt(process.env.WEBP_QUALITY || "80", 10),
      // Unknown names are reported below, after the typed fallback.
      encoder: isEncoderKind(encoder) ? encoder : "cwebp",
      verifyMetadata: parseBoolean(process.env.VERIFY_METADATA, true),
    },
    tools: {
      exiftool: process.env.EXIFTOOL_PATH ?? "exiftool",
      cwebp: process.env.CWEBP_PATH ?? "cwebp",
      sips: process.env.SIPS_PATH ?? "sips",
    },
    processing: {
      concurrency:
        overrides.concurrency ?? parseInt(process.env.CONCURRENCY || "1", 10),
    },
    logging: {
      level: (process.env.LOG_LEVEL || "info").toLowerCase(),
      format: isLogFormat(logFormat) ? logFormat : "simple",
    },
  };

  const errors = validateConfig(config);
  if (!isEncoderKind(encoder)) {
    errors.push({
      field: "conversion.encoder",
      message: `Encoder must be one of: ${ENCODERS.join(", ")}`,
    });
  }
  if (!isLogFormat(logFormat)) {
    errors.push({
      field: "logging.format",
      message: "Log format must be one of: json, simple, combined",
    });
  }
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return config;
}

/**
 * Gets the current configuration instance
 */
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the configuration instance (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
