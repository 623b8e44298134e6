export const SUPPORTED_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".heic",
  ".HEIC",
  ".JPG",
  ".JPEG",
  ".PNG",
] as const;

export const WEBP_EXTENSION = ".webp";
export const INTERMEDIATE_EXTENSION = ".jpg";

// Compared case-insensitively, unlike discovery.
export const TWO_STEP_EXTENSION = ".heic";

export const DATE_TAGS = [
  "CreateDate",
  "ModifyDate",
  "DateTimeOriginal",
  "FileCreateDate",
  "FileModifyDate",
] as const;
export type DateTag = (typeof DATE_TAGS)[number];

export interface Candidate {
  path: string;
  name: string;
  extension: string;
  stem: string;
}

export type ConversionRoute = "direct" | "two-step";

export interface ConversionJob {
  candidate: Candidate;
  outputPath: string;
  route: ConversionRoute;
  intermediatePath?: string;
}

export type MetadataTags = Record<string, unknown>;

export interface ConversionResult {
  sourcePath: string;
  outputPath: string;
  route: ConversionRoute;
  status: "success" | "failed" | "skipped";
  metadata: "preserved" | "failed" | "skipped";
  processingTime: number;
  error?: string;
}

export interface RunSummary {
  totalImages: number;
  successful: number;
  failed: number;
  skipped: number;
  metadataPreserved: number;
  metadataAvailable: boolean;
  processingDuration: number;
  errors: string[];
}
