export { ProcessRunner, SpawnProcessRunner } from "./processRunner";
export { MetadataTool, ExifToolService, ReadTagsResult } from "./exifTool";
export { ImageDecoder, SipsDecoder } from "./heicDecoder";
export { WebPEncoder, CwebpEncoder, SharpImageProcessor } from "./imageProcess";
export { discover, matchExtension } from "./discovery";
export { reserveOutputPath, previewOutputPath } from "./outputNamer";
export { MetadataPropagator, PropagationResult, VerificationResult } from "./metadataPropagator";
export { createSummary, recordOutcome, formatSummary } from "./runSummary";
export {
  ConversionService,
  BatchConversionService,
  ConversionDependencies,
  ProgressCallback,
  resolveRoute,
} from "./conversionService";
