import { ConversionResult, RunSummary } from "../models";

export function createSummary(totalImages: number, metadataAvailable: boolean): RunSummary {
  return {
    totalImages,
    successful: 0,
    failed: 0,
    skipped: 0,
    metadataPreserved: 0,
    metadataAvailable,
    processingDuration: 0,
    errors: [],
  };
}

export function recordOutcome(summary: RunSummary, result: ConversionResult): RunSummary {
  switch (result.status) {
    case "success":
      return {
        ...summary,
        successful: summary.successful + 1,
        metadataPreserved:
          summary.metadataPreserved + (result.metadata === "preserved" ? 1 : 0),
      };
    case "skipped":
      return { ...summary, skipped: summary.skipped + 1 };
    case "failed":
      return {
        ...summary,
        failed: summary.failed + 1,
        errors: [...summary.errors, `${result.sourcePath}: ${result.error ?? "Unknown error"}`],
      };
  }
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    "Conversion Summary:",
    `Successfully converted ${summary.successful} out of ${summary.totalImages} images to WebP format`,
  ];
  if (summary.metadataAvailable) {
    lines.push(
      `Metadata preserved for ${summary.metadataPreserved} out of ${summary.successful} images`
    );
  }
  if (summary.skipped > 0) {
    lines.push(`Dry run: ${summary.skipped} images would be converted`);
  }
  if (summary.errors.length > 0) {
    lines.push("Failed conversions:", ...summary.errors.map((error) => `  ${error}`));
  }
  return lines;
}
