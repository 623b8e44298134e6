#!/usr/bin/env node
import { Command } from "commander";
import ora from "ora";
import { Application, ApplicationOptions } from ".";
import { ConfigurationError } from "./config";
import { ProcessRunner, formatSummary } from "./services";

interface CLIOptions {
  input?: string;
  output?: string;
  quality?: number;
  encoder?: string;
  concurrency?: number;
  dryRun?: boolean;
  strict?: boolean;
  verbose?: boolean;
  progress?: boolean;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return parsed;
}

function toApplicationOptions(options: CLIOptions, runner?: ProcessRunner): ApplicationOptions {
  return {
    runner,
    inputDir: options.input,
    outputDir: options.output,
    quality: options.quality,
    encoder: options.encoder,
    concurrency: options.concurrency,
    dryRun: options.dryRun || false,
    verbose: options.verbose || false,
  };
}

function reportError(spinner: ora.Ora | undefined, label: string, error: unknown): void {
  if (spinner) {
    spinner.fail(label);
  }
  if (error instanceof ConfigurationError) {
    console.error("Configuration Error:", error.message);
  } else {
    console.error(
      "Error details:",
      error instanceof Error ? error.message : String(error)
    );
  }
  process.exitCode = 1;
}

export class CLI {
  private program: Command;
  private readonly runner?: ProcessRunner;

  constructor(runner?: ProcessRunner) {
    this.runner = runner;
    this.program = new Command();
    this.program
      .name("webp-batch-converter")
      .description("Convert the images of a directory to WebP, keeping their metadata");
    this.setupCommands();
  }

  setupCommands() {
    this.program
      .command("convert", { isDefault: true })
      .description("Convert every supported image in the input directory to WebP")
      .option("-i, --input <dir>", "Directory to scan for images")
      .option("-o, --output <dir>", "Directory to write WebP files to")
      .option("-q, --quality <number>", "WebP quality (1-100)", parseInteger)
      .option("-e, --encoder <name>", "WebP encoder: cwebp or sharp")
      .option("-c, --concurrency <number>", "Images converted in parallel", parseInteger)
      .option("-d, --dry-run", "List planned conversions without writing files", false)
      .option("--strict", "Exit with code 1 when any conversion fails", false)
      .option("-p, --progress", "Show a progress spinner", false)
      .option("-v, --verbose", "Enable verbose logging", false)
      .action(async (options: CLIOptions) => {
        await this.runConversion(options);
      });

    this.program
      .command("health")
      .alias("probe")
      .description("Check which external tools are available")
      .option("-e, --encoder <name>", "WebP encoder to check: cwebp or sharp")
      .option("-v, --verbose", "Enable verbose logging", false)
      .action(async (options: CLIOptions) => {
        await this.runHealthCheck(options);
      });

    this.program
      .command("metadata <file>")
      .description("Print every metadata tag of a file as JSON")
      .action(async (file: string) => {
        await this.showMetadata(file);
      });
  }

  private async runConversion(options: CLIOptions): Promise<void> {
    const setup = ora("📋 Loading configuration...").start();
    let app: Application;
    try {
      app = new Application(toApplicationOptions(options, this.runner));
      const config = app.getConfig();
      setup.succeed(
        `Converting ${config.conversion.inputDir} → ${config.conversion.outputDir} ` +
          `(quality ${config.conversion.quality}, ${config.conversion.encoder})`
      );
    } catch (error) {
      reportError(setup, "Configuration failed", error);
      return;
    }

    const spinner = options.progress ? ora("🖼️  Processing images...").start() : undefined;
    try {
      const summary = await app.runConversion((msg: string) => {
        if (spinner) {
          spinner.text = `🖼️  ${msg}`;
        }
      });

      if (spinner) {
        spinner.succeed("Image conversion process completed");
      }
      console.log("");
      for (const line of formatSummary(summary)) {
        console.log(line);
      }

      if (options.strict && summary.failed > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      reportError(spinner, "Conversion failed", error);
    }
  }

  private async runHealthCheck(options: CLIOptions): Promise<void> {
    const spinner = ora("🏥 Running health check...").start();
    try {
      const app = new Application(toApplicationOptions(options, this.runner));
      const config = app.getConfig();

      spinner.text = "🔍 Probing external tools...";
      const health = await app.checkHealth();
      spinner.succeed("Health check completed");

      const mark = (available: boolean) => (available ? "✅" : "❌");
      console.log("\nSystem Status:");
      console.log(`   ${mark(health.exiftool)} exiftool (${config.tools.exiftool})`);
      console.log(`   ${mark(health.encoder.available)} encoder: ${health.encoder.name}`);
      console.log(`   ${mark(health.decoder.available)} HEIC decoder: ${health.decoder.name}`);
      console.log(`   📁 Input directory: ${config.conversion.inputDir}`);
      console.log(`   📁 Output directory: ${config.conversion.outputDir}`);
      console.log(`   🎨 WebP quality: ${config.conversion.quality}`);
      console.log(`   🧵 Concurrency: ${config.processing.concurrency}`);

      if (!health.encoder.available) {
        process.exitCode = 1;
      }
    } catch (error) {
      reportError(spinner, "Health check failed", error);
    }
  }

  private async showMetadata(file: string): Promise<void> {
    try {
      const app = new Application({ runner: this.runner });
      const result = await app.readMetadata(file);
      if (!result.ok) {
        console.error(
          `❌ Could not read metadata: ${result.failure.reason ?? result.failure.stderr.trim()}`
        );
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(result.tags, null, 2));
    } catch (error) {
      reportError(undefined, "Metadata read failed", error);
    }
  }

  async run(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new CLI();
  cli.run().catch((error) => {
    console.error("CLI Error:", error);
    process.exit(1);
  });
}
