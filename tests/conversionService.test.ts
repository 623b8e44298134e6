import fs from "fs/promises";
import path from "path";
import {
  BatchConversionService,
  CwebpEncoder,
  ExifToolService,
  SipsDecoder,
  resolveRoute,
} from "../src/services";
import { Config } from "../src/config";
import logger from "../src/utils/logger";
import {
  FakeProcessRunner,
  failure,
  fakeCwebp,
  fakeExiftool,
  fakeSips,
  makeTempDir,
  testConfig,
  touch,
} from "./helpers/fakeRunner";

function createService(runner: FakeProcessRunner, config: Config, dryRun = false) {
  return new BatchConversionService(
    {
      metadataTool: new ExifToolService(runner),
      encoder: new CwebpEncoder(runner),
      decoder: new SipsDecoder(runner),
    },
    config,
    dryRun
  );
}

async function listOutput(config: Config): Promise<string[]> {
  return (await fs.readdir(config.conversion.outputDir)).sort();
}

describe("resolveRoute", () => {
  it("sends HEIC files of either case through the two-step path", () => {
    expect(resolveRoute(".heic")).toBe("two-step");
    expect(resolveRoute(".HEIC")).toBe("two-step");
    expect(resolveRoute(".jpg")).toBe("direct");
    expect(resolveRoute(".PNG")).toBe("direct");
  });
});

describe("BatchConversionService", () => {
  let dir: string;
  let config: Config;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = testConfig(dir);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("converts a single png into the output directory", async () => {
    await touch(dir, "x.png");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(await listOutput(config)).toEqual(["x.webp"]);
    expect(summary.totalImages).toBe(1);
    expect(summary.successful).toBe(1);
    expect(summary.failed).toBe(0);
    expect(runner.callsTo("cwebp")).toEqual([
      [
        "-q",
        "80",
        "-metadata",
        "all",
        path.join(dir, "x.png"),
        "-o",
        path.join(config.conversion.outputDir, "x.webp"),
      ],
    ]);
  });

  it("does not overwrite an existing output file", async () => {
    await touch(dir, "x.png");
    await fs.mkdir(config.conversion.outputDir);
    await fs.writeFile(path.join(config.conversion.outputDir, "x.webp"), "earlier run");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(summary.successful).toBe(1);
    expect(await listOutput(config)).toEqual(["x.webp", "x_1.webp"]);
    const previous = await fs.readFile(path.join(config.conversion.outputDir, "x.webp"), "utf8");
    expect(previous).toBe("earlier run");
  });

  it("gives sources that share a stem distinct outputs", async () => {
    await touch(dir, "photo.jpg", "photo.png");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(summary.successful).toBe(2);
    expect(await listOutput(config)).toEqual(["photo.webp", "photo_1.webp"]);
  });

  it("keeps outputs unique when jobs run concurrently", async () => {
    await touch(dir, "a.jpg", "a.png", "a.jpeg");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());
    const concurrent: Config = { ...config, processing: { concurrency: 3 } };

    const summary = await createService(runner, concurrent).processAllImages();

    expect(summary.successful).toBe(3);
    expect(await listOutput(concurrent)).toEqual(["a.webp", "a_1.webp", "a_2.webp"]);
  });

  it("removes the intermediate JPEG when compression of a HEIC fails", async () => {
    await touch(dir, "y.heic");
    const errorSpy = jest.spyOn(logger, "error");
    const runner = new FakeProcessRunner()
      .on("sips", fakeSips())
      .on("cwebp", (args) => failure("cwebp", args, 1, "Unsupported color conversion"));

    const summary = await createService(runner, config).processAllImages();

    const intermediate = path.join(config.conversion.outputDir, "y_temp.jpg");
    const output = path.join(config.conversion.outputDir, "y.webp");
    expect(summary.successful).toBe(0);
    expect(summary.failed).toBe(1);
    expect(await listOutput(config)).toEqual([]);
    expect(runner.callsTo("sips")).toEqual([
      ["-s", "format", "jpeg", path.join(dir, "y.heic"), "--out", intermediate],
    ]);
    const logged = errorSpy.mock.calls.map((call) => String(call[0]));
    expect(logged).toContain(
      `Command that failed: cwebp -q 80 -metadata all ${intermediate} -o ${output}`
    );
    expect(logged).toContain("Return code: 1");
    expect(logged).toContain("Error: Unsupported color conversion");
  });

  it("skips compression when the HEIC decode fails", async () => {
    await touch(dir, "y.HEIC");
    const runner = new FakeProcessRunner()
      .on("sips", (args) => failure("sips", args, 13, "Error: cannot read file"))
      .on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(summary.failed).toBe(1);
    expect(summary.errors).toEqual([
      `${path.join(dir, "y.HEIC")}: Image conversion failed during decode: sips exited with code 13`,
    ]);
    expect(runner.callsTo("cwebp")).toEqual([]);
    expect(await listOutput(config)).toEqual([]);
  });

  it("converts HEIC through the intermediate JPEG and cleans up", async () => {
    await touch(dir, "z.heic");
    const runner = new FakeProcessRunner()
      .on("exiftool", fakeExiftool())
      .on("sips", fakeSips())
      .on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    const intermediate = path.join(config.conversion.outputDir, "z_temp.jpg");
    expect(summary.successful).toBe(1);
    expect(summary.metadataPreserved).toBe(1);
    expect(await listOutput(config)).toEqual(["z.webp"]);
    expect(runner.callsTo("cwebp")[0]).toContain(intermediate);
    expect(runner.callsTo("exiftool")).toContainEqual([
      "-TagsFromFile",
      path.join(dir, "z.heic"),
      "-all:all",
      "-overwrite_original",
      intermediate,
    ]);
  });

  it("converts without metadata when exiftool is missing and warns once", async () => {
    await touch(dir, "z.jpg", "w.png");
    const warnSpy = jest.spyOn(logger, "warn");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(summary.successful).toBe(2);
    expect(summary.metadataPreserved).toBe(0);
    expect(summary.metadataAvailable).toBe(false);
    expect(runner.callsTo("exiftool")).toEqual([["-ver"]]);
    const warnings = warnSpy.mock.calls.filter((call) =>
      String(call[0]).includes("exiftool not found")
    );
    expect(warnings).toHaveLength(1);
  });

  it("copies all tags and then the date tags onto each output", async () => {
    await touch(dir, "z.jpg");
    const runner = new FakeProcessRunner()
      .on("exiftool", fakeExiftool({ CreateDate: "2021:06:01 10:00:00" }))
      .on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    const source = path.join(dir, "z.jpg");
    const output = path.join(config.conversion.outputDir, "z.webp");
    expect(summary.metadataPreserved).toBe(1);
    expect(runner.callsTo("exiftool")).toEqual([
      ["-ver"],
      ["-TagsFromFile", source, "-all:all", "-overwrite_original", output],
      [
        "-TagsFromFile",
        source,
        "-CreateDate",
        "-ModifyDate",
        "-DateTimeOriginal",
        "-FileCreateDate",
        "-FileModifyDate",
        "-overwrite_original",
        output,
      ],
      ["-j", source],
      ["-j", output],
    ]);
  });

  it("counts the conversion but not the metadata when the date pass fails", async () => {
    await touch(dir, "z.jpg");
    const exiftool = fakeExiftool();
    const runner = new FakeProcessRunner()
      .on("exiftool", (args) =>
        args.includes("-CreateDate") ? failure("exiftool", args, 1, "Warning: no writable tags") : exiftool(args)
      )
      .on("cwebp", fakeCwebp());

    const summary = await createService(runner, config).processAllImages();

    expect(summary.successful).toBe(1);
    expect(summary.metadataPreserved).toBe(0);
    expect(await listOutput(config)).toEqual(["z.webp"]);
  });

  it("skips verification when it is disabled", async () => {
    await touch(dir, "z.jpg");
    const runner = new FakeProcessRunner()
      .on("exiftool", fakeExiftool())
      .on("cwebp", fakeCwebp());
    const quiet = testConfig(dir, { verifyMetadata: false });

    await createService(runner, quiet).processAllImages();

    expect(runner.callsTo("exiftool").filter((args) => args[0] === "-j")).toEqual([]);
  });

  it("isolates an unexpected failure to its own job", async () => {
    await touch(dir, "bad.jpg", "good.png");
    const cwebp = fakeCwebp();
    const runner = new FakeProcessRunner().on("cwebp", (args) => {
      if (args.includes(path.join(dir, "bad.jpg"))) {
        throw new Error("spawn EACCES");
      }
      return cwebp(args);
    });

    const summary = await createService(runner, config).processAllImages();

    expect(summary.successful).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.errors).toEqual([
      `${path.join(dir, "bad.jpg")}: Unexpected error converting ${path.join(dir, "bad.jpg")}: spawn EACCES`,
    ]);
    expect(await listOutput(config)).toEqual(["good.webp"]);
  });

  it("plans outputs in a dry run without touching the disk", async () => {
    await touch(dir, "x.png", "x.jpg");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    const summary = await createService(runner, config, true).processAllImages();

    expect(summary.skipped).toBe(2);
    expect(summary.successful).toBe(0);
    expect(runner.callsTo("cwebp")).toEqual([]);
    await expect(fs.access(config.conversion.outputDir)).rejects.toThrow();
  });

  it("fails the run when the output directory cannot be created", async () => {
    await touch(dir, "blocker", "x.png");
    const blocked = testConfig(dir, { outputDir: path.join(dir, "blocker", "out") });
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());

    await expect(createService(runner, blocked).processAllImages()).rejects.toThrow();
    expect(runner.calls).toEqual([]);
  });

  it("reports progress for each image", async () => {
    await touch(dir, "x.png");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());
    const progress: string[] = [];

    await createService(runner, config).processAllImages((msg) => progress.push(msg));

    expect(progress).toEqual(["[1/1] x.png"]);
  });

  it("numbers progress uniquely when jobs run concurrently", async () => {
    await touch(dir, "a.png", "b.png", "c.png");
    const runner = new FakeProcessRunner().on("cwebp", fakeCwebp());
    const concurrent: Config = { ...config, processing: { concurrency: 3 } };
    const progress: string[] = [];

    await createService(runner, concurrent).processAllImages((msg) => progress.push(msg));

    expect(progress.map((msg) => msg.split(" ")[0])).toEqual(["[1/3]", "[2/3]", "[3/3]"]);
  });
});
