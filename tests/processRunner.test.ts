import path from "path";
import { SpawnProcessRunner } from "../src/services";

describe("SpawnProcessRunner", () => {
  const runner = new SpawnProcessRunner();

  it("captures the output of a successful command", async () => {
    const result = await runner.run(process.execPath, ["-e", "process.stdout.write('12.76')"]);

    expect(result).toMatchObject({ ok: true, stdout: "12.76", stderr: "" });
  });

  it("reports a non-zero exit with its code and stderr", async () => {
    const result = await runner.run(process.execPath, [
      "-e",
      "process.stderr.write('bad input'); process.exit(3)",
    ]);

    expect(result).toMatchObject({ ok: false, exitCode: 3, stderr: "bad input" });
    expect(result.ok ? undefined : result.reason).toBeUndefined();
  });

  it("reports a missing executable without rejecting", async () => {
    const missing = path.join(__dirname, "no-such-tool");

    const result = await runner.run(missing, ["-ver"]);

    expect(result).toMatchObject({
      ok: false,
      exitCode: null,
      reason: `Executable not found: "${missing}"`,
      invocation: { command: missing, args: ["-ver"] },
    });
  });

  it("names the signal that terminated the process", async () => {
    const result = await runner.run(process.execPath, [
      "-e",
      "process.kill(process.pid, 'SIGTERM')",
    ]);

    expect(result).toMatchObject({
      ok: false,
      exitCode: null,
      reason: `${process.execPath} was terminated by SIGTERM`,
    });
  });
});
