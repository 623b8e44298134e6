import { spawn } from "child_process";
import { ToolResult } from "../models";

export interface ProcessRunner {
  run(command: string, args: string[]): Promise<ToolResult>;
}

/**
 * Runs an external tool to completion and reports the outcome as a value.
 * Never rejects: a missing executable or a non-zero exit becomes
 * `{ ok: false }` with whatever output was captured. No timeout is applied.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[]): Promise<ToolResult> {
    const invocation = { command, args };

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let settled = false;

      const finish = (result: ToolResult) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      const child = spawn(command, args);

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (error: NodeJS.ErrnoException) => {
        finish({
          ok: false,
          invocation,
          exitCode: null,
          stdout,
          stderr,
          reason:
            error.code === "ENOENT"
              ? `Executable not found: "${command}"`
              : error.message,
        });
      });

      child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          finish({ ok: true, invocation, stdout, stderr });
          return;
        }
        finish({
          ok: false,
          invocation,
          exitCode: code,
          stdout,
          stderr,
          reason: signal ? `${command} was terminated by ${signal}` : undefined,
        });
      });
    });
  }
}
