export interface ToolInvocation {
  command: string;
  args: string[];
}

export interface ToolSuccess {
  ok: true;
  invocation: ToolInvocation;
  stdout: string;
  stderr: string;
}

export interface ToolFailure {
  ok: false;
  invocation: ToolInvocation;
  /** null when the process never started or was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  reason?: string;
}

export type ToolResult = ToolSuccess | ToolFailure;

export function formatInvocation(invocation: ToolInvocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
