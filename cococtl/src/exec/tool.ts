import { execFile } from "node:child_process";
import { ToolError } from "../errors.js";

export type ToolOutput = { stdout: string; stderr: string };

export type ToolOptions = {
  cwd?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
};

/**
 * Runs an external binary without a shell. Rejects with ToolError on a
 * non-zero exit, carrying whatever the tool printed.
 */
export type ToolRunner = (command: string, args: string[], opts?: ToolOptions) => Promise<ToolOutput>;

export const runTool: ToolRunner = (command, args, opts = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        cwd: opts.cwd,
        signal: opts.signal,
        timeout: opts.timeoutMs ?? 0,
        maxBuffer: 50 * 1024 * 1024,
        shell: false,
        encoding: "utf8",
      },
      (err, stdout, stderr) => {
        if (err) {
          const exitCode = typeof err.code === "number" ? err.code : null;
          reject(new ToolError(`${command} ${args.join(" ")} failed: ${err.message}`, command, args, exitCode, stdout, stderr));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });

/** Last `n` non-empty lines of a tool's output. */
export function tailLines(text: string, n: number): string {
  const lines = text.split("\n").filter((l) => l.trim().length > 0);
  return lines.slice(-n).join("\n");
}
