import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary with an argument list (no shell) and resolves with its
 * output. Rejects when the process cannot start or exits non-zero.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    maxBuffer: 16 * 1024 * 1024, // ffmpeg can be chatty on stderr
  });
  return { stdout, stderr };
};

/**
 * Best-effort message for a failed command, preferring the tool's own stderr
 */
export function describeCommandError(error: unknown): string {
  if (typeof error === "object" && error !== null) {
    if ("stderr" in error && typeof error.stderr === "string" && error.stderr.trim()) {
      const lines = error.stderr.trim().split("\n");
      return lines[lines.length - 1].trim();
    }
    if ("code" in error && error.code === "ENOENT") {
      return "binary not found in PATH";
    }
    if (error instanceof Error && error.message) {
      return error.message;
    }
  }
  return "Unknown error";
}
