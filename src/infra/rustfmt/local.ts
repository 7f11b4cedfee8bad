import { spawn } from "node:child_process";

import type { Edition } from "../../cli/config/options";
import { LocalToolError } from "../../core/errors";
import type { PlayResult } from "../../core/report/types";

export type RunLocalRustfmtOptions = {
  rustfmtPath?: string;
};

/**
 * Pipes `code` through a local rustfmt. A non-zero exit is a reported
 * formatting failure (`success: false`); failing to start the binary at all
 * rejects with `LocalToolError`.
 */
export function runLocalRustfmt(
  code: string,
  edition: Edition,
  options: RunLocalRustfmtOptions = {}
): Promise<PlayResult> {
  const binary = options.rustfmtPath ?? "rustfmt";

  return new Promise<PlayResult>((resolve, reject) => {
    const child = spawn(binary, ["--edition", edition], {
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let stdinError: Error | null = null;
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      reject(
        new LocalToolError(
          "rustfmt",
          `Could not run ${binary}: ${error.message}`,
          { cause: error }
        )
      );
    });
    child.on("close", (exitCode) => {
      if (exitCode === 0 && stdinError !== null) {
        resolve({
          success: false,
          stdout,
          stderr: `${stderr}Could not write code to ${binary}: ${stdinError.message}\n`,
        });
        return;
      }
      resolve({ success: exitCode === 0, stdout, stderr });
    });

    // A child that exits early closes its stdin; a non-zero exit code
    // already reports that case.
    child.stdin.on("error", (error) => {
      stdinError = error;
    });
    child.stdin.end(code);
  });
}
