import { spawn } from "node:child_process";
import { access } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import type { ProcessResult } from "../types.js";

// Exit code reported when the child dies from a signal instead of exiting.
const SIGNALLED_EXIT_CODE = 1;

/**
 * Runs `executablePath [...args] --data <inputPath>` and resolves with its
 * exit code and stdout+stderr merged in arrival order. A non-zero exit is
 * a normal result; only a missing input or a failed spawn rejects.
 */
export async function runProcess(
  executablePath: string,
  args: readonly string[],
  inputPath: string,
): Promise<ProcessResult> {
  try {
    await access(inputPath, fsConstants.R_OK);
  } catch {
    throw new Error(`Input file not found or unreadable: ${inputPath}`);
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(executablePath, [...args, "--data", inputPath], {
      stdio: ["ignore", "pipe", "pipe"],
    });
    const chunks: Buffer[] = [];
    const collect = (chunk: Buffer): void => {
      chunks.push(chunk);
    };
    child.stdout.on("data", collect);
    child.stderr.on("data", collect);

    child.once("error", (error) => {
      reject(new Error(`Failed to start ${executablePath}: ${error.message}`));
    });
    child.once("close", (code) => {
      resolve({
        exitCode: code ?? SIGNALLED_EXIT_CODE,
        output: Buffer.concat(chunks).toString("utf8"),
      });
    });
  });
}
