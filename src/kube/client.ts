/**
 * Process runner for the `oc` and `rsync` CLIs
 */

import { spawn } from "node:child_process";
import { createWriteStream } from "node:fs";
import type { CommandResult, RunOptions } from "../types";
import { logger } from "../utils/logger";

/**
 * Run a command and return the result. Non-zero exits are reported through
 * the result; only a failure to start the process rejects.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ["pipe", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let fileError: Error | null = null;
    let fileClosed: Promise<void> = Promise.resolve();

    if (options.stdoutFile) {
      const out = createWriteStream(options.stdoutFile);
      fileClosed = new Promise((done) => {
        out.on("close", () => done());
        out.on("error", (err) => {
          fileError = err;
          done();
        });
      });
      child.stdout.pipe(out);
    } else {
      child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    }
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    child.on("error", reject);
    child.on("close", (code) => {
      fileClosed
        .then(() => {
          if (fileError) {
            reject(fileError);
            return;
          }
          const exitCode = code ?? 1;
          resolve({
            success: exitCode === 0,
            stdout: Buffer.concat(stdoutChunks).toString().trim(),
            stderr: Buffer.concat(stderrChunks).toString().trim(),
            exitCode,
          });
        })
        .catch(reject);
    });

    child.stdin.on("error", (err) => {
      logger.debug(`stdin of ${command} closed early: ${err.message}`);
    });
    child.stdin.end(options.input ?? "");
  });
}

/**
 * Check whether a binary is installed by running it with a version flag
 */
export async function commandExists(
  command: string,
  versionArgs: string[] = ["--version"],
): Promise<boolean> {
  try {
    const result = await runCommand(command, versionArgs);
    return result.success;
  } catch {
    return false;
  }
}

/**
 * Check if the OpenShift CLI is available
 */
export function isOcAvailable(): Promise<boolean> {
  return commandExists("oc", ["version", "--client"]);
}

/**
 * Check if rsync is available for incremental transfers
 */
export function isRsyncAvailable(): Promise<boolean> {
  return commandExists("rsync");
}
