/**
 * Process invocation for the transfer utility.
 *
 * idevsutil reports most failures in its text output rather than its exit
 * status, so both streams are always captured in full and returned even
 * when the process exits non-zero.
 */

import { spawn } from "node:child_process";
import type { Logger } from "pino";
import { findFailureMarker, parseStatusDocument } from "../parser/status.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Null when the process was terminated by a signal. */
  exitCode: number | null;
}

export interface CommandRunner {
  /**
   * Run `executable` with `args` (no shell) and wait for it to exit.
   * Rejects only when the process cannot be started at all.
   */
  run(executable: string, args: readonly string[]): Promise<CommandResult>;
}

export function createProcessRunner(): CommandRunner {
  return {
    run(executable, args) {
      return new Promise((resolve, reject) => {
        const proc = spawn(executable, [...args], {
          stdio: ["ignore", "pipe", "pipe"],
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        proc.on("error", (err) => {
          reject(new Error(`Failed to start ${executable}: ${err.message}`, { cause: err }));
        });

        proc.on("close", (code) => {
          resolve({
            stdout: Buffer.concat(stdout).toString("utf-8"),
            stderr: Buffer.concat(stderr).toString("utf-8"),
            exitCode: code,
          });
        });
      });
    },
  };
}

/** stdout followed by stderr, the text every reply parser works on. */
export function combinedOutput(result: CommandResult): string {
  return result.stdout + result.stderr;
}

/**
 * Reason an invocation counts as failed, or null when it succeeded: a
 * non-zero (or missing) exit status, or a status tag reporting an error.
 */
export function failureReason(result: CommandResult): string | null {
  if (result.exitCode !== 0) {
    return result.exitCode === null
      ? "terminated by signal"
      : `exited with code ${result.exitCode}`;
  }
  return findFailureMarker(parseStatusDocument(combinedOutput(result)));
}

export function isFailedResult(result: CommandResult): boolean {
  return failureReason(result) !== null;
}

/**
 * Run through `runner`, logging the invocation and its outcome at debug.
 * Argument values are paths and ids, never secret contents.
 */
export async function runLogged(
  runner: CommandRunner,
  logger: Logger,
  executable: string,
  args: readonly string[],
): Promise<CommandResult> {
  logger.debug({ executable, args }, "Invoking transfer utility");
  const result = await runner.run(executable, args);
  logger.debug(
    { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr },
    "Transfer utility finished",
  );
  return result;
}
