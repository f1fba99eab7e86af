/**
 * Upload saga.
 *
 * idevsutil uploads a file under its full local path, and offers neither
 * "upload to path X" nor a stand-alone mkdir. A file therefore reaches its
 * intended remote path in six steps:
 *
 * 1. stage-local     rename the source, in place, to the remote file name
 * 2. stage-upload    upload it under a throwaway staging prefix
 * 3. create-dir      upload an empty file-list to the target directory,
 *                    which creates the directory as a side effect
 * 4. copy-within     server-side copy from the staged path to the target
 *                    directory (copy-within does not create directories)
 * 5. delete-staging  delete the staging prefix (moves it to trash)
 * 6. purge-trash     purge the staging prefix from trash
 *
 * Steps 2-6 are one invocation each and run strictly in order. Nothing is
 * rolled back on failure: the error names the step and the steps that did
 * complete, and staging leftovers stay on the remote.
 */

import { randomBytes } from "node:crypto";
import { realpath, rename } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { joinRemote } from "../config/remote.js";
import { TransferError } from "../errors/catalog.js";
import { remoteSpec } from "../session/handshake.js";
import { errorMessage, filesFrom, invoke, type TransferContext } from "./context.js";
import { failureReason, type CommandResult } from "./runner.js";
import { pathExists, withFileList } from "./scratch.js";

export const SAGA_STEPS = [
  "stage-local",
  "stage-upload",
  "create-dir",
  "copy-within",
  "delete-staging",
  "purge-trash",
] as const;

export type SagaStepName = (typeof SAGA_STEPS)[number];

export interface SagaStepResult {
  /** 1-based position in SAGA_STEPS. */
  step: number;
  name: SagaStepName;
  /** Captured output; absent for the local stage-local step. */
  result?: CommandResult;
}

export interface UploadReport {
  remoteName: string;
  /** Final remote path, relative to `home/`. */
  remotePath: string;
  stagingPrefix: string;
  steps: SagaStepResult[];
}

export interface PutFileOptions {
  sourcePath: string;
  remoteName: string;
  remoteRoot: string;
  /** Derives the remote staging directory from the source's local directory. */
  stagingPrefix?: (localDir: string) => string;
}

/**
 * Staging directory name: a slice of the local directory path (temp
 * directories carry a random component there) plus random hex.
 */
export function deriveStagingPrefix(localDir: string): string {
  const token = localDir.slice(15, 23).replace(/[^A-Za-z0-9_-]/g, "");
  return `evs-${token}${randomBytes(4).toString("hex")}`;
}

function stepNumber(name: SagaStepName): number {
  return SAGA_STEPS.indexOf(name) + 1;
}

export async function putFile(
  ctx: TransferContext,
  options: PutFileOptions,
): Promise<UploadReport> {
  const { remoteName, remoteRoot } = options;
  const steps: SagaStepResult[] = [];
  const completed = (): string[] => steps.map((s) => s.name);
  const log = ctx.logger.child({ remoteName });

  async function runStep(
    name: SagaStepName,
    lines: readonly string[],
    args: (listPath: string) => string[],
  ): Promise<void> {
    const step = stepNumber(name);
    let result: CommandResult;
    try {
      result = await withFileList(lines, (listPath) => invoke(ctx, args(listPath)));
    } catch (err) {
      throw new TransferError(
        `Upload step ${step} (${name}) could not run: ${errorMessage(err)}`,
        { step, stepName: name, completed: completed(), cause: err },
      );
    }

    const reason = failureReason(result);
    if (reason !== null) {
      throw new TransferError(`Upload step ${step} (${name}) failed: ${reason}`, {
        step,
        stepName: name,
        output: result,
        completed: completed(),
      });
    }

    steps.push({ step, name, result });
    log.debug({ step, name }, "Upload step complete");
  }

  // 1. stage-local
  if (remoteName === "" || remoteName === "." || remoteName === ".." || remoteName.includes("/")) {
    throw new TransferError(`Remote name must be a plain file name: ${remoteName}`, {
      step: stepNumber("stage-local"),
      stepName: "stage-local",
    });
  }

  let sourceReal: string;
  try {
    sourceReal = await realpath(options.sourcePath);
  } catch (err) {
    throw new TransferError(`Source file is not readable: ${errorMessage(err)}`, {
      step: stepNumber("stage-local"),
      stepName: "stage-local",
      cause: err,
    });
  }

  const localDir = dirname(sourceReal);
  const stagedPath = join(localDir, remoteName);
  const renamed = basename(sourceReal) !== remoteName;
  if (renamed) {
    if (await pathExists(stagedPath)) {
      throw new TransferError(`Local staging path already exists: ${stagedPath}`, {
        step: stepNumber("stage-local"),
        stepName: "stage-local",
      });
    }
    try {
      await rename(sourceReal, stagedPath);
    } catch (err) {
      throw new TransferError(`Could not stage source locally: ${errorMessage(err)}`, {
        step: stepNumber("stage-local"),
        stepName: "stage-local",
        cause: err,
      });
    }
  }
  const stagingPrefix = (options.stagingPrefix ?? deriveStagingPrefix)(localDir);
  steps.push({ step: stepNumber("stage-local"), name: "stage-local" });
  log.debug({ stagedPath, stagingPrefix }, "Staged source locally");

  const restoreSource = async (): Promise<void> => {
    if (renamed) await rename(stagedPath, sourceReal);
  };

  // 2. stage-upload: lands at <stagingPrefix><stagedPath> on the remote
  try {
    await runStep("stage-upload", [stagedPath], (list) => [
      filesFrom(list),
      "/",
      remoteSpec(ctx.session, stagingPrefix),
    ]);
  } catch (err) {
    await restoreSource().catch((restoreErr: unknown) => {
      log.error({ err: restoreErr, stagedPath }, "Could not restore staged source file");
    });
    throw err;
  }
  try {
    await restoreSource();
  } catch (err) {
    throw new TransferError(`Could not restore source after staging: ${errorMessage(err)}`, {
      step: stepNumber("stage-upload"),
      stepName: "stage-upload",
      completed: completed(),
      cause: err,
    });
  }

  // 3. create-dir
  await runStep("create-dir", [], (list) => [
    filesFrom(list),
    "/",
    remoteSpec(ctx.session, remoteRoot),
  ]);

  // 4. copy-within
  await runStep("copy-within", [`/${stagingPrefix}${stagedPath}`], (list) => [
    "--copy-within",
    filesFrom(list),
    remoteSpec(ctx.session, remoteRoot),
  ]);

  // 5. delete-staging, 6. purge-trash
  const stagingRoot = [`/${stagingPrefix}`];
  await runStep("delete-staging", stagingRoot, (list) => [
    "--delete-items",
    filesFrom(list),
    remoteSpec(ctx.session, ""),
  ]);
  await runStep("purge-trash", stagingRoot, (list) => [
    "--deletefrom-trash",
    filesFrom(list),
    remoteSpec(ctx.session, ""),
  ]);

  const remotePath = joinRemote(remoteRoot, remoteName);
  log.info({ remotePath, stagingPrefix }, "Uploaded file");

  return { remoteName, remotePath, stagingPrefix, steps };
}
