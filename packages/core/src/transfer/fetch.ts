import { resolve, sep } from "node:path";
import { joinRemote } from "../config/remote.js";
import { NotFoundError, TransferError } from "../errors/catalog.js";
import { remoteSpec } from "../session/handshake.js";
import { errorMessage, filesFrom, invoke, type TransferContext } from "./context.js";
import { failureReason, type CommandResult } from "./runner.js";
import { moveFile, pathExists, withFileList, withScratchDir } from "./scratch.js";

export interface GetFileOptions {
  remoteName: string;
  remoteRoot: string;
  /** Local path the file ends up at. */
  destination: string;
}

/**
 * Download one file. The utility recreates the whole remote path under its
 * target directory, so the download goes into a scratch directory and the
 * file is moved out of it; the scratch directory is removed either way.
 */
export async function getFile(
  ctx: TransferContext,
  options: GetFileOptions,
): Promise<void> {
  const remotePath = joinRemote(options.remoteRoot, options.remoteName);
  if (remotePath === "" || remotePath.split("/").some((part) => part === "." || part === "..")) {
    throw new TransferError(`Remote path must not contain "." or ".." segments: ${remotePath}`, {
      step: 1,
      stepName: "download",
    });
  }

  await withScratchDir(async (scratchDir) => {
    let result: CommandResult;
    try {
      result = await withFileList([remotePath], (list) =>
        invoke(ctx, [filesFrom(list), remoteSpec(ctx.session, ""), scratchDir]),
      );
    } catch (err) {
      throw new TransferError(`Download of ${remotePath} could not run: ${errorMessage(err)}`, {
        step: 1,
        stepName: "download",
        cause: err,
      });
    }

    const reason = failureReason(result);
    if (reason !== null) {
      throw new TransferError(`Download of ${remotePath} failed: ${reason}`, {
        step: 1,
        stepName: "download",
        output: result,
      });
    }

    const downloaded = resolve(scratchDir, remotePath);
    if (!downloaded.startsWith(scratchDir + sep) || !(await pathExists(downloaded))) {
      throw new NotFoundError(remotePath, { expectedAt: downloaded });
    }

    try {
      await moveFile(downloaded, options.destination);
    } catch (err) {
      throw new TransferError(
        `Could not move ${remotePath} to ${options.destination}: ${errorMessage(err)}`,
        { step: 2, stepName: "move", completed: ["download"], cause: err },
      );
    }
    ctx.logger.debug({ remotePath, destination: options.destination }, "Downloaded file");
  }, "evs-get-");
}
