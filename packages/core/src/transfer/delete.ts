import { TransferError } from "../errors/catalog.js";
import { remoteSpec } from "../session/handshake.js";
import { errorMessage, filesFrom, invoke, type TransferContext } from "./context.js";
import { failureReason, type CommandResult } from "./runner.js";
import { withFileList } from "./scratch.js";

export interface DeleteOutcome {
  names: string[];
  /** What the utility reported when it did not succeed; null otherwise. */
  failure: string | null;
}

/**
 * Delete `names` (relative to `remoteRoot`) in one `--delete-items` call.
 * There is no existence check, and a failure the utility reports (such as
 * an already-deleted name) is logged and returned rather than raised.
 * Only an invocation that cannot run at all raises TransferError.
 */
export async function deleteFiles(
  ctx: TransferContext,
  names: readonly string[],
  remoteRoot: string,
): Promise<DeleteOutcome> {
  const targets = names.map((name) => name.replace(/^\/+/, ""));
  if (targets.length === 0) {
    return { names: [], failure: null };
  }

  let result: CommandResult;
  try {
    result = await withFileList(targets, (list) =>
      invoke(ctx, ["--delete-items", filesFrom(list), remoteSpec(ctx.session, remoteRoot)]),
    );
  } catch (err) {
    throw new TransferError(`Delete could not run: ${errorMessage(err)}`, {
      step: 1,
      stepName: "delete-items",
      cause: err,
    });
  }

  const failure = failureReason(result);
  if (failure !== null) {
    ctx.logger.warn(
      { names: targets, remoteRoot, failure, stdout: result.stdout, stderr: result.stderr },
      "Delete reported a failure",
    );
  } else {
    ctx.logger.debug({ names: targets, remoteRoot }, "Deleted files");
  }

  return { names: targets, failure };
}
