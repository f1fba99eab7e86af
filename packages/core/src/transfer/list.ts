import { parseListing, type RemoteEntry } from "../parser/listing.js";
import { remoteSpec } from "../session/handshake.js";
import { invoke, type TransferContext } from "./context.js";
import { failureReason, type CommandResult } from "./runner.js";

/** Size reported for a name the listing does not contain. */
export const UNKNOWN_SIZE = -1;

/**
 * List `remoteRoot`. A listing that cannot run or reports failure is
 * treated as empty: from output alone an empty directory cannot be told
 * apart from an unreachable one.
 */
export async function listEntries(
  ctx: TransferContext,
  remoteRoot: string,
): Promise<RemoteEntry[]> {
  let result: CommandResult;
  try {
    result = await invoke(ctx, ["--auth-list", remoteSpec(ctx.session, remoteRoot)]);
  } catch (err) {
    ctx.logger.debug({ err, remoteRoot }, "Listing could not run, treating as empty");
    return [];
  }

  const reason = failureReason(result);
  if (reason !== null) {
    ctx.logger.debug({ remoteRoot, reason }, "Listing failed, treating as empty");
    return [];
  }

  return parseListing(result.stdout);
}

export function querySize(entries: readonly RemoteEntry[], name: string): number {
  return entries.find((entry) => entry.name === name)?.size ?? UNKNOWN_SIZE;
}

/** Sizes for several names out of one listing; absent names get UNKNOWN_SIZE. */
export function querySizes(
  entries: readonly RemoteEntry[],
  names: readonly string[],
): Map<string, number> {
  const sizes = new Map<string, number>();
  for (const name of names) {
    sizes.set(name, querySize(entries, name));
  }
  return sizes;
}
