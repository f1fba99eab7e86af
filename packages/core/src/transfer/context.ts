import type { Logger } from "pino";
import type { Session } from "../session/handshake.js";
import { runLogged, type CommandResult, type CommandRunner } from "./runner.js";

/** What every data operation needs: an established session and a way to run it. */
export interface TransferContext {
  session: Session;
  runner: CommandRunner;
  logger: Logger;
}

/** Run the utility with the session's auth flags ahead of `args`. */
export function invoke(
  ctx: TransferContext,
  args: readonly string[],
): Promise<CommandResult> {
  return runLogged(ctx.runner, ctx.logger, ctx.session.executable, [
    ...ctx.session.authArgs,
    ...args,
  ]);
}

export function filesFrom(listPath: string): string {
  return `--files-from=${listPath}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
