/**
 * Session handshake.
 *
 * Turns environment-supplied credentials into an immutable Session:
 * 1. Resolve executable, account id and password file (ConfigError if unset)
 * 2. `--validate` the account (ProtocolError if the reply is unreadable,
 *    AuthError if it is rejected, invalid or not configured)
 * 3. For private-key accounts, add `--pvt-key` (ConfigError if unset)
 * 4. `--getServerAddress` (ProtocolError if the address is missing)
 */

import type { Logger } from "pino";
import { executablePath, UTILITY_DOWNLOAD_URLS } from "../config/index.js";
import { AuthError, ConfigError, ProtocolError } from "../errors/catalog.js";
import { parseStatusDocument, type StatusAttributes } from "../parser/status.js";
import {
  SETTING_VARIABLES,
  type CredentialSetting,
  type Settings,
} from "../schemas/settings.js";
import {
  combinedOutput,
  runLogged,
  type CommandResult,
  type CommandRunner,
} from "../transfer/runner.js";

export interface Session {
  readonly executable: string;
  readonly accountId: string;
  /** `--password-file=...` and, for private-key accounts, `--pvt-key=...`. */
  readonly authArgs: readonly string[];
  readonly serverAddress: string;
}

export interface HandshakeDeps {
  settings: Settings;
  runner: CommandRunner;
  logger: Logger;
}

const STATUS_TAG = "tree";

const SETTING_HINTS: Record<CredentialSetting, string> = {
  executableDir: `No path to idevsutil is set. Download it from ${UTILITY_DOWNLOAD_URLS.join(
    " or ",
  )}, place it anywhere executable and set IDEVSPATH to its directory`,
  accountId: "IDrive logon id missing. Set IDRIVEID to your IDrive logon id",
  passwordFile:
    "IDrive password file missing. Create a file holding your IDrive password and set IDPWDFILE to its path",
  privateKeyFile:
    "The account uses a private encryption key. Create a file holding the key and set IDKEYFILE to its path",
};

function requireSetting(
  settings: Settings,
  key: CredentialSetting,
  logger: Logger,
): string {
  const value = settings[key];
  if (value === undefined) {
    logger.warn({ setting: SETTING_VARIABLES[key] }, SETTING_HINTS[key]);
    throw new ConfigError(SETTING_VARIABLES[key]);
  }
  return value;
}

async function request(
  deps: HandshakeDeps,
  executable: string,
  args: readonly string[],
): Promise<{ result: CommandResult; status: StatusAttributes | null }> {
  let result: CommandResult;
  try {
    result = await runLogged(deps.runner, deps.logger, executable, args);
  } catch (err) {
    throw new ProtocolError(`Could not run ${executable}`, {
      args: [...args],
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const document = parseStatusDocument(combinedOutput(result));
  return { result, status: document?.find(STATUS_TAG) ?? null };
}

function outputDetails(result: CommandResult): Record<string, unknown> {
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
}

export async function establishSession(deps: HandshakeDeps): Promise<Session> {
  const { settings, logger } = deps;

  const executable = executablePath(requireSetting(settings, "executableDir", logger));
  const accountId = requireSetting(settings, "accountId", logger);
  const passwordFile = requireSetting(settings, "passwordFile", logger);
  const authArgs = [`--password-file=${passwordFile}`];
  logger.debug({ executable, accountId, passwordFile }, "Resolved IDrive settings");

  const validation = await request(deps, executable, [
    ...authArgs,
    "--validate",
    `--user=${accountId}`,
  ]);
  const account = validation.status;
  if (!account) {
    throw new ProtocolError(
      "Account validation reply carried no status",
      outputDetails(validation.result),
    );
  }
  if (account.message !== "SUCCESS") {
    throw new AuthError(
      `Account validation failed: ${account.desc ?? account.message ?? "no description"}`,
      { message: account.message, desc: account.desc },
    );
  }
  if (account.desc !== "VALID ACCOUNT") {
    throw new AuthError("IDrive account is not valid", { desc: account.desc });
  }
  if (account.configstatus !== "SET") {
    throw new AuthError("IDrive account is not configured", {
      configstatus: account.configstatus,
    });
  }

  if (account.configtype === "PRIVATE") {
    const keyFile = requireSetting(settings, "privateKeyFile", logger);
    authArgs.push(`--pvt-key=${keyFile}`);
    logger.debug({ keyFile }, "Account uses a private encryption key");
  }

  const lookup = await request(deps, executable, [
    ...authArgs,
    "--getServerAddress",
    accountId,
  ]);
  const serverAddress = lookup.status?.cmdUtilityServer;
  if (!serverAddress) {
    throw new ProtocolError(
      "Server address reply carried no cmdUtilityServer",
      outputDetails(lookup.result),
    );
  }

  logger.debug({ accountId, serverAddress }, "IDrive session established");

  return Object.freeze({
    executable,
    accountId,
    authArgs: Object.freeze([...authArgs]),
    serverAddress,
  });
}

/** Positional remote argument: `<account>@<server>::home/<path>`. */
export function remoteSpec(session: Session, path: string): string {
  return `${session.accountId}@${session.serverAddress}::home/${path}`;
}
