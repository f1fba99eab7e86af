/**
 * In-process stand-in for idevsutil.
 * Records every invocation (including the contents of its --files-from list,
 * read while the list still exists) and answers from scripted replies.
 */

import { readFile } from "node:fs/promises";
import type { CommandResult, CommandRunner } from "../transfer/runner.js";
import type { Settings } from "../schemas/settings.js";
import type { Session } from "../session/handshake.js";

export interface RecordedInvocation {
  executable: string;
  args: string[];
  /** Contents of the --files-from list, or null when none was passed. */
  fileList: string | null;
}

export type Reply =
  | CommandResult
  | ((invocation: RecordedInvocation) => CommandResult | Promise<CommandResult>);

type Matcher = string | ((invocation: RecordedInvocation) => boolean);

const FILES_FROM = "--files-from=";

export function reply(stdout = "", stderr = "", exitCode: number | null = 0): CommandResult {
  return { stdout, stderr, exitCode };
}

export const VALID_ACCOUNT_REPLY = reply(
  'Validating...\n<tree message="SUCCESS" desc="VALID ACCOUNT" configstatus="SET" configtype="DEFAULT"/>\n',
);

export const PRIVATE_ACCOUNT_REPLY = reply(
  '<tree message="SUCCESS" desc="VALID ACCOUNT" configstatus="SET" configtype="PRIVATE"/>\n',
);

export const SERVER_ADDRESS_REPLY = reply(
  '<tree message="SUCCESS" cmdUtilityServer="evs101.example.net" cmdUtilityServerIP="192.0.2.10"/>\n',
);

export const TEST_SETTINGS: Settings = {
  executableDir: "/opt/idrive",
  accountId: "backup-user",
  passwordFile: "/etc/idrive/password",
  privateKeyFile: undefined,
  logging: { level: "info", pretty: false },
};

/** An already-established session, for driving transfer functions directly. */
export const TEST_SESSION: Session = {
  executable: "/opt/idrive/idevsutil",
  accountId: "backup-user",
  authArgs: ["--password-file=/etc/idrive/password"],
  serverAddress: "evs101.example.net",
};

export const REMOTE_HOME = "backup-user@evs101.example.net::home/";

export class FakeRunner implements CommandRunner {
  readonly invocations: RecordedInvocation[] = [];
  private readonly handlers: Array<{ matcher: Matcher; reply: Reply; once: boolean }> = [];

  constructor(private readonly fallback: Reply = reply()) {}

  /** Reply to invocations whose args include `matcher` (or satisfy it). */
  when(matcher: Matcher, response: Reply): this {
    this.handlers.push({ matcher, reply: response, once: false });
    return this;
  }

  /** Like when(), for the next matching invocation only; takes precedence. */
  once(matcher: Matcher, response: Reply): this {
    this.handlers.unshift({ matcher, reply: response, once: true });
    return this;
  }

  /** Answer the handshake with a valid, configured account. */
  withHandshake(validate: Reply = VALID_ACCOUNT_REPLY): this {
    return this.when("--validate", validate).when("--getServerAddress", SERVER_ADDRESS_REPLY);
  }

  /** Invocations other than the handshake's, in order. */
  get dataInvocations(): RecordedInvocation[] {
    return this.invocations.filter(
      (inv) => !inv.args.includes("--validate") && !inv.args.includes("--getServerAddress"),
    );
  }

  async run(executable: string, args: readonly string[]): Promise<CommandResult> {
    const listArg = args.find((arg) => arg.startsWith(FILES_FROM));
    const fileList = listArg
      ? await readFile(listArg.slice(FILES_FROM.length), "utf-8")
      : null;
    const invocation: RecordedInvocation = { executable, args: [...args], fileList };
    this.invocations.push(invocation);

    const index = this.handlers.findIndex(({ matcher }) =>
      typeof matcher === "string" ? invocation.args.includes(matcher) : matcher(invocation),
    );
    let response = this.fallback;
    if (index !== -1) {
      const handler = this.handlers[index];
      if (handler.once) this.handlers.splice(index, 1);
      response = handler.reply;
    }
    return typeof response === "function" ? response(invocation) : response;
  }
}

/** Path passed in --files-from, for assertions on the list file itself. */
export function fileListPath(invocation: RecordedInvocation): string | null {
  const arg = invocation.args.find((a) => a.startsWith(FILES_FROM));
  return arg ? arg.slice(FILES_FROM.length) : null;
}
