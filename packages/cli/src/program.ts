/**
 * evs-bridge command line.
 *
 * Each command runs one adapter operation against `--remote` and prints its
 * result as one JSON line on stdout. Failures print the error's JSON form on
 * stderr and give exit code 1.
 */

import { Command, CommanderError, Option } from "commander";
import { EvsBackend } from "@evs-bridge/core/adapter";
import { loadSettings } from "@evs-bridge/core/config";
import { AdapterError } from "@evs-bridge/core/errors";
import { LogLevel, type LoggingConfig } from "@evs-bridge/core/schemas";

const VERSION = "0.1.0";

/** The adapter surface the commands drive. */
export type Backend = Pick<
  EvsBackend,
  "connect" | "put" | "get" | "list" | "listEntries" | "deleteMany" | "queryMany" | "close"
>;

export type GlobalOptions = {
  remote: string;
  logLevel?: LoggingConfig["level"];
  pretty?: boolean;
};

export interface ProgramDeps {
  createBackend?: (options: GlobalOptions) => Backend;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  env?: Record<string, string | undefined>;
}

function defaultBackendFactory(env: Record<string, string | undefined>) {
  return (options: GlobalOptions): Backend => {
    const settings = loadSettings(env);
    return new EvsBackend({
      remote: options.remote,
      settings: {
        ...settings,
        logging: {
          level: options.logLevel ?? settings.logging.level,
          pretty: options.pretty ?? settings.logging.pretty,
        },
      },
    });
  };
}

function errorJson(err: unknown): Record<string, unknown> {
  if (err instanceof AdapterError) {
    return err.toJSON();
  }
  return {
    error: {
      errorCode: "INTERNAL_ERROR",
      message: err instanceof Error ? err.message : String(err),
    },
  };
}

export function createProgram(deps: ProgramDeps = {}): {
  program: Command;
  exitCode: () => number;
} {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const createBackend = deps.createBackend ?? defaultBackendFactory(deps.env ?? process.env);
  let status = 0;

  const program = new Command();

  program
    .name("evs-bridge")
    .description("Store, fetch, list and delete backup archives on IDrive through idevsutil")
    .version(VERSION, "-V, --version", "Output the version number")
    .requiredOption("--remote <url>", "Remote URL (idrive://host/path) or remote path")
    .addOption(
      new Option("--log-level <level>", "Log level (logs go to stderr)").choices(LogLevel.options),
    )
    .option("--pretty", "Pretty-print logs")
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    })
    .exitOverride();

  /** Run `fn` against a fresh backend, print its result and always close. */
  async function run(fn: (backend: Backend) => Promise<unknown>): Promise<void> {
    let backend: Backend | null = null;
    try {
      backend = createBackend(program.opts<GlobalOptions>());
      stdout(JSON.stringify(await fn(backend)));
    } catch (err) {
      stderr(JSON.stringify(errorJson(err)));
      status = 1;
    } finally {
      await backend?.close();
    }
  }

  program
    .command("connect")
    .description("Validate the account and resolve the storage server")
    .action(() =>
      run(async (backend) => {
        await backend.connect();
        return { connected: true };
      }),
    );

  program
    .command("put")
    .description("Upload a local file under <name>")
    .argument("<source>", "Local file to upload")
    .argument("<name>", "Remote file name")
    .action((source: string, name: string) => run((backend) => backend.put(source, name)));

  program
    .command("get")
    .description("Download <name> to <destination>")
    .argument("<name>", "Remote file name")
    .argument("<destination>", "Local path to write")
    .action((name: string, destination: string) =>
      run(async (backend) => {
        await backend.get(name, destination);
        return { name, destination };
      }),
    );

  program
    .command("list")
    .description("List file names under the remote root")
    .option("--sizes", "Include sizes")
    .action((options: { sizes?: boolean }) =>
      run((backend) => (options.sizes ? backend.listEntries() : backend.list())),
    );

  program
    .command("delete")
    .description("Delete remote files")
    .argument("<names...>", "Remote file names")
    .action((names: string[]) => run((backend) => backend.deleteMany(names)));

  program
    .command("query")
    .description("Report sizes of remote files (-1 when absent)")
    .argument("<names...>", "Remote file names")
    .action((names: string[]) =>
      run(async (backend) => Object.fromEntries(await backend.queryMany(names))),
    );

  return { program, exitCode: () => status };
}

/** Parse `args` (without the node and script entries) and run the command. */
export async function runCli(args: readonly string[], deps: ProgramDeps = {}): Promise<number> {
  const { program, exitCode } = createProgram(deps);
  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  return exitCode();
}
