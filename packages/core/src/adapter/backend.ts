import { rm } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { loadSettings } from "../config/loader.js";
import { UTILITY_TEMP_DIR } from "../config/defaults.js";
import { remotePathFromUrl } from "../config/remote.js";
import { createLogger } from "../logger/index.js";
import type { RemoteEntry } from "../parser/listing.js";
import type { Settings } from "../schemas/settings.js";
import { establishSession, type Session } from "../session/handshake.js";
import type { TransferContext } from "../transfer/context.js";
import { deleteFiles, type DeleteOutcome } from "../transfer/delete.js";
import { getFile } from "../transfer/fetch.js";
import { listEntries, querySize, querySizes } from "../transfer/list.js";
import { createProcessRunner, type CommandRunner } from "../transfer/runner.js";
import { putFile, type UploadReport } from "../transfer/upload.js";

export interface EvsBackendOptions {
  /** Remote URL (`idrive://host/backups/web`) or bare remote path. */
  remote: string;
  /** Parsed settings; read from `env` when omitted. */
  settings?: Settings;
  env?: Record<string, string | undefined>;
  runner?: CommandRunner;
  logger?: Logger;
  /** Staging prefix for an upload from `localDir`; derived when omitted. */
  stagingPrefix?: (localDir: string) => string;
  /** Directory the utility leaves its `evs_temp` scratch in. */
  workDir?: string;
}

export interface FileSize {
  size: number;
}

/**
 * Backup-storage backend over idevsutil.
 *
 * Every data operation establishes the session on first use. Calls are
 * expected to be sequential; concurrent callers share one pending
 * handshake.
 */
export class EvsBackend {
  readonly remoteRoot: string;
  private readonly settings: Settings;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly stagingPrefix: ((localDir: string) => string) | undefined;
  private readonly workDir: string;
  private session: Session | null = null;
  private pending: Promise<Session> | null = null;

  constructor(options: EvsBackendOptions) {
    this.remoteRoot = remotePathFromUrl(options.remote);
    this.settings = options.settings ?? loadSettings(options.env);
    this.runner = options.runner ?? createProcessRunner();
    this.logger = options.logger ?? createLogger(this.settings.logging);
    this.stagingPrefix = options.stagingPrefix;
    this.workDir = options.workDir ?? process.cwd();
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  /** Run the handshake unless a session is already established. */
  async connect(): Promise<void> {
    await this.context();
  }

  async put(sourcePath: string, remoteName: string): Promise<UploadReport> {
    return putFile(await this.context(), {
      sourcePath,
      remoteName,
      remoteRoot: this.remoteRoot,
      stagingPrefix: this.stagingPrefix,
    });
  }

  async get(remoteName: string, localPath: string): Promise<void> {
    await getFile(await this.context(), {
      remoteName,
      remoteRoot: this.remoteRoot,
      destination: localPath,
    });
  }

  async listEntries(): Promise<RemoteEntry[]> {
    return listEntries(await this.context(), this.remoteRoot);
  }

  async list(): Promise<string[]> {
    const entries = await this.listEntries();
    return entries.map((entry) => entry.name);
  }

  async delete(remoteName: string): Promise<DeleteOutcome> {
    return this.deleteMany([remoteName]);
  }

  async deleteMany(remoteNames: readonly string[]): Promise<DeleteOutcome> {
    return deleteFiles(await this.context(), remoteNames, this.remoteRoot);
  }

  async query(remoteName: string): Promise<FileSize> {
    const entries = await this.listEntries();
    return { size: querySize(entries, remoteName) };
  }

  async queryMany(remoteNames: readonly string[]): Promise<Map<string, FileSize>> {
    const entries = await this.listEntries();
    const result = new Map<string, FileSize>();
    for (const [name, size] of querySizes(entries, remoteNames)) {
      result.set(name, { size });
    }
    return result;
  }

  /** Remove the utility's working directory. Never throws. */
  async close(): Promise<void> {
    const tempDir = join(this.workDir, UTILITY_TEMP_DIR);
    try {
      await rm(tempDir, { recursive: true, force: true });
    } catch (err) {
      this.logger.debug({ err, tempDir }, "Could not remove utility temp directory");
    }
  }

  private async context(): Promise<TransferContext> {
    if (this.session === null) {
      if (this.pending === null) {
        this.pending = establishSession({
          settings: this.settings,
          runner: this.runner,
          logger: this.logger,
        }).finally(() => {
          this.pending = null;
        });
      }
      this.session = await this.pending;
    }
    return { session: this.session, runner: this.runner, logger: this.logger };
  }
}
