/**
 * Scoped local resources used around an invocation: file-lists (idevsutil
 * reads the paths to act on from `--files-from`, one per line) and scratch
 * download directories. Both are removed on every exit path.
 */

import { access, copyFile, mkdtemp, rename, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

const FILE_LIST_NAME = "files-from.txt";

export async function withScratchDir<T>(
  fn: (dir: string) => Promise<T>,
  prefix = "evs-scratch-",
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Write `lines` to a fresh file-list and hand its path to `fn`.
 * An empty `lines` gives an empty file.
 */
export async function withFileList<T>(
  lines: readonly string[],
  fn: (listPath: string) => Promise<T>,
): Promise<T> {
  return withScratchDir(async (dir) => {
    const listPath = join(dir, FILE_LIST_NAME);
    await writeFile(listPath, lines.join("\n"), { encoding: "utf-8", mode: 0o600 });
    return fn(listPath);
  }, "evs-list-");
}

/** Rename, falling back to copy + unlink across filesystems. */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "EXDEV") {
      await copyFile(source, destination);
      await unlink(source);
      return;
    }
    throw err;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
