import { describe, it, expect } from "vitest";
import { deleteFiles } from "./delete.js";
import type { TransferContext } from "./context.js";
import { TransferError } from "../errors/catalog.js";
import { silentLogger } from "../logger/index.js";
import { FakeRunner, reply, REMOTE_HOME, TEST_SESSION } from "../test-utils/fake-runner.js";

function context(runner: FakeRunner): TransferContext {
  return { session: TEST_SESSION, runner, logger: silentLogger() };
}

describe("deleteFiles", () => {
  it("deletes every name in one invocation", async () => {
    const runner = new FakeRunner();

    const outcome = await deleteFiles(context(runner), ["a.gpg", "/b.gpg"], "backups/web");

    expect(outcome).toEqual({ names: ["a.gpg", "b.gpg"], failure: null });
    expect(runner.invocations).toHaveLength(1);
    const [invocation] = runner.invocations;
    expect(invocation.executable).toBe("/opt/idrive/idevsutil");
    expect(invocation.args[1]).toBe("--delete-items");
    expect(invocation.args[3]).toBe(`${REMOTE_HOME}backups/web`);
    expect(invocation.fileList).toBe("a.gpg\nb.gpg");
  });

  it("returns a reported failure instead of raising", async () => {
    const runner = new FakeRunner(
      reply('<item message="ERROR" desc="Item not found"/>\n'),
    );

    const first = await deleteFiles(context(runner), ["a.gpg"], "");
    const second = await deleteFiles(context(runner), ["a.gpg"], "");

    expect(first.failure).toBe("Item not found");
    expect(second.failure).toBe("Item not found");
    expect(runner.invocations).toHaveLength(2);
  });

  it("reports a non-zero exit as the failure", async () => {
    const runner = new FakeRunner(reply("", "", 3));

    const outcome = await deleteFiles(context(runner), ["a.gpg"], "");

    expect(outcome.failure).toBe("exited with code 3");
  });

  it("raises TransferError when the utility cannot run", async () => {
    const runner = new FakeRunner(() => {
      throw new Error("spawn EACCES");
    });

    const err = await deleteFiles(context(runner), ["a.gpg"], "").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransferError);
    expect(err).toMatchObject({
      message: "Delete could not run: spawn EACCES",
      step: 1,
      stepName: "delete-items",
    });
  });

  it("makes no invocation for an empty list", async () => {
    const runner = new FakeRunner();

    expect(await deleteFiles(context(runner), [], "backups")).toEqual({ names: [], failure: null });
    expect(runner.invocations).toHaveLength(0);
  });
});
