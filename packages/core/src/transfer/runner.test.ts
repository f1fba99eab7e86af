import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import {
  combinedOutput,
  createProcessRunner,
  failureReason,
  isFailedResult,
  runLogged,
} from "./runner.js";
import { FakeRunner, reply } from "../test-utils/fake-runner.js";

describe("createProcessRunner", () => {
  const runner = createProcessRunner();

  it("captures both streams and a non-zero exit code", async () => {
    const result = await runner.run(process.execPath, [
      "-e",
      "process.stdout.write('listed'); process.stderr.write('warned'); process.exit(3)",
    ]);

    expect(result).toEqual({ stdout: "listed", stderr: "warned", exitCode: 3 });
  });

  it("passes arguments without a shell", async () => {
    const result = await runner.run(process.execPath, [
      "-e",
      "process.stdout.write(process.argv.at(-1))",
      "--",
      "--files-from=/tmp/with space/list.txt",
    ]);

    expect(result.stdout).toBe("--files-from=/tmp/with space/list.txt");
    expect(result.exitCode).toBe(0);
  });

  it("rejects when the executable cannot be started", async () => {
    await expect(
      runner.run("/nonexistent/evs-bridge-test/idevsutil", ["--validate"]),
    ).rejects.toThrow("Failed to start /nonexistent/evs-bridge-test/idevsutil");
  });
});

describe("failureReason", () => {
  it("is null for a clean exit without error markers", () => {
    expect(failureReason(reply("[10][a.gpg]\n"))).toBeNull();
    expect(isFailedResult(reply('<tree message="SUCCESS"/>'))).toBe(false);
  });

  it("reports a non-zero exit", () => {
    expect(failureReason(reply("", "", 1))).toBe("exited with code 1");
  });

  it("reports termination by signal", () => {
    expect(failureReason(reply("", "", null))).toBe("terminated by signal");
  });

  it("reports an error tag in a clean exit", () => {
    const result = reply("", '<item message="ERROR" desc="Quota exceeded"/>');
    expect(failureReason(result)).toBe("Quota exceeded");
    expect(isFailedResult(result)).toBe(true);
  });
});

describe("combinedOutput", () => {
  it("puts stdout before stderr", () => {
    expect(combinedOutput(reply("a", "b"))).toBe("ab");
  });
});

describe("runLogged", () => {
  it("logs the invocation and its outcome at debug", async () => {
    const logger = pino({ level: "debug" });
    const debug = vi.spyOn(logger, "debug").mockImplementation(() => undefined);
    const runner = new FakeRunner(reply("ok", "", 0));

    const result = await runLogged(runner, logger, "/opt/idrive/idevsutil", ["--auth-list"]);

    expect(result.stdout).toBe("ok");
    expect(debug).toHaveBeenCalledWith(
      { executable: "/opt/idrive/idevsutil", args: ["--auth-list"] },
      "Invoking transfer utility",
    );
    expect(debug).toHaveBeenCalledWith(
      { exitCode: 0, stdout: "ok", stderr: "" },
      "Transfer utility finished",
    );
  });
});
