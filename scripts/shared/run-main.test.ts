import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

vi.mock("@actions/core", () => ({
  setFailed: vi.fn(),
}));

import * as core from "@actions/core";
import { runIfMain } from "./run-main.js";

describe("runIfMain", () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let originalArgv1: string;
  let originalExitCode: typeof process.exitCode;

  beforeEach(() => {
    vi.clearAllMocks();
    originalArgv1 = process.argv[1];
    originalExitCode = process.exitCode;
    exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never);
  });

  afterEach(() => {
    process.argv[1] = originalArgv1;
    process.exitCode = originalExitCode;
    exitSpy.mockRestore();
  });

  it("runs main when caller URL matches process entry URL", async () => {
    process.argv[1] = "/tmp/scripts/example.ts";
    const main = vi.fn().mockResolvedValue(undefined);

    runIfMain("file:///tmp/scripts/example.ts", main);
    await new Promise((resolve) => setImmediate(resolve));

    expect(main).toHaveBeenCalledTimes(1);
    expect(core.setFailed).not.toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("skips main when caller URL does not match process entry URL", () => {
    process.argv[1] = "/tmp/scripts/not-this.ts";
    const main = vi.fn().mockResolvedValue(undefined);

    runIfMain("file:///tmp/scripts/example.ts", main);

    expect(main).not.toHaveBeenCalled();
  });

  it("sets the exit code main resolves with", async () => {
    process.argv[1] = "/tmp/scripts/example.ts";

    runIfMain("file:///tmp/scripts/example.ts", () => Promise.resolve(1));
    await new Promise((resolve) => setImmediate(resolve));

    expect(process.exitCode).toBe(1);
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("marks workflow failed when main rejects", async () => {
    process.argv[1] = "/tmp/scripts/example.ts";

    runIfMain("file:///tmp/scripts/example.ts", () => Promise.reject(new Error("boom")));
    await new Promise((resolve) => setImmediate(resolve));

    expect(core.setFailed).toHaveBeenCalledWith("Fatal error: boom");
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
