import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger } from "../app/lib/logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write progress to stderr unless quiet", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createConsoleLogger().info("[Pages] 1/3");
    createConsoleLogger({ quiet: true }).info("[Pages] 2/3");

    expect(errorSpy.mock.calls).toEqual([["[Pages] 1/3"]]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("should include the stack of a failure even when quiet", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("boom");
    failure.stack = "Error: boom\n    at test";

    createConsoleLogger({ quiet: true }).error("[Batch] Failed to process a.xml", failure);

    expect(errorSpy).toHaveBeenCalledWith("[Batch] Failed to process a.xml\nError: boom\n    at test");
  });
});
