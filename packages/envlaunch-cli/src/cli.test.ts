import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

vi.mock("./lib/version.js", () => ({
  readPackageInfo: vi.fn(),
}));

import { main } from "./cli.js";
import { readPackageInfo } from "./lib/version.js";

describe("main", () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("renders an unreadable package.json as an error and exits 1", async () => {
    vi.mocked(readPackageInfo).mockImplementation(() => {
      throw new Error("ENOENT: no such file or directory");
    });

    await expect(main(["node", "envlaunch", "/tmp/test.html"])).resolves.toBeUndefined();

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ ENOENT: no such file or directory");
  });
});
