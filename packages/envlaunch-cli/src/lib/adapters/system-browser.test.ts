import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("open", () => ({
  default: vi.fn(),
}));

import open from "open";
import { systemBrowser } from "./system-browser.js";

describe("systemBrowser", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("opens the URL without waiting for the browser", async () => {
    await systemBrowser.open("http://example.com/path");

    expect(open).toHaveBeenCalledWith("http://example.com/path", { wait: false });
  });

  it("wraps opener failures in a launch error", async () => {
    vi.mocked(open).mockRejectedValue(new Error("xdg-open missing"));

    await expect(systemBrowser.open("http://example.com/")).rejects.toMatchObject({
      code: "LAUNCH_FAILED",
      details: "xdg-open missing",
    });
  });
});
