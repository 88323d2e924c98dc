import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";
import type { ChildProcess } from "child_process";

vi.mock("child_process", () => ({
  spawn: vi.fn(),
}));

import { spawn } from "child_process";
import { createCommandBrowser } from "./command-browser.js";

function fakeChild() {
  return Object.assign(new EventEmitter(), { unref: vi.fn() });
}

describe("createCommandBrowser", () => {
  let child: ReturnType<typeof fakeChild>;

  beforeEach(() => {
    vi.resetAllMocks();
    child = fakeChild();
    vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
  });

  it("appends the URL to the command and detaches the process", async () => {
    const browser = createCommandBrowser(["cmd.exe", "/c", "START"]);

    const pending = browser.open("http://localhost:8888/tree");
    child.emit("spawn");
    await pending;

    expect(spawn).toHaveBeenCalledWith("cmd.exe", ["/c", "START", "http://localhost:8888/tree"], {
      detached: true,
      stdio: "ignore",
    });
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  it("works with a command that takes no arguments", async () => {
    const browser = createCommandBrowser(["xdg-open"]);

    const pending = browser.open("http://example.com/");
    child.emit("spawn");
    await pending;

    expect(spawn).toHaveBeenCalledWith("xdg-open", ["http://example.com/"], {
      detached: true,
      stdio: "ignore",
    });
  });

  it("rejects with a launch error when the command cannot start", async () => {
    const browser = createCommandBrowser(["cmd.exe", "/c", "START"]);

    const pending = browser.open("http://example.com/");
    child.emit("error", Object.assign(new Error("spawn cmd.exe ENOENT"), { code: "ENOENT" }));

    await expect(pending).rejects.toMatchObject({
      code: "LAUNCH_FAILED",
      message: "Couldn't open http://example.com/",
      details: "spawn cmd.exe ENOENT",
    });
    expect(child.unref).not.toHaveBeenCalled();
  });
});
