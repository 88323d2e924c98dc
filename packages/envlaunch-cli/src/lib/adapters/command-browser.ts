import { spawn } from "child_process";
import type { BrowserService } from "../ports/browser.js";
import { launchFailed } from "../errors/catalog.js";

/**
 * Browser service that hands the URL to a fixed command, e.g.
 * `["cmd.exe", "/c", "START"]` to reach the Windows browser from WSL.
 *
 * The process is detached and unreferenced; `open` resolves once it has
 * spawned and never waits for it to exit.
 */
export function createCommandBrowser(command: readonly [string, ...string[]]): BrowserService {
  const [file, ...args] = command;

  return {
    open(url: string): Promise<void> {
      return new Promise((resolve, reject) => {
        const child = spawn(file, [...args, url], {
          detached: true,
          stdio: "ignore",
        });

        child.once("error", (error) => {
          reject(launchFailed(url, file, error.message, error));
        });
        child.once("spawn", () => {
          child.unref();
          resolve();
        });
      });
    },
  };
}
