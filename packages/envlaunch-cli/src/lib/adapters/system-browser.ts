import type { BrowserService } from "../ports/browser.js";
import { describeError, launchFailed } from "../errors/catalog.js";

/**
 * Real browser service using the 'open' package.
 */
export const systemBrowser: BrowserService = {
  async open(url: string): Promise<void> {
    const openModule = await import("open");
    try {
      await openModule.default(url, { wait: false });
    } catch (error) {
      throw launchFailed(
        url,
        "the system URL opener",
        describeError(error),
        error instanceof Error ? error : undefined
      );
    }
  },
};
