/**
 * Abstraction for browser operations.
 * Allows testing without opening actual browsers.
 */
export interface BrowserService {
  /** Start opening a URL and return once the launcher process has spawned */
  open(url: string): Promise<void>;
}
