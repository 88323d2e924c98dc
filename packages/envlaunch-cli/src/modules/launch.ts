import { Command } from "commander";
import type { BrowserService } from "../lib/ports/browser.js";
import type { EnvironmentTable } from "../lib/ports/environment.js";
import { createCommandBrowser, systemBrowser } from "../lib/adapters/index.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { getOutputMode } from "../lib/output/mode.js";
import { readTargetFile } from "../lib/target-file.js";
import { extractFirstUrl, normalizeTargetPath } from "../lib/url-scan.js";
import { withEnvAsync, type EnvOverrides } from "../lib/scoped-env.js";

export interface LaunchDeps {
  browser: BrowserService;
  logger: Logger;
  /** Variables set only while the browser is being launched */
  launcherEnv?: EnvOverrides;
  environment?: EnvironmentTable;
  readFile?: (path: string) => Promise<string>;
}

export type LaunchOutcome =
  | { status: "launched"; path: string; url: string }
  | { status: "no-match"; path: string };

/**
 * Read the target file and open the first http: URL it contains.
 * A file without a URL is not an error: nothing is launched.
 */
export async function launchFromFile(target: string, deps: LaunchDeps): Promise<LaunchOutcome> {
  const path = normalizeTargetPath(target);
  const log = deps.logger.child({ path });
  const read = deps.readFile ?? readTargetFile;

  log.debug("Reading target file", { target });
  const contents = await read(path);

  const url = extractFirstUrl(contents);
  if (url === undefined) {
    log.info("No http: URL found");
    return { status: "no-match", path };
  }

  log.info("Opening URL", { url });
  await withEnvAsync(deps.launcherEnv ?? {}, () => deps.browser.open(url), {
    table: deps.environment,
    logger: log,
  });

  return { status: "launched", path, url };
}

/**
 * Pick the browser service the config asks for.
 */
export function selectBrowser(config: ResolvedConfig): BrowserService {
  return config.launcherCommand
    ? createCommandBrowser(config.launcherCommand)
    : systemBrowser;
}

export interface LaunchCommandDeps {
  loadConfig: () => { config: ResolvedConfig; sources: string[] };
  selectBrowser: (config: ResolvedConfig) => BrowserService;
}

const defaultCommandDeps: LaunchCommandDeps = { loadConfig, selectBrowser };

/**
 * Load config, run the launch and map failures to an exit code of 1.
 */
export async function runLaunchCommand(
  target: string,
  deps: LaunchCommandDeps = defaultCommandDeps
): Promise<void> {
  let config: ResolvedConfig | undefined;

  try {
    const loaded = deps.loadConfig();
    config = loaded.config;

    const logger = createLogger({ level: config.logLevel, json: config.logJson });
    logger.debug("Configuration loaded", { sources: loaded.sources });

    await launchFromFile(target, {
      browser: deps.selectBrowser(config),
      logger,
      launcherEnv: config.launcherEnv,
    });
  } catch (error) {
    renderUnknownError(error, getOutputMode(config?.logJson ?? false));
    process.exitCode = 1;
  }
}

export function registerLaunchCommand(
  program: Command,
  deps: LaunchCommandDeps = defaultCommandDeps
): void {
  program
    .argument("<target>", "File path or file:// URI to read the URL from")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action((target: string) => runLaunchCommand(target, deps));
}
