export {
  captureEnv,
  restoreEnv,
  withEnv,
  withEnvAsync,
  type EnvOverrides,
  type EnvSnapshot,
  type ScopedEnvOptions,
} from "./lib/scoped-env.js";
export { extractFirstUrl, normalizeTargetPath } from "./lib/url-scan.js";
export { readTargetFile } from "./lib/target-file.js";
export {
  launchFromFile,
  selectBrowser,
  type LaunchDeps,
  type LaunchOutcome,
} from "./modules/launch.js";
export type { BrowserService, EnvironmentTable } from "./lib/ports/index.js";
export {
  createCommandBrowser,
  createMemoryEnvironment,
  processEnvironment,
  systemBrowser,
} from "./lib/adapters/index.js";
export {
  CLIError,
  isCLIError,
  isFileAccessError,
  isVariableAccessError,
  type ErrorCode,
} from "./lib/errors/types.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./lib/logger.js";
