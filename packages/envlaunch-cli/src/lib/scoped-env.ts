import { AsyncLocalStorage } from "async_hooks";
import type { EnvironmentTable } from "./ports/environment.js";
import { processEnvironment } from "./adapters/process-environment.js";
import { describeError, variableAccessFailed } from "./errors/catalog.js";
import type { CLIError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Variable names mapped to the values they take inside the scope */
export type EnvOverrides = Readonly<Record<string, string>>;

/** Prior value of each overridden variable; undefined marks an unset variable */
export type EnvSnapshot = ReadonlyMap<string, string | undefined>;

export interface ScopedEnvOptions {
  /** Table to mutate (defaults to process.env) */
  table?: EnvironmentTable;
  /** Receives restore failures that cannot be thrown because the action already failed */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Record the current value of every key. A read that throws counts as unset.
 */
export function captureEnv(
  keys: Iterable<string>,
  table: EnvironmentTable = processEnvironment
): EnvSnapshot {
  const snapshot = new Map<string, string | undefined>();
  for (const key of keys) {
    let value: string | undefined;
    try {
      value = table.get(key);
    } catch {
      value = undefined;
    }
    snapshot.set(key, value);
  }
  return snapshot;
}

/**
 * Put every snapshot entry back. All entries are attempted; the first
 * failure is thrown once the loop is done.
 */
export function restoreEnv(
  snapshot: EnvSnapshot,
  table: EnvironmentTable = processEnvironment
): void {
  let firstFailure: CLIError | undefined;

  for (const [name, value] of snapshot) {
    try {
      if (value === undefined) {
        table.unset(name);
      } else {
        table.set(name, value);
      }
    } catch (error) {
      firstFailure ??= variableAccessFailed(name, "restore", describeError(error), asError(error));
    }
  }

  if (firstFailure) {
    throw firstFailure;
  }
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

function checkVariable(name: string, value: string): string | undefined {
  if (name.length === 0) return "name is empty";
  if (name.includes("=")) return "name contains '='";
  if (name.includes("\0")) return "name contains a NUL character";
  if (value.includes("\0")) return "value contains a NUL character";
  return undefined;
}

function applyOverrides(overrides: EnvOverrides, table: EnvironmentTable): void {
  for (const [name, value] of Object.entries(overrides)) {
    const problem = checkVariable(name, value);
    if (problem) {
      throw variableAccessFailed(name, "set", problem);
    }

    try {
      table.set(name, value);
    } catch (error) {
      throw variableAccessFailed(name, "set", describeError(error), asError(error));
    }
  }
}

function restoreAfterFailure(
  snapshot: EnvSnapshot,
  table: EnvironmentTable,
  logger: Logger
): void {
  try {
    restoreEnv(snapshot, table);
  } catch (restoreError) {
    logger.warn("Environment restore failed while propagating an earlier error", {
      error: describeError(restoreError),
    });
  }
}

// ---------------------------------------------------------------------------
// Scoped execution
// ---------------------------------------------------------------------------

/**
 * Run `action` with `overrides` applied, then restore the prior values.
 *
 * The snapshot is taken before anything is set, and restoration covers every
 * key on all exit paths. An action failure propagates unchanged; a failure
 * to set a variable skips the action and propagates after restoration.
 *
 * The action runs synchronously. For promise-returning actions use
 * {@link withEnvAsync}, otherwise the values are restored before it settles.
 */
export function withEnv<T>(
  overrides: EnvOverrides,
  action: () => T,
  options: ScopedEnvOptions = {}
): T {
  const table = options.table ?? processEnvironment;
  const snapshot = captureEnv(Object.keys(overrides), table);

  let result: T;
  try {
    applyOverrides(overrides, table);
    result = action();
  } catch (error) {
    restoreAfterFailure(snapshot, table, options.logger ?? createNoopLogger());
    throw error;
  }

  restoreEnv(snapshot, table);
  return result;
}

/** Regions waiting at one nesting level; each region chains onto `tail` */
interface RegionQueue {
  tail: Promise<void>;
}

/** Queue of top-level regions on each table */
const rootQueues = new WeakMap<EnvironmentTable, RegionQueue>();

/** For each table, the queue that regions opened in the current async context join */
const activeRegions = new AsyncLocalStorage<ReadonlyMap<EnvironmentTable, RegionQueue>>();

function queueFor(
  table: EnvironmentTable,
  enclosing: ReadonlyMap<EnvironmentTable, RegionQueue> | undefined
): RegionQueue {
  const parent = enclosing?.get(table);
  if (parent) return parent;

  let root = rootQueues.get(table);
  if (!root) {
    root = { tail: Promise.resolve() };
    rootQueues.set(table, root);
  }
  return root;
}

async function runScopedAsync<T>(
  overrides: EnvOverrides,
  action: () => Promise<T>,
  table: EnvironmentTable,
  logger: Logger
): Promise<T> {
  const snapshot = captureEnv(Object.keys(overrides), table);

  let result: T;
  try {
    applyOverrides(overrides, table);
    result = await action();
  } catch (error) {
    restoreAfterFailure(snapshot, table, logger);
    throw error;
  }

  restoreEnv(snapshot, table);
  return result;
}

/**
 * Async counterpart of {@link withEnv}. Values stay applied until the
 * action's promise settles.
 *
 * Overlapping regions on the same table run one at a time in call order, so
 * one region never captures or restores values another region has set.
 * Regions opened from inside a region queue behind their siblings within
 * that region rather than behind it, so nesting never waits on itself.
 */
export function withEnvAsync<T>(
  overrides: EnvOverrides,
  action: () => Promise<T>,
  options: ScopedEnvOptions = {}
): Promise<T> {
  const table = options.table ?? processEnvironment;
  const logger = options.logger ?? createNoopLogger();
  const enclosing = activeRegions.getStore();
  const queue = queueFor(table, enclosing);

  const regions = new Map<EnvironmentTable, RegionQueue>(enclosing);
  regions.set(table, { tail: Promise.resolve() });

  const run = queue.tail.then(() =>
    activeRegions.run(regions, () => runScopedAsync(overrides, action, table, logger))
  );
  queue.tail = run.then(
    () => undefined,
    () => undefined
  );
  return run;
}
