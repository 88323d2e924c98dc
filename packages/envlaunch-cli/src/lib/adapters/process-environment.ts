import type { EnvironmentTable } from "../ports/environment.js";

/**
 * Environment table backed by process.env.
 */
export const processEnvironment: EnvironmentTable = {
  get: (name) => process.env[name],
  set: (name, value) => {
    process.env[name] = value;
  },
  unset: (name) => {
    delete process.env[name];
  },
};

/**
 * Environment table backed by a private map.
 * Starts from `initial` and never touches process.env.
 */
export function createMemoryEnvironment(
  initial: Record<string, string> = {}
): EnvironmentTable & { entries(): Record<string, string> } {
  const values = new Map(Object.entries(initial));

  return {
    get: (name) => values.get(name),
    set: (name, value) => {
      values.set(name, value);
    },
    unset: (name) => {
      values.delete(name);
    },
    entries: () => Object.fromEntries(values),
  };
}
