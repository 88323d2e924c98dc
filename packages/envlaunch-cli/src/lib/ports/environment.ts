/**
 * Abstraction over the process-wide environment variable table.
 * Allows testing failure paths without touching process.env.
 */
export interface EnvironmentTable {
  /** Current value, or undefined when the variable is unset */
  get(name: string): string | undefined;
  set(name: string, value: string): void;
  unset(name: string): void;
}
