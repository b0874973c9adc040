/**
 * Managed data keys.
 *
 * Modules attach their own long-lived state to an account (vaults, locked
 * treasury caps) under a named key. The key's guard is the registered
 * downcast for what is stored under it.
 */

export interface ManagedKey<T> {
  readonly name: string;
  readonly guard: (value: unknown) => value is T;
}

export function managedKey<T>(
  name: string,
  guard: (value: unknown) => value is T,
): ManagedKey<T> {
  return Object.freeze({ name, guard });
}
