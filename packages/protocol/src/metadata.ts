/**
 * Ordered string key/value pairs describing an account.
 *
 * When present, the first entry is always `name` with a non-empty value.
 */

import { ProtocolError } from "./errors.js";

export class Metadata {
  private readonly _inner: ReadonlyMap<string, string>;

  private constructor(inner: ReadonlyMap<string, string>) {
    this._inner = inner;
  }

  static empty(): Metadata {
    return new Metadata(new Map());
  }

  static fromKeysValues(keys: readonly string[], values: readonly string[]): Metadata {
    if (keys.length !== values.length) {
      throw new ProtocolError(
        "METADATA_NOT_SAME_LENGTH",
        `Got ${keys.length} keys and ${values.length} values`,
      );
    }
    if (keys.length > 0) {
      if (keys[0] !== "name") {
        throw new ProtocolError("METADATA_NAME_MISSING", "First metadata key must be 'name'");
      }
      if (values[0] === "") {
        throw new ProtocolError("NAME_CANNOT_BE_EMPTY", "Account name cannot be empty");
      }
    }

    const inner = new Map<string, string>();
    keys.forEach((key, i) => {
      if (inner.has(key)) {
        throw new ProtocolError("METADATA_KEY_EXISTS", `Metadata key '${key}' is repeated`);
      }
      inner.set(key, values[i] ?? "");
    });
    return new Metadata(inner);
  }

  get(key: string): string | undefined {
    return this._inner.get(key);
  }

  get size(): number {
    return this._inner.size;
  }

  entries(): readonly (readonly [string, string])[] {
    return [...this._inner.entries()];
  }

  keys(): readonly string[] {
    return [...this._inner.keys()];
  }

  values(): readonly string[] {
    return [...this._inner.values()];
  }

  toJSON(): Readonly<Record<string, string>> {
    return Object.fromEntries(this._inner);
  }
}
