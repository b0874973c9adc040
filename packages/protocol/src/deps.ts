/**
 * The packages an account allows to call back into it.
 *
 * An ordered list of (name, address, version). The protocol itself is
 * always the first entry. Every account-mutating entry point checks the
 * caller's version witness against this list.
 */

import type { Address } from "@covenant/types";
import { ProtocolError } from "./errors.js";
import { ACCOUNT_PROTOCOL } from "./extensions.js";
import type { Extensions } from "./extensions.js";
import { isDefinedVersion } from "./witness.js";
import type { VersionWitness } from "./witness.js";

export interface Dep {
  readonly name: string;
  readonly addr: Address;
  readonly version: number;
}

export class Deps {
  private readonly _inner: readonly Dep[];
  private readonly _unverifiedAllowed: boolean;

  private constructor(inner: readonly Dep[], unverifiedAllowed: boolean) {
    this._inner = inner;
    this._unverifiedAllowed = unverifiedAllowed;
  }

  /**
   * Build a dependency list.
   *
   * @throws DEPS_NOT_SAME_LENGTH, ACCOUNT_PROTOCOL_MISSING,
   *   DEP_ALREADY_EXISTS, NOT_EXTENSION
   */
  static new(
    extensions: Extensions,
    unverifiedAllowed: boolean,
    names: readonly string[],
    addresses: readonly Address[],
    versions: readonly number[],
  ): Deps {
    if (names.length !== addresses.length || names.length !== versions.length) {
      throw new ProtocolError(
        "DEPS_NOT_SAME_LENGTH",
        `Got ${names.length} names, ${addresses.length} addresses and ${versions.length} versions`,
      );
    }
    if (names[0] !== ACCOUNT_PROTOCOL) {
      throw new ProtocolError(
        "ACCOUNT_PROTOCOL_MISSING",
        `${ACCOUNT_PROTOCOL} must be the first dependency`,
      );
    }

    const inner: Dep[] = [];
    names.forEach((name, i) => {
      const addr = addresses[i];
      const version = versions[i];
      if (addr === undefined || version === undefined) return;

      if (inner.some((d) => d.name === name || d.addr === addr)) {
        throw new ProtocolError(
          "DEP_ALREADY_EXISTS",
          `Dependency '${name}' (${addr}) is listed twice`,
        );
      }
      // The protocol itself must always be verified.
      if ((!unverifiedAllowed || i === 0) && !extensions.isExtension(name, addr, version)) {
        throw new ProtocolError(
          "NOT_EXTENSION",
          `'${name}' ${addr} v${version} is not an allow-listed extension`,
        );
      }
      inner.push({ name, addr, version });
    });

    return new Deps(inner, unverifiedAllowed);
  }

  /**
   * Build a dependency list from the latest allow-listed version of each name.
   */
  static latest(extensions: Extensions, names: readonly string[]): Deps {
    const latest = names.map((name) => extensions.getLatestForName(name));
    return Deps.new(
      extensions,
      false,
      names,
      latest.map((l) => l.addr),
      latest.map((l) => l.version),
    );
  }

  /**
   * Gate for every account-mutating call made by a package.
   */
  check(witness: VersionWitness): void {
    if (!isDefinedVersion(witness)) {
      throw new ProtocolError(
        "WRONG_WITNESS",
        `Version witness of ${witness.packageAddress} was not issued to that package`,
      );
    }
    if (!this.containsAddr(witness.packageAddress)) {
      throw new ProtocolError(
        "NOT_DEP",
        `Package ${witness.packageAddress} is not a dependency of this account`,
      );
    }
  }

  get unverifiedAllowed(): boolean {
    return this._unverifiedAllowed;
  }

  get length(): number {
    return this._inner.length;
  }

  getByName(name: string): Dep {
    const dep = this._inner.find((d) => d.name === name);
    if (dep === undefined) {
      throw new ProtocolError("NOT_DEP", `'${name}' is not a dependency`);
    }
    return dep;
  }

  getByAddr(addr: Address): Dep {
    const dep = this._inner.find((d) => d.addr === addr);
    if (dep === undefined) {
      throw new ProtocolError("NOT_DEP", `${addr} is not a dependency`);
    }
    return dep;
  }

  containsName(name: string): boolean {
    return this._inner.some((d) => d.name === name);
  }

  containsAddr(addr: Address): boolean {
    return this._inner.some((d) => d.addr === addr);
  }

  toArray(): readonly Dep[] {
    return this._inner;
  }

  withUnverifiedAllowed(unverifiedAllowed: boolean): Deps {
    return new Deps(this._inner, unverifiedAllowed);
  }
}
