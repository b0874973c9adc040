/**
 * Witnesses — capability values that stand in for a module's identity.
 *
 * An intent witness is created once by the module that owns an intent
 * type and is never handed out. Presenting it proves the caller is that
 * module. A version witness names the calling package and is what an
 * account's Deps allow-list gates on.
 *
 * Each witness type, and each package's version witness, can be defined
 * once per process. Checks compare the presented object with the one on
 * record, so a value built to look like a witness is refused.
 */

import type { Address } from "@covenant/types";
import { ProtocolError } from "./errors.js";

export interface Witness {
  readonly packageAddress: Address;
  readonly module: string;
  readonly name: string;

  /** Fully qualified type: "<package>::<module>::<name>" */
  readonly type: string;
}

export interface VersionWitness {
  readonly packageAddress: Address;
  readonly version: number;
}

const witnesses = new Map<string, Witness>();
const versions = new Map<Address, VersionWitness>();

export function defineWitness(
  packageAddress: Address,
  module: string,
  name: string,
): Witness {
  const type = `${packageAddress}::${module}::${name}`;
  if (witnesses.has(type)) {
    throw new ProtocolError("WITNESS_ALREADY_DEFINED", `Witness ${type} is already defined`);
  }
  const witness = Object.freeze({ packageAddress, module, name, type });
  witnesses.set(type, witness);
  return witness;
}

export function versionWitness(
  packageAddress: Address,
  version: number,
): VersionWitness {
  if (versions.has(packageAddress)) {
    throw new ProtocolError(
      "WITNESS_ALREADY_DEFINED",
      `Version witness of package ${packageAddress} is already defined`,
    );
  }
  const witness = Object.freeze({ packageAddress, version });
  versions.set(packageAddress, witness);
  return witness;
}

/** True when `witness` is the one `defineWitness` returned for its type. */
export function isDefinedWitness(witness: Witness): boolean {
  return witnesses.get(witness.type) === witness;
}

/** True when `witness` is the one `versionWitness` returned for its package. */
export function isDefinedVersion(witness: VersionWitness): boolean {
  return versions.get(witness.packageAddress) === witness;
}

/**
 * Throw WRONG_WITNESS unless `witness` is the defined witness of `type`.
 */
export function assertWitness(witness: Witness, type: string, owner: string): void {
  if (witness.type !== type || !isDefinedWitness(witness)) {
    throw new ProtocolError(
      "WRONG_WITNESS",
      `${owner} is owned by ${type}, not ${witness.type}`,
    );
  }
}

/**
 * Role an intent is approved under.
 *
 * Derived from the witness' package and module so that two modules can
 * never share a role by accident; `roleName` narrows it further (a vault
 * name, a coin type).
 */
export function roleOf(witness: Witness, roleName: string): string {
  const base = `${witness.packageAddress}::${witness.module}`;
  return roleName.length > 0 ? `${base}::${roleName}` : base;
}
