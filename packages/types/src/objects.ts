/**
 * Owned Object Types
 *
 * Objects an address can own, receive and hand over.
 * The intent engine treats them as opaque; action modules narrow them
 * with the guards in ./guards.ts.
 */

import type { ObjectId } from "./primitives.js";

/**
 * Base shape of every object held by an address.
 */
export interface OwnedObject {
  readonly id: ObjectId;

  /** Object kind ("coin", "treasury_cap", or a module-defined kind) */
  readonly type: string;
}

/**
 * A fungible balance of a single coin type.
 */
export interface Coin extends OwnedObject {
  readonly type: "coin";

  /** Fully qualified coin type (e.g. "0x2::usdc::USDC") */
  readonly coinType: string;

  /** Amount in the coin's smallest unit */
  readonly value: bigint;
}

/**
 * Capability to mint and burn one coin type.
 */
export interface TreasuryCap extends OwnedObject {
  readonly type: "treasury_cap";
  readonly coinType: string;

  /** Circulating supply tracked by the cap */
  readonly totalSupply: bigint;
}
