/**
 * Issuer — provenance of an intent.
 *
 * Binds an intent to the account it was created on and the witness type
 * that created it. Every action read or written through an intent,
 * executable or expired bag is checked against it first.
 */

import type { Address } from "@covenant/types";
import { ProtocolError } from "./errors.js";
import { assertWitness } from "./witness.js";
import type { Witness } from "./witness.js";

export class Issuer {
  readonly accountAddress: Address;
  readonly intentKey: string;
  readonly intentType: string;

  constructor(accountAddress: Address, intentKey: string, intentType: string) {
    this.accountAddress = accountAddress;
    this.intentKey = intentKey;
    this.intentType = intentType;
    Object.freeze(this);
  }

  static fromWitness(accountAddress: Address, intentKey: string, witness: Witness): Issuer {
    assertWitness(witness, witness.type, `Intent '${intentKey}'`);
    return new Issuer(accountAddress, intentKey, witness.type);
  }

  assertIsAccount(address: Address): void {
    if (address !== this.accountAddress) {
      throw new ProtocolError(
        "WRONG_ACCOUNT",
        `Intent '${this.intentKey}' belongs to account ${this.accountAddress}, not ${address}`,
      );
    }
  }

  assertIsIntent(witness: Witness): void {
    assertWitness(witness, this.intentType, `Intent '${this.intentKey}'`);
  }
}
