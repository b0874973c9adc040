/**
 * Action module errors.
 */

import type { ErrorKind } from "@covenant/protocol";

export type ActionErrorCode =
  | "NOT_SAME_LENGTH"
  | "NOT_COIN"
  | "OBJECT_LOCKED"
  // vault
  | "VAULT_ALREADY_EXISTS"
  | "VAULT_NOT_FOUND"
  | "VAULT_NOT_EMPTY"
  | "INSUFFICIENT_BALANCE"
  // currency
  | "NOT_TREASURY_CAP"
  | "CAP_ALREADY_LOCKED"
  | "CAP_NOT_LOCKED"
  | "MINT_DISABLED"
  | "BURN_DISABLED"
  | "MAX_SUPPLY_REACHED"
  | "WRONG_COIN_TYPE"
  | "WRONG_VALUE"
  | "INVALID_AMOUNT";

const KINDS: Record<ActionErrorCode, ErrorKind> = {
  NOT_SAME_LENGTH: "validation",
  NOT_COIN: "validation",
  OBJECT_LOCKED: "state",
  VAULT_ALREADY_EXISTS: "state",
  VAULT_NOT_FOUND: "state",
  VAULT_NOT_EMPTY: "state",
  INSUFFICIENT_BALANCE: "state",
  NOT_TREASURY_CAP: "validation",
  CAP_ALREADY_LOCKED: "state",
  CAP_NOT_LOCKED: "state",
  MINT_DISABLED: "state",
  BURN_DISABLED: "state",
  MAX_SUPPLY_REACHED: "state",
  WRONG_COIN_TYPE: "validation",
  WRONG_VALUE: "validation",
  INVALID_AMOUNT: "validation",
};

export class ActionError extends Error {
  public readonly code: ActionErrorCode;
  public readonly kind: ErrorKind;

  constructor(code: ActionErrorCode, message: string) {
    super(message);
    this.name = "ActionError";
    this.code = code;
    this.kind = KINDS[code];
  }
}
