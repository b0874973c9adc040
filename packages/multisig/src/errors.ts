/**
 * Multisig errors.
 */

import type { ErrorKind } from "@covenant/protocol";

export type MultisigErrorCode =
  // policy
  | "NOT_MEMBER"
  | "ALREADY_APPROVED"
  | "NOT_APPROVED"
  | "THRESHOLD_NOT_REACHED"
  // validation
  | "MEMBERS_NOT_SAME_LENGTH"
  | "ROLES_NOT_SAME_LENGTH"
  | "DUPLICATE_MEMBER"
  | "DUPLICATE_ROLE"
  | "INVALID_WEIGHT"
  | "THRESHOLD_NULL"
  | "THRESHOLD_TOO_HIGH"
  | "ROLE_NOT_ADDED"
  | "ROLE_THRESHOLD_TOO_HIGH";

const KINDS: Record<MultisigErrorCode, ErrorKind> = {
  NOT_MEMBER: "policy",
  ALREADY_APPROVED: "policy",
  NOT_APPROVED: "policy",
  THRESHOLD_NOT_REACHED: "policy",
  MEMBERS_NOT_SAME_LENGTH: "validation",
  ROLES_NOT_SAME_LENGTH: "validation",
  DUPLICATE_MEMBER: "validation",
  DUPLICATE_ROLE: "validation",
  INVALID_WEIGHT: "validation",
  THRESHOLD_NULL: "validation",
  THRESHOLD_TOO_HIGH: "validation",
  ROLE_NOT_ADDED: "validation",
  ROLE_THRESHOLD_TOO_HIGH: "validation",
};

export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;
  public readonly kind: ErrorKind;

  constructor(code: MultisigErrorCode, message: string) {
    super(message);
    this.name = "MultisigError";
    this.code = code;
    this.kind = KINDS[code];
  }
}
