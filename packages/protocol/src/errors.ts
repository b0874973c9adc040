/**
 * Protocol errors.
 *
 * Every failure in the engine is fatal to the current call: there is no
 * local recovery. Codes are grouped into kinds so callers can tell a
 * premature request (retry later) from a provenance or invariant violation
 * (never retry).
 */

export type ErrorKind =
  | "provenance"
  | "temporal"
  | "state"
  | "policy"
  | "dependency"
  | "validation";

export type ProtocolErrorCode =
  // provenance
  | "WRONG_ACCOUNT"
  | "WRONG_WITNESS"
  | "WITNESS_ALREADY_DEFINED"
  // temporal
  | "CANT_BE_EXECUTED_YET"
  | "HASNT_EXPIRED"
  | "EXECUTION_TIMES_NOT_ASCENDING"
  | "NO_EXECUTION_TIME"
  // state
  | "KEY_ALREADY_EXISTS"
  | "INTENT_NOT_FOUND"
  | "INTENT_ALREADY_ADDED"
  | "OBJECT_ALREADY_LOCKED"
  | "OBJECT_NOT_LOCKED"
  | "ACTIONS_NOT_EMPTY"
  | "ACTIONS_REMAINING"
  | "ACTION_NOT_FOUND"
  | "CANT_BE_REMOVED_YET"
  | "EXECUTION_IN_PROGRESS"
  | "RESOURCE_CONSUMED"
  | "UNSETTLED_RESOURCES"
  | "NOT_STORABLE"
  | "TRANSACTION_IN_PROGRESS"
  | "TRANSACTION_REQUIRED"
  | "OBJECT_NOT_FOUND"
  | "OBJECT_ALREADY_EXISTS"
  | "WRONG_OWNER"
  | "MANAGED_DATA_NOT_FOUND"
  | "MANAGED_DATA_ALREADY_EXISTS"
  | "USER_ALREADY_EXISTS"
  | "USER_NOT_FOUND"
  | "USER_NOT_EMPTY"
  | "ACCOUNT_ALREADY_REGISTERED"
  | "ACCOUNT_NOT_FOUND"
  | "WRONG_RECIPIENT"
  // validation
  | "INVALID_PARAMS"
  | "INVALID_OBJECT"
  | "WRONG_ACTION_TYPE"
  | "MANAGED_DATA_TYPE_MISMATCH"
  | "METADATA_NOT_SAME_LENGTH"
  | "METADATA_NAME_MISSING"
  | "METADATA_KEY_EXISTS"
  | "NAME_CANNOT_BE_EMPTY"
  // dependency
  | "NOT_DEP"
  | "NOT_EXTENSION"
  | "DEP_ALREADY_EXISTS"
  | "DEPS_NOT_SAME_LENGTH"
  | "ACCOUNT_PROTOCOL_MISSING"
  | "EXTENSION_NOT_FOUND"
  | "EXTENSION_ALREADY_EXISTS"
  | "CANNOT_REMOVE_ACCOUNT_PROTOCOL"
  | "VERSION_NOT_INCREASING"
  | "NOT_ADMIN";

export const ERROR_KINDS = {
  WRONG_ACCOUNT: "provenance",
  WRONG_WITNESS: "provenance",
  WITNESS_ALREADY_DEFINED: "provenance",

  CANT_BE_EXECUTED_YET: "temporal",
  HASNT_EXPIRED: "temporal",
  EXECUTION_TIMES_NOT_ASCENDING: "temporal",
  NO_EXECUTION_TIME: "temporal",

  KEY_ALREADY_EXISTS: "state",
  INTENT_NOT_FOUND: "state",
  INTENT_ALREADY_ADDED: "state",
  OBJECT_ALREADY_LOCKED: "state",
  OBJECT_NOT_LOCKED: "state",
  ACTIONS_NOT_EMPTY: "state",
  ACTIONS_REMAINING: "state",
  ACTION_NOT_FOUND: "state",
  CANT_BE_REMOVED_YET: "state",
  EXECUTION_IN_PROGRESS: "state",
  RESOURCE_CONSUMED: "state",
  UNSETTLED_RESOURCES: "state",
  NOT_STORABLE: "state",
  TRANSACTION_IN_PROGRESS: "state",
  TRANSACTION_REQUIRED: "state",
  OBJECT_NOT_FOUND: "state",
  OBJECT_ALREADY_EXISTS: "state",
  WRONG_OWNER: "state",
  MANAGED_DATA_NOT_FOUND: "state",
  MANAGED_DATA_ALREADY_EXISTS: "state",
  USER_ALREADY_EXISTS: "state",
  USER_NOT_FOUND: "state",
  USER_NOT_EMPTY: "state",
  ACCOUNT_ALREADY_REGISTERED: "state",
  ACCOUNT_NOT_FOUND: "state",
  WRONG_RECIPIENT: "state",

  INVALID_PARAMS: "validation",
  INVALID_OBJECT: "validation",
  WRONG_ACTION_TYPE: "validation",
  MANAGED_DATA_TYPE_MISMATCH: "validation",
  METADATA_NOT_SAME_LENGTH: "validation",
  METADATA_NAME_MISSING: "validation",
  METADATA_KEY_EXISTS: "validation",
  NAME_CANNOT_BE_EMPTY: "validation",

  NOT_DEP: "dependency",
  NOT_EXTENSION: "dependency",
  DEP_ALREADY_EXISTS: "dependency",
  DEPS_NOT_SAME_LENGTH: "dependency",
  ACCOUNT_PROTOCOL_MISSING: "dependency",
  EXTENSION_NOT_FOUND: "dependency",
  EXTENSION_ALREADY_EXISTS: "dependency",
  CANNOT_REMOVE_ACCOUNT_PROTOCOL: "dependency",
  VERSION_NOT_INCREASING: "dependency",
  NOT_ADMIN: "dependency",
} as const satisfies Record<ProtocolErrorCode, ErrorKind>;

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  public readonly kind: ErrorKind;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: ProtocolErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.kind = ERROR_KINDS[code];
    this.details = details;
  }
}

/**
 * Narrow an unknown thrown value to a ProtocolError with the given code.
 */
export function isProtocolError(
  err: unknown,
  code?: ProtocolErrorCode,
): err is ProtocolError {
  return err instanceof ProtocolError && (code === undefined || err.code === code);
}
