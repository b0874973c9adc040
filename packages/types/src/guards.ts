/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used where values enter the account: action payloads and objects handed
 * to it.
 */

import type { Address, ObjectId } from "./primitives.js";
import type { Coin, OwnedObject, TreasuryCap } from "./objects.js";

const HEX_ID = /^0x[0-9a-f]{1,64}$/;

// =============================================================================
// Primitive guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && HEX_ID.test(value);
}

export function isObjectId(value: unknown): value is ObjectId {
  return typeof value === "string" && HEX_ID.test(value);
}

// =============================================================================
// Object guards
// =============================================================================

export function isOwnedObject(value: unknown): value is OwnedObject {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isObjectId(v.id) && typeof v.type === "string" && v.type.length > 0;
}

export function isCoin(value: unknown): value is Coin {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isObjectId(v.id) &&
    v.type === "coin" &&
    typeof v.coinType === "string" &&
    typeof v.value === "bigint" &&
    v.value >= 0n
  );
}

export function isTreasuryCap(value: unknown): value is TreasuryCap {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isObjectId(v.id) &&
    v.type === "treasury_cap" &&
    typeof v.coinType === "string" &&
    typeof v.totalSupply === "bigint" &&
    v.totalSupply >= 0n
  );
}
