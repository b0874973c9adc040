/**
 * @covenant/types — Shared domain types for the Covenant stack.
 *
 * These types are used across all Covenant packages:
 * - Addresses, object IDs and time
 * - Owned objects (coins, treasury caps)
 * - Domain events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type { Address, ObjectId, Timestamp, Clock } from "./primitives.js";
export type { OwnedObject, Coin, TreasuryCap } from "./objects.js";
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isAddress,
  isObjectId,
  isOwnedObject,
  isCoin,
  isTreasuryCap,
} from "./guards.js";
