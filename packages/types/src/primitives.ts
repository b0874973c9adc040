/**
 * Primitive Types
 *
 * Identity and time primitives consumed from the host chain.
 * The engine never interprets them beyond equality and ordering.
 */

/**
 * On-chain address of an account or a package (0x-prefixed lowercase hex).
 */
export type Address = string;

/**
 * Identifier of an owned object (0x-prefixed lowercase hex).
 */
export type ObjectId = string;

/**
 * Milliseconds since the Unix epoch.
 */
export type Timestamp = number;

/**
 * Source of the current time. Execution and expiry gates read it once per call.
 */
export interface Clock {
  now(): Timestamp;
}
