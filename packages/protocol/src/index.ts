/**
 * @covenant/protocol — Intent lifecycle engine for smart accounts.
 *
 * Accounts execute intents (ordered batches of typed actions) only after
 * their pluggable policy approves them, exactly once per scheduled time,
 * with object locks keeping concurrent proposals from claiming the same
 * resource.
 */

// Errors
export { ProtocolError, isProtocolError, ERROR_KINDS } from "./errors.js";
export type { ErrorKind, ProtocolErrorCode } from "./errors.js";

// Capabilities
export { defineWitness, versionWitness, roleOf } from "./witness.js";
export type { Witness, VersionWitness } from "./witness.js";
export { Issuer } from "./issuer.js";
export type { Auth } from "./auth.js";
export type { Executable } from "./executable.js";
export type { Expired } from "./expired.js";
export type { LinearResource, ResourceKind, ResourceState } from "./resource.js";

// Actions & intents
export { defineAction, encodeAction, decodeAction } from "./actions.js";
export type { ActionSpec, ActionEntry, ActionPayload } from "./actions.js";
export { newParams, newIntent, IntentParamsInputSchema } from "./intent.js";
export type { Intent, IntentParams, IntentParamsInput } from "./intent.js";
export type { IntentsView } from "./intents.js";

// Account
export { Account } from "./account.js";
export type { AccountOptions, Execution } from "./account.js";
export { APPROVED, rejected } from "./policy.js";
export type { AccountPolicy, PolicyVerdict } from "./policy.js";
export { managedKey } from "./managed.js";
export type { ManagedKey } from "./managed.js";
export { Deps } from "./deps.js";
export type { Dep } from "./deps.js";
export { Extensions, AdminCap, ACCOUNT_PROTOCOL } from "./extensions.js";
export type { Extension, ExtensionVersion } from "./extensions.js";
export { Metadata } from "./metadata.js";
export {
  PROTOCOL_NAME,
  PROTOCOL_ADDRESS,
  PROTOCOL_VERSION_NUMBER,
} from "./version.js";

// Objects
export { InMemoryObjectStore, newObjectId } from "./objects.js";
export type { ObjectStore } from "./objects.js";
export { WithdrawAction, newWithdraw, doWithdraw, deleteWithdraw } from "./owned.js";
export type { Withdraw } from "./owned.js";

// Account config intents
export {
  ConfigMetadataAction,
  ConfigDepsAction,
  ToggleUnverifiedAllowedAction,
  CONFIG_INTENT_TYPES,
  requestConfigMetadata,
  executeConfigMetadata,
  deleteConfigMetadata,
  requestConfigDeps,
  executeConfigDeps,
  deleteConfigDeps,
  requestToggleUnverifiedAllowed,
  executeToggleUnverifiedAllowed,
  deleteToggleUnverifiedAllowed,
} from "./config-intents.js";

// Users
export { User, UserRegistry, Invite, acceptInvite, refuseInvite } from "./user.js";

// Journal
export {
  AccountJournal,
  GENESIS_HASH,
  computeEntryHash,
  verifyJournal,
  createEvent,
} from "./journal.js";
export type {
  JournalEntry,
  JournalHandler,
  JournalSubscription,
  JournalIntegrityResult,
  JournalIntegrityError,
} from "./journal.js";

// Ambient
export { loadConfig, ConfigSchema } from "./config.js";
export type { CovenantConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
