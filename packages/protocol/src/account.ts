/**
 * Account — the intent lifecycle engine.
 *
 * A programmable multi-party wallet that executes intents only after its
 * policy approves them. The account is the single mutator of its intents
 * registry, lock set, deps, config, metadata and managed data; every other
 * component requests mutations through the methods below.
 *
 * Per intent key:
 *   absent → pending → (approved, awaiting execution time) → executing
 *          → confirmed (re-armed while times remain) → absent
 *   pending → expired → absent
 *
 * Rules:
 * - a call either fully succeeds or changes nothing
 * - every package calling back into the account is checked against Deps
 * - every action read is checked against the intent's Issuer
 * - Executable and Expired only exist inside a transaction, and are used
 *   up before it ends
 */

import type { Logger } from "pino";
import { isOwnedObject } from "@covenant/types";
import type {
  Address,
  Clock,
  DomainEvent,
  ObjectId,
  OwnedObject,
} from "@covenant/types";
import { decodeAction } from "./actions.js";
import type { ActionSpec } from "./actions.js";
import { Auth } from "./auth.js";
import type { Deps } from "./deps.js";
import { ProtocolError } from "./errors.js";
import { Executable } from "./executable.js";
import { Expired } from "./expired.js";
import { newIntent } from "./intent.js";
import type { Intent, IntentParams } from "./intent.js";
import { Intents } from "./intents.js";
import type { IntentsView } from "./intents.js";
import { Issuer } from "./issuer.js";
import { AccountJournal, createEvent } from "./journal.js";
import { silentLogger } from "./logger.js";
import type { ManagedKey } from "./managed.js";
import { Metadata } from "./metadata.js";
import { InMemoryObjectStore, newObjectId } from "./objects.js";
import type { ObjectStore } from "./objects.js";
import type { AccountPolicy } from "./policy.js";
import { CORE } from "./resource.js";
import type { LinearResource } from "./resource.js";
import { Transaction } from "./transaction.js";
import type { UndoStep } from "./transaction.js";
import { assertWitness, roleOf } from "./witness.js";
import type { VersionWitness, Witness } from "./witness.js";

// =============================================================================
// Types
// =============================================================================

export interface AccountOptions<Config, Outcome> {
  /** Defaults to a fresh object id */
  readonly address?: Address;
  readonly config: Config;
  readonly policy: AccountPolicy<Config, Outcome>;
  readonly deps: Deps;
  readonly metadata?: Metadata;
  readonly objects?: ObjectStore;
  readonly logger?: Logger;
  readonly journal?: AccountJournal;
}

export interface Execution<Outcome> {
  readonly executable: Executable;
  /** Outcome as it was when the policy approved the execution */
  readonly outcome: Outcome;
}

// =============================================================================
// Account
// =============================================================================

export class Account<Config, Outcome> {
  readonly address: Address;
  readonly policy: AccountPolicy<Config, Outcome>;
  readonly objects: ObjectStore;
  readonly logger: Logger;
  readonly journal: AccountJournal;

  private _config: Config;
  private _deps: Deps;
  private _metadata: Metadata;
  private readonly _intents = new Intents<Outcome>();
  private readonly _managed = new Map<string, unknown>();
  private readonly _executing = new Set<string>();

  private _tx: Transaction | undefined;
  private _loose: LinearResource[] = [];

  private constructor(options: AccountOptions<Config, Outcome>) {
    this.address = options.address ?? newObjectId();
    this.policy = options.policy;
    this.objects = options.objects ?? new InMemoryObjectStore();
    this.logger = (options.logger ?? silentLogger()).child({ account: this.address });
    this.journal = options.journal ?? new AccountJournal();
    this._config = options.config;
    this._deps = options.deps;
    this._metadata = options.metadata ?? Metadata.empty();
  }

  static new<Config, Outcome>(options: AccountOptions<Config, Outcome>): Account<Config, Outcome> {
    const account = new Account(options);
    account.logger.debug(
      { type: options.policy.name, deps: account.deps.length },
      "Account created",
    );
    return account;
  }

  // ───────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────

  get config(): Config {
    return this._config;
  }

  get deps(): Deps {
    return this._deps;
  }

  get metadata(): Metadata {
    return this._metadata;
  }

  get intents(): IntentsView<Outcome> {
    return this._intents;
  }

  /** True while an Executable for `key` is live. */
  isExecuting(key: string): boolean {
    return this._executing.has(key);
  }

  get inTransaction(): boolean {
    return this._tx !== undefined;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Auth
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Issue an Auth. Called by the policy module once it has recognised the
   * caller against its config.
   */
  newAuth(version: VersionWitness, configWitness: Witness): Auth {
    this._deps.check(version);
    this.assertConfigWitness(configWitness);
    return this.track(new Auth(this.address));
  }

  /**
   * Consume an Auth issued for this account.
   */
  verify(auth: Auth): void {
    this.assertAuth(auth);
    this.settle(auth);
  }

  /**
   * Throw WRONG_WITNESS unless `witness` is the config witness of this
   * account's policy.
   */
  assertConfigWitness(witness: Witness): void {
    assertWitness(witness, this.policy.configWitnessType, `Config of account ${this.address}`);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Intent creation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Build an intent draft. The caller appends actions, then admits it with
   * `addIntent` before the transaction ends.
   */
  createIntent(
    auth: Auth,
    params: IntentParams,
    outcome: Outcome,
    roleName: string,
    version: VersionWitness,
    witness: Witness,
  ): Intent<Outcome> {
    this.assertAuth(auth);
    this._deps.check(version);
    const issuer = Issuer.fromWitness(this.address, params.key, witness);
    const intent = newIntent(issuer, params, roleOf(witness, roleName), outcome);
    this.settle(auth);
    return this.track(intent);
  }

  /**
   * Admit a draft into the registry. After this the intent is visible to
   * the policy and its action list is sealed.
   */
  addIntent(intent: Intent<Outcome>, version: VersionWitness, witness: Witness): void {
    this._deps.check(version);
    intent.issuer.assertIsAccount(this.address);
    intent.issuer.assertIsIntent(witness);
    intent.assertLive();

    this._intents.add(intent);
    this.settle(intent);
    this.mutate(() => this._intents.remove(intent.key));

    this.emit("intent.added", intent.key, {
      key: intent.key,
      role: intent.role,
      intentType: intent.issuer.intentType,
      executionTimes: [...intent.executionTimes],
      expirationTime: intent.expirationTime,
      actionCount: intent.actionCount,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Policy hooks
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace an intent's outcome. Only the policy module holds the config
   * witness, so only it can record approvals.
   */
  updateOutcome(
    key: string,
    version: VersionWitness,
    configWitness: Witness,
    update: (outcome: Outcome) => Outcome,
  ): Outcome {
    this._deps.check(version);
    this.assertConfigWitness(configWitness);
    const intent = this._intents.get(key);
    const previous = intent.outcome;
    const next = update(previous);

    intent.replaceOutcome(CORE, next);
    this.mutate(() => intent.replaceOutcome(CORE, previous));
    this.emit("intent.outcome_updated", key, { key });
    return next;
  }

  updateConfig(
    version: VersionWitness,
    configWitness: Witness,
    update: (config: Config) => Config,
  ): Config {
    this._deps.check(version);
    this.assertConfigWitness(configWitness);
    const previous = this._config;
    const next = update(previous);

    this._config = next;
    this.mutate(() => {
      this._config = previous;
    });
    this.emit("config.updated", this.address, { type: this.policy.name });
    return next;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Start one execution of an intent.
   *
   * Due iff `now >= front(executionTimes)`; authorized iff the policy
   * accepts the current outcome under the intent's role. The front time is
   * popped only once both hold, inside the caller's transaction, so a
   * failed execution leaves the intent as it was.
   */
  executeIntent(key: string, clock: Clock, version: VersionWitness): Execution<Outcome> {
    this.assertInTransaction("executeIntent");
    this._deps.check(version);
    const intent = this._intents.get(key);
    if (this._executing.has(key)) {
      throw new ProtocolError(
        "EXECUTION_IN_PROGRESS",
        `Intent '${key}' is already being executed`,
      );
    }
    const front = intent.executionTimes[0];
    if (front === undefined) {
      throw new ProtocolError("NO_EXECUTION_TIME", `Intent '${key}' has no execution time left`);
    }
    const now = clock.now();
    if (now < front) {
      throw new ProtocolError(
        "CANT_BE_EXECUTED_YET",
        `Intent '${key}' can be executed at ${front}, now is ${now}`,
        { executionTime: front, now },
      );
    }
    const verdict = this.policy.validate(intent.outcome, this._config, intent.role);
    if (!verdict.ok) {
      throw verdict.error;
    }

    const popped = intent.popFrontExecutionTime(CORE);
    this.mutate(() => intent.restoreFrontExecutionTime(CORE, popped));
    this._executing.add(key);
    this.mutate(() => this._executing.delete(key));

    const executable = this.track(new Executable(intent.issuer));
    this.emit("intent.executed", key, {
      key,
      executionTime: popped,
      remainingExecutions: intent.executionTimes.length,
    });
    return { executable, outcome: intent.outcome };
  }

  /**
   * Read the next action of an executing intent as `spec`'s payload.
   */
  processAction<T>(
    executable: Executable,
    spec: ActionSpec<T>,
    version: VersionWitness,
    witness: Witness,
  ): T {
    executable.assertLive();
    this._deps.check(version);
    executable.issuer.assertIsAccount(this.address);
    executable.issuer.assertIsIntent(witness);

    const intent = this._intents.get(executable.intentKey);
    const entry = intent.actions[executable.actionIdx];
    if (entry === undefined) {
      throw new ProtocolError(
        "ACTION_NOT_FOUND",
        `Intent '${intent.key}' has no action at index ${executable.actionIdx}`,
      );
    }
    const payload = decodeAction(entry, spec);

    executable.nextAction(CORE);
    this.mutate(() => executable.rewind(CORE));
    return payload;
  }

  /**
   * Finish an execution once every action was processed.
   *
   * Returns the intent's actions for cleanup when this was its last
   * scheduled execution; the intent is then gone from the registry.
   */
  confirmExecution(executable: Executable, witness: Witness): Expired | undefined {
    executable.assertLive();
    executable.issuer.assertIsAccount(this.address);
    executable.issuer.assertIsIntent(witness);

    const key = executable.intentKey;
    const intent = this._intents.get(key);
    if (executable.actionIdx !== intent.actionCount) {
      throw new ProtocolError(
        "ACTIONS_REMAINING",
        `Intent '${key}' has ${intent.actionCount - executable.actionIdx} unprocessed action(s)`,
        { processed: executable.actionIdx, total: intent.actionCount },
      );
    }

    this.settle(executable);
    this._executing.delete(key);
    this.mutate(() => this._executing.add(key));

    if (intent.executionTimes.length > 0) {
      this.emit("intent.confirmed", key, {
        key,
        nextExecutionTime: intent.executionTimes[0],
      });
      return undefined;
    }
    return this.destroyIntent(key, "intent.destroyed");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Teardown
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Remove an intent whose expiration time has passed.
   */
  deleteExpiredIntent(key: string, clock: Clock): Expired {
    this.assertInTransaction("deleteExpiredIntent");
    const intent = this._intents.get(key);
    const now = clock.now();
    if (now < intent.expirationTime) {
      throw new ProtocolError(
        "HASNT_EXPIRED",
        `Intent '${key}' expires at ${intent.expirationTime}, now is ${now}`,
        { expirationTime: intent.expirationTime, now },
      );
    }
    this.assertNotExecuting(key);
    return this.destroyIntent(key, "intent.expired");
  }

  /**
   * Remove an intent with no execution time left.
   */
  destroyEmptyIntent(key: string): Expired {
    this.assertInTransaction("destroyEmptyIntent");
    const intent = this._intents.get(key);
    if (intent.executionTimes.length > 0) {
      throw new ProtocolError(
        "CANT_BE_REMOVED_YET",
        `Intent '${key}' still has ${intent.executionTimes.length} scheduled execution(s)`,
      );
    }
    this.assertNotExecuting(key);
    return this.destroyIntent(key, "intent.destroyed");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Object locks
  // ───────────────────────────────────────────────────────────────────────

  lockObject(id: ObjectId, version: VersionWitness): void {
    this._deps.check(version);
    this._intents.lock(id);
    this.mutate(() => this._intents.unlock(id));
    this.emit("object.locked", id, { objectId: id });
  }

  unlockObject(id: ObjectId, version: VersionWitness): void {
    this._deps.check(version);
    this._intents.unlock(id);
    this.mutate(() => this._intents.lock(id));
    this.emit("object.unlocked", id, { objectId: id });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owned objects
  // ───────────────────────────────────────────────────────────────────────

  /** Deposit an object into the account. Anyone may give. */
  keep(object: OwnedObject): void {
    if (!isOwnedObject(object)) {
      throw new ProtocolError("INVALID_OBJECT", "Objects need a hex id and a type");
    }
    this.objects.deposit(this.address, object);
    this.mutate(() => {
      this.objects.receive(this.address, object.id);
    });
  }

  /** Take an object the account owns out of the store. */
  receive(id: ObjectId, version: VersionWitness): OwnedObject {
    this._deps.check(version);
    const object = this.objects.receive(this.address, id);
    this.mutate(() => this.objects.deposit(this.address, object));
    return object;
  }

  /** Hand an object to `recipient`. */
  send(object: OwnedObject, recipient: Address, version: VersionWitness): void {
    this._deps.check(version);
    this.objects.deposit(recipient, object);
    this.mutate(() => {
      this.objects.receive(recipient, object.id);
    });
  }

  ownedObjects(): readonly OwnedObject[] {
    return this.objects.listOwned(this.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Managed data
  // ───────────────────────────────────────────────────────────────────────

  addManagedData<T>(key: ManagedKey<T>, value: T, version: VersionWitness): void {
    this._deps.check(version);
    if (this._managed.has(key.name)) {
      throw new ProtocolError(
        "MANAGED_DATA_ALREADY_EXISTS",
        `Managed data '${key.name}' already exists`,
      );
    }
    this.assertManagedValue(key, value);
    this._managed.set(key.name, value);
    this.mutate(() => this._managed.delete(key.name));
  }

  hasManagedData<T>(key: ManagedKey<T>): boolean {
    return this._managed.has(key.name);
  }

  getManagedData<T>(key: ManagedKey<T>): T {
    if (!this._managed.has(key.name)) {
      throw new ProtocolError("MANAGED_DATA_NOT_FOUND", `Managed data '${key.name}' not found`);
    }
    const value = this._managed.get(key.name);
    this.assertManagedValue(key, value);
    return value;
  }

  /**
   * Swap the value stored under `key`. Managed values are immutable;
   * modules build the next value and replace the old one.
   */
  replaceManagedData<T>(key: ManagedKey<T>, value: T, version: VersionWitness): T {
    this._deps.check(version);
    const previous = this.getManagedData(key);
    this.assertManagedValue(key, value);
    this._managed.set(key.name, value);
    this.mutate(() => this._managed.set(key.name, previous));
    return previous;
  }

  removeManagedData<T>(key: ManagedKey<T>, version: VersionWitness): T {
    this._deps.check(version);
    const previous = this.getManagedData(key);
    this._managed.delete(key.name);
    this.mutate(() => this._managed.set(key.name, previous));
    return previous;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Account config
  // ───────────────────────────────────────────────────────────────────────

  setMetadata(metadata: Metadata, version: VersionWitness): void {
    this._deps.check(version);
    const previous = this._metadata;
    this._metadata = metadata;
    this.mutate(() => {
      this._metadata = previous;
    });
    this.emit("metadata.updated", this.address, { metadata: metadata.toJSON() });
  }

  setDeps(deps: Deps, version: VersionWitness): void {
    this._deps.check(version);
    const previous = this._deps;
    this._deps = deps;
    this.mutate(() => {
      this._deps = previous;
    });
    this.emit("deps.updated", this.address, {
      deps: deps.toArray().map((d) => ({ ...d })),
      unverifiedAllowed: deps.unverifiedAllowed,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` as one all-or-nothing step.
   *
   * If `fn` throws, or leaves a linear resource it obtained unsettled, every
   * account mutation made inside is undone, the resources it obtained are
   * revoked and its events are dropped. `fn` must be synchronous.
   */
  transaction<R>(fn: (account: this) => R): R {
    if (this._tx !== undefined) {
      throw new ProtocolError(
        "TRANSACTION_IN_PROGRESS",
        `Account ${this.address} is already inside transaction ${this._tx.id}`,
      );
    }
    const tx = new Transaction();
    this._tx = tx;

    let result: R;
    try {
      result = fn(this);
      const unsettled = tx.unsettled();
      if (unsettled.length > 0) {
        throw new ProtocolError(
          "UNSETTLED_RESOURCES",
          `Transaction ended with ${unsettled.length} unsettled resource(s)`,
          { resources: unsettled.map((r) => r.describe()) },
        );
      }
    } catch (err) {
      tx.rollback();
      this._tx = undefined;
      this.logger.warn(
        { tx: tx.id, err: err instanceof Error ? err.message : String(err) },
        "Transaction rolled back",
      );
      throw err;
    }

    this._tx = undefined;
    this.journal.append(tx.events);
    this.logger.debug({ tx: tx.id, events: tx.events.length }, "Transaction committed");
    return result;
  }

  /**
   * Run `fn` inside the current transaction, or in a new one.
   *
   * Module entry points that make several account calls go through this.
   */
  atomic<R>(fn: () => R): R {
    return this._tx !== undefined ? fn() : this.transaction(() => fn());
  }

  /**
   * Linear resources obtained outside any transaction that are still live.
   */
  unsettledResources(): readonly LinearResource[] {
    this._loose = this._loose.filter((r) => r.state === "live");
    return [...this._loose];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private destroyIntent(key: string, eventType: "intent.destroyed" | "intent.expired"): Expired {
    const { intent, position } = this._intents.remove(key);
    this.mutate(() => this._intents.restore(intent, position));
    const expired = this.track(new Expired(intent.issuer, intent.actions));
    this.emit(eventType, key, { key, actionCount: intent.actionCount });
    return expired;
  }

  private assertAuth(auth: Auth): void {
    auth.assertLive();
    if (auth.accountAddress !== this.address) {
      throw new ProtocolError(
        "WRONG_ACCOUNT",
        `Auth was issued for account ${auth.accountAddress}, not ${this.address}`,
      );
    }
  }

  private assertInTransaction(operation: string): void {
    if (this._tx === undefined) {
      throw new ProtocolError(
        "TRANSACTION_REQUIRED",
        `${operation} on account ${this.address} must run inside a transaction`,
      );
    }
  }

  private assertNotExecuting(key: string): void {
    if (this._executing.has(key)) {
      throw new ProtocolError(
        "CANT_BE_REMOVED_YET",
        `Intent '${key}' is being executed`,
      );
    }
  }

  private assertManagedValue<T>(key: ManagedKey<T>, value: unknown): asserts value is T {
    if (!key.guard(value)) {
      throw new ProtocolError(
        "MANAGED_DATA_TYPE_MISMATCH",
        `Value stored under '${key.name}' does not match its key`,
      );
    }
  }

  private settle(resource: LinearResource): void {
    resource.settle(CORE);
    this.mutate(() => resource.reopen(CORE));
  }

  private track<R extends LinearResource>(resource: R): R {
    if (this._tx !== undefined) {
      this._tx.track(resource);
    } else {
      this._loose.push(resource);
    }
    return resource;
  }

  private mutate(undo: UndoStep): void {
    this._tx?.record(undo);
  }

  private emit(type: string, correlationId: string, payload: Readonly<Record<string, unknown>>): void {
    const event: DomainEvent = createEvent(type, this.address, correlationId, payload);
    this.logger.debug({ event: type, key: correlationId, ...payload }, type);
    if (this._tx !== undefined) {
      this._tx.stage(event);
    } else {
      this.journal.append([event]);
    }
  }
}

