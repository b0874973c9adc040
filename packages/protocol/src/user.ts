/**
 * User registry — which accounts each address belongs to.
 *
 * A user holds the addresses of the accounts it has joined, grouped by
 * account type. Only the module that owns an account's config can add or
 * remove that account, either directly or through an invite the recipient
 * accepts.
 */

import type { Address } from "@covenant/types";
import type { Account } from "./account.js";
import { ProtocolError } from "./errors.js";
import type { Witness } from "./witness.js";

// =============================================================================
// User
// =============================================================================

export class User {
  readonly owner: Address;
  private readonly _accounts = new Map<string, Address[]>();

  /** @internal created by UserRegistry */
  constructor(owner: Address) {
    this.owner = owner;
  }

  accountsOf(accountType: string): readonly Address[] {
    return [...(this._accounts.get(accountType) ?? [])];
  }

  accountTypes(): readonly string[] {
    return [...this._accounts.keys()];
  }

  get isEmpty(): boolean {
    return this._accounts.size === 0;
  }

  addAccount<C, O>(account: Account<C, O>, configWitness: Witness): void {
    account.assertConfigWitness(configWitness);
    this.register(account.policy.name, account.address);
  }

  removeAccount<C, O>(account: Account<C, O>, configWitness: Witness): void {
    account.assertConfigWitness(configWitness);
    const type = account.policy.name;
    const list = this._accounts.get(type) ?? [];
    const idx = list.indexOf(account.address);
    if (idx === -1) {
      throw new ProtocolError(
        "ACCOUNT_NOT_FOUND",
        `Account ${account.address} is not registered for user ${this.owner}`,
      );
    }
    list.splice(idx, 1);
    if (list.length === 0) {
      this._accounts.delete(type);
    }
  }

  /**
   * Register the account an invite names. The invite is used up.
   */
  accept(invite: Invite): void {
    if (invite.recipient !== this.owner) {
      throw new ProtocolError(
        "WRONG_RECIPIENT",
        `Invite is for ${invite.recipient}, not ${this.owner}`,
      );
    }
    invite.assertUnused();
    this.register(invite.accountType, invite.accountAddress);
    invite.consume();
  }

  private register(accountType: string, address: Address): void {
    const list = this._accounts.get(accountType) ?? [];
    if (list.includes(address)) {
      throw new ProtocolError(
        "ACCOUNT_ALREADY_REGISTERED",
        `Account ${address} is already registered for user ${this.owner}`,
      );
    }
    this._accounts.set(accountType, [...list, address]);
  }
}

// =============================================================================
// Registry
// =============================================================================

export class UserRegistry {
  private readonly _users = new Map<Address, User>();

  create(owner: Address): User {
    if (this._users.has(owner)) {
      throw new ProtocolError("USER_ALREADY_EXISTS", `User ${owner} already exists`);
    }
    const user = new User(owner);
    this._users.set(owner, user);
    return user;
  }

  get(owner: Address): User {
    const user = this._users.get(owner);
    if (user === undefined) {
      throw new ProtocolError("USER_NOT_FOUND", `User ${owner} not found`);
    }
    return user;
  }

  has(owner: Address): boolean {
    return this._users.has(owner);
  }

  /** Remove a user that no longer belongs to any account. */
  destroy(user: User): void {
    this.get(user.owner);
    if (!user.isEmpty) {
      throw new ProtocolError(
        "USER_NOT_EMPTY",
        `User ${user.owner} still belongs to ${user.accountTypes().length} account type(s)`,
      );
    }
    this._users.delete(user.owner);
  }

  get size(): number {
    return this._users.size;
  }
}

// =============================================================================
// Invites
// =============================================================================

export class Invite {
  readonly accountAddress: Address;
  readonly accountType: string;
  readonly recipient: Address;
  private _used = false;

  private constructor(accountAddress: Address, accountType: string, recipient: Address) {
    this.accountAddress = accountAddress;
    this.accountType = accountType;
    this.recipient = recipient;
  }

  /**
   * Invite `recipient` to register the account in its user.
   */
  static new<C, O>(account: Account<C, O>, recipient: Address, configWitness: Witness): Invite {
    account.assertConfigWitness(configWitness);
    return new Invite(account.address, account.policy.name, recipient);
  }

  get used(): boolean {
    return this._used;
  }

  assertUnused(): void {
    if (this._used) {
      throw new ProtocolError(
        "RESOURCE_CONSUMED",
        `Invite to account ${this.accountAddress} was already used`,
      );
    }
  }

  consume(): void {
    this.assertUnused();
    this._used = true;
  }
}

export function acceptInvite(user: User, invite: Invite): void {
  user.accept(invite);
}

export function refuseInvite(invite: Invite): void {
  invite.consume();
}
