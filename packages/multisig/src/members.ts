/**
 * Invites and the user registry, seen from a multisig.
 */

import { Invite } from "@covenant/protocol";
import type { User } from "@covenant/protocol";
import type { Address } from "@covenant/types";
import { MultisigError } from "./errors.js";
import { ConfigWitness } from "./multisig.js";
import type { MultisigAccount } from "./multisig.js";
import { isMember } from "./rules.js";

/**
 * Invite a member who has not yet registered the account in its user.
 */
export function sendInvite(account: MultisigAccount, sender: Address, recipient: Address): Invite {
  assertMember(account, sender);
  assertMember(account, recipient);
  return Invite.new(account, recipient, ConfigWitness);
}

/** Register the account in a member's user. */
export function join(user: User, account: MultisigAccount): void {
  assertMember(account, user.owner);
  user.addAccount(account, ConfigWitness);
}

/** Unregister the account from a user, member or not. */
export function leave(user: User, account: MultisigAccount): void {
  user.removeAccount(account, ConfigWitness);
}

function assertMember(account: MultisigAccount, addr: Address): void {
  if (!isMember(account.config, addr)) {
    throw new MultisigError("NOT_MEMBER", `${addr} is not a member of ${account.address}`);
  }
}
