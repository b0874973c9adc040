/**
 * Owned withdraw actions.
 *
 * Reserve an object held by the account when the intent is proposed,
 * receive it when the intent executes, release the reservation when the
 * intent's actions are cleaned up.
 */

import { z } from "zod";
import { isObjectId } from "@covenant/types";
import type { ObjectId, OwnedObject } from "@covenant/types";
import type { Account } from "./account.js";
import { defineAction } from "./actions.js";
import type { ActionPayload } from "./actions.js";
import type { Executable } from "./executable.js";
import type { Expired } from "./expired.js";
import type { Intent } from "./intent.js";
import { PROTOCOL_VERSION } from "./version.js";
import type { Witness } from "./witness.js";

export const WithdrawAction = defineAction(
  "owned::Withdraw",
  z.object({ objectId: z.string().refine(isObjectId, "Expected a hex object id") }),
);

export type Withdraw = ActionPayload<typeof WithdrawAction>;

/**
 * Lock `objectId` and append a withdraw action to the draft. The lock is
 * released again if the action is refused.
 */
export function newWithdraw<C, O>(
  intent: Intent<O>,
  account: Account<C, O>,
  objectId: ObjectId,
  witness: Witness,
): void {
  intent.issuer.assertIsAccount(account.address);
  intent.issuer.assertIsIntent(witness);
  intent.assertDraft();

  account.atomic(() => {
    account.lockObject(objectId, PROTOCOL_VERSION);
    intent.addAction(WithdrawAction, { objectId }, witness);
  });
}

export function doWithdraw<C, O>(
  executable: Executable,
  account: Account<C, O>,
  witness: Witness,
): OwnedObject {
  const { objectId } = account.processAction(
    executable,
    WithdrawAction,
    PROTOCOL_VERSION,
    witness,
  );
  return account.receive(objectId, PROTOCOL_VERSION);
}

export function deleteWithdraw<C, O>(expired: Expired, account: Account<C, O>): void {
  expired.issuer.assertIsAccount(account.address);
  const { objectId } = expired.removeAction(WithdrawAction);
  account.unlockObject(objectId, PROTOCOL_VERSION);
}
