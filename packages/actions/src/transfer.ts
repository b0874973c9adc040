/**
 * Sending objects obtained earlier in the same execution.
 */

import { z } from "zod";
import { defineAction } from "@covenant/protocol";
import type { Account, ActionPayload, Executable, Expired, Intent, Witness } from "@covenant/protocol";
import { isAddress } from "@covenant/types";
import type { Address, OwnedObject } from "@covenant/types";
import { ACTIONS_VERSION } from "./version.js";

export const TransferAction = defineAction(
  "transfer::Transfer",
  z.object({ recipient: z.string().refine(isAddress, "Expected a hex address") }),
);

export type Transfer = ActionPayload<typeof TransferAction>;

export function newTransfer<O>(intent: Intent<O>, recipient: Address, witness: Witness): void {
  intent.addAction(TransferAction, { recipient }, witness);
}

export function doTransfer<C, O>(
  executable: Executable,
  account: Account<C, O>,
  object: OwnedObject,
  witness: Witness,
): void {
  const { recipient } = account.processAction(executable, TransferAction, ACTIONS_VERSION, witness);
  account.send(object, recipient, ACTIONS_VERSION);
}

export function deleteTransfer(expired: Expired): void {
  expired.removeAction(TransferAction);
}
