/**
 * Vault — named coin balances held by an account.
 *
 * Each vault is managed data under "vault:<name>". Deposits take a coin
 * the account owns out of its objects and merge it into the vault's
 * balance for its coin type; spends split a new coin off it.
 */

import { z } from "zod";
import { defineAction, managedKey, newObjectId } from "@covenant/protocol";
import type {
  Account,
  ActionPayload,
  Auth,
  Executable,
  Expired,
  Intent,
  ManagedKey,
  Witness,
} from "@covenant/protocol";
import { isCoin } from "@covenant/types";
import type { Coin, ObjectId } from "@covenant/types";
import { ActionError } from "./errors.js";
import { ACTIONS_VERSION } from "./version.js";

// =============================================================================
// Vault data
// =============================================================================

export interface Vault {
  readonly name: string;
  /** Balance per coin type */
  readonly balances: Readonly<Record<string, bigint>>;
}

function isVault(value: unknown): value is Vault {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  if (typeof v["name"] !== "string") return false;
  const balances = v["balances"];
  return (
    typeof balances === "object" &&
    balances !== null &&
    Object.values(balances).every((b) => typeof b === "bigint")
  );
}

export function vaultKey(name: string): ManagedKey<Vault> {
  return managedKey(`vault:${name}`, isVault);
}

// =============================================================================
// Vault management
// =============================================================================

export function openVault<C, O>(auth: Auth, account: Account<C, O>, name: string): void {
  if (account.hasManagedData(vaultKey(name))) {
    throw new ActionError("VAULT_ALREADY_EXISTS", `Vault '${name}' already exists`);
  }
  account.atomic(() => {
    account.verify(auth);
    account.addManagedData(vaultKey(name), { name, balances: {} }, ACTIONS_VERSION);
  });
}

export function deposit<C, O>(auth: Auth, account: Account<C, O>, name: string, coinId: ObjectId): void {
  const vault = getVault(account, name);
  account.atomic(() => {
    account.verify(auth);
    const coin = receiveCoin(account, coinId);
    account.replaceManagedData(vaultKey(name), credit(vault, coin.coinType, coin.value), ACTIONS_VERSION);
  });
}

export function closeVault<C, O>(auth: Auth, account: Account<C, O>, name: string): void {
  const vault = getVault(account, name);
  const nonEmpty = Object.entries(vault.balances).filter(([, value]) => value > 0n);
  if (nonEmpty.length > 0) {
    throw new ActionError(
      "VAULT_NOT_EMPTY",
      `Vault '${name}' still holds ${nonEmpty.map(([type]) => type).join(", ")}`,
    );
  }
  account.atomic(() => {
    account.verify(auth);
    account.removeManagedData(vaultKey(name), ACTIONS_VERSION);
  });
}

export function hasVault<C, O>(account: Account<C, O>, name: string): boolean {
  return account.hasManagedData(vaultKey(name));
}

export function getVault<C, O>(account: Account<C, O>, name: string): Vault {
  if (!account.hasManagedData(vaultKey(name))) {
    throw new ActionError("VAULT_NOT_FOUND", `Vault '${name}' not found`);
  }
  return account.getManagedData(vaultKey(name));
}

export function vaultBalance<C, O>(account: Account<C, O>, name: string, coinType: string): bigint {
  return getVault(account, name).balances[coinType] ?? 0n;
}

// =============================================================================
// Actions
// =============================================================================

const AmountSchema = z.bigint().positive();

export const SpendAction = defineAction(
  "vault::Spend",
  z.object({ name: z.string(), coinType: z.string(), amount: AmountSchema }),
);

export const DepositAction = defineAction(
  "vault::Deposit",
  z.object({ name: z.string(), coinType: z.string(), amount: AmountSchema }),
);

export type Spend = ActionPayload<typeof SpendAction>;
export type Deposit = ActionPayload<typeof DepositAction>;

export function newSpend<O>(
  intent: Intent<O>,
  name: string,
  coinType: string,
  amount: bigint,
  witness: Witness,
): void {
  intent.addAction(SpendAction, { name, coinType, amount }, witness);
}

/**
 * Split `amount` off the vault balance into a fresh coin.
 */
export function doSpend<C, O>(executable: Executable, account: Account<C, O>, witness: Witness): Coin {
  const { name, coinType, amount } = account.processAction(
    executable,
    SpendAction,
    ACTIONS_VERSION,
    witness,
  );
  const vault = getVault(account, name);
  const balance = vault.balances[coinType] ?? 0n;
  if (balance < amount) {
    throw new ActionError(
      "INSUFFICIENT_BALANCE",
      `Vault '${name}' holds ${balance} ${coinType}, cannot spend ${amount}`,
    );
  }
  account.replaceManagedData(vaultKey(name), credit(vault, coinType, -amount), ACTIONS_VERSION);
  return { id: newObjectId(), type: "coin", coinType, value: amount };
}

export function deleteSpend(expired: Expired): void {
  expired.removeAction(SpendAction);
}

export function newDeposit<O>(
  intent: Intent<O>,
  name: string,
  coinType: string,
  amount: bigint,
  witness: Witness,
): void {
  intent.addAction(DepositAction, { name, coinType, amount }, witness);
}

/**
 * Merge the account's coin `coinId` into the vault. The coin must match
 * the proposed type and amount exactly.
 */
export function doDeposit<C, O>(
  executable: Executable,
  account: Account<C, O>,
  coinId: ObjectId,
  witness: Witness,
): void {
  const { name, coinType, amount } = account.processAction(
    executable,
    DepositAction,
    ACTIONS_VERSION,
    witness,
  );
  const coin = receiveCoin(account, coinId);
  if (coin.coinType !== coinType) {
    throw new ActionError("WRONG_COIN_TYPE", `Expected a ${coinType} coin, got ${coin.coinType}`);
  }
  if (coin.value !== amount) {
    throw new ActionError("WRONG_VALUE", `Expected a coin worth ${amount}, got ${coin.value}`);
  }
  const vault = getVault(account, name);
  account.replaceManagedData(vaultKey(name), credit(vault, coinType, amount), ACTIONS_VERSION);
}

export function deleteDeposit(expired: Expired): void {
  expired.removeAction(DepositAction);
}

// =============================================================================
// Private
// =============================================================================

/**
 * Take an unlocked coin out of the account's objects. Callers run inside
 * a transaction, so a later failure puts it back.
 */
function receiveCoin<C, O>(account: Account<C, O>, coinId: ObjectId): Coin {
  if (account.intents.isLocked(coinId)) {
    throw new ActionError("OBJECT_LOCKED", `Object ${coinId} is locked by a pending intent`);
  }
  const object = account.receive(coinId, ACTIONS_VERSION);
  if (!isCoin(object)) {
    throw new ActionError("NOT_COIN", `Object ${coinId} is a ${object.type}, not a coin`);
  }
  return object;
}

function credit(vault: Vault, coinType: string, delta: bigint): Vault {
  const next = (vault.balances[coinType] ?? 0n) + delta;
  const balances = { ...vault.balances };
  if (next === 0n) {
    delete balances[coinType];
  } else {
    balances[coinType] = next;
  }
  return { name: vault.name, balances };
}
