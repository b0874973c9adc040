/**
 * Currency — a treasury cap locked into an account, with rules.
 *
 * Rules:
 * - minting and burning can each be disabled, permanently
 * - total supply never exceeds the max supply, when one is set
 * - burned coins must match the proposed coin type and amount exactly
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
import { isTreasuryCap } from "@covenant/types";
import type { Coin, ObjectId, TreasuryCap } from "@covenant/types";
import { ActionError } from "./errors.js";
import { ACTIONS_VERSION } from "./version.js";

// =============================================================================
// Locked cap
// =============================================================================

export interface CurrencyRules {
  readonly cap: TreasuryCap;
  /** No limit when null */
  readonly maxSupply: bigint | null;
  readonly totalMinted: bigint;
  readonly totalBurned: bigint;
  readonly canMint: boolean;
  readonly canBurn: boolean;
}

function isCurrencyRules(value: unknown): value is CurrencyRules {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    isTreasuryCap(v["cap"]) &&
    (v["maxSupply"] === null || typeof v["maxSupply"] === "bigint") &&
    typeof v["totalMinted"] === "bigint" &&
    typeof v["totalBurned"] === "bigint" &&
    typeof v["canMint"] === "boolean" &&
    typeof v["canBurn"] === "boolean"
  );
}

export function capKey(coinType: string): ManagedKey<CurrencyRules> {
  return managedKey(`currency:${coinType}`, isCurrencyRules);
}

/**
 * Move the treasury cap `capId`, owned by the account, under the
 * account's rules.
 */
export function lockCap<C, O>(
  auth: Auth,
  account: Account<C, O>,
  capId: ObjectId,
  maxSupply?: bigint,
): void {
  if (account.intents.isLocked(capId)) {
    throw new ActionError("OBJECT_LOCKED", `Object ${capId} is locked by a pending intent`);
  }
  account.atomic(() => {
    account.verify(auth);
    const cap = account.receive(capId, ACTIONS_VERSION);
    if (!isTreasuryCap(cap)) {
      throw new ActionError("NOT_TREASURY_CAP", `Object ${capId} is a ${cap.type}, not a treasury cap`);
    }
    if (account.hasManagedData(capKey(cap.coinType))) {
      throw new ActionError("CAP_ALREADY_LOCKED", `A ${cap.coinType} cap is already locked`);
    }
    account.addManagedData(
      capKey(cap.coinType),
      {
        cap,
        maxSupply: maxSupply ?? null,
        totalMinted: 0n,
        totalBurned: 0n,
        canMint: true,
        canBurn: true,
      },
      ACTIONS_VERSION,
    );
  });
}

export function hasCap<C, O>(account: Account<C, O>, coinType: string): boolean {
  return account.hasManagedData(capKey(coinType));
}

export function coinRules<C, O>(account: Account<C, O>, coinType: string): CurrencyRules {
  if (!hasCap(account, coinType)) {
    throw new ActionError("CAP_NOT_LOCKED", `No ${coinType} cap is locked in ${account.address}`);
  }
  return account.getManagedData(capKey(coinType));
}

// =============================================================================
// Actions
// =============================================================================

export const MintAction = defineAction(
  "currency::Mint",
  z.object({ coinType: z.string(), amount: z.bigint().positive() }),
);

export const BurnAction = defineAction(
  "currency::Burn",
  z.object({ coinType: z.string(), amount: z.bigint().positive() }),
);

export const DisableAction = defineAction(
  "currency::Disable",
  z.object({ coinType: z.string(), mint: z.boolean(), burn: z.boolean() }),
);

export type Mint = ActionPayload<typeof MintAction>;
export type Burn = ActionPayload<typeof BurnAction>;
export type Disable = ActionPayload<typeof DisableAction>;

// ─── Mint ───────────────────────────────────────────────────────────

export function newMint<C, O>(
  intent: Intent<O>,
  account: Account<C, O>,
  coinType: string,
  amount: bigint,
  witness: Witness,
): void {
  if (!coinRules(account, coinType).canMint) {
    throw new ActionError("MINT_DISABLED", `Minting ${coinType} is disabled`);
  }
  intent.addAction(MintAction, { coinType, amount }, witness);
}

export function doMint<C, O>(executable: Executable, account: Account<C, O>, witness: Witness): Coin {
  const { coinType, amount } = account.processAction(executable, MintAction, ACTIONS_VERSION, witness);
  const rules = coinRules(account, coinType);
  if (!rules.canMint) {
    throw new ActionError("MINT_DISABLED", `Minting ${coinType} is disabled`);
  }
  const supply = rules.cap.totalSupply + amount;
  if (rules.maxSupply !== null && supply > rules.maxSupply) {
    throw new ActionError(
      "MAX_SUPPLY_REACHED",
      `Minting ${amount} would bring ${coinType} supply to ${supply}, above ${rules.maxSupply}`,
    );
  }
  account.replaceManagedData(
    capKey(coinType),
    {
      ...rules,
      cap: { ...rules.cap, totalSupply: supply },
      totalMinted: rules.totalMinted + amount,
    },
    ACTIONS_VERSION,
  );
  return { id: newObjectId(), type: "coin", coinType, value: amount };
}

export function deleteMint(expired: Expired): void {
  expired.removeAction(MintAction);
}

// ─── Burn ───────────────────────────────────────────────────────────

export function newBurn<C, O>(
  intent: Intent<O>,
  account: Account<C, O>,
  coinType: string,
  amount: bigint,
  witness: Witness,
): void {
  if (!coinRules(account, coinType).canBurn) {
    throw new ActionError("BURN_DISABLED", `Burning ${coinType} is disabled`);
  }
  intent.addAction(BurnAction, { coinType, amount }, witness);
}

export function doBurn<C, O>(
  executable: Executable,
  account: Account<C, O>,
  coin: Coin,
  witness: Witness,
): void {
  const { coinType, amount } = account.processAction(executable, BurnAction, ACTIONS_VERSION, witness);
  if (coin.coinType !== coinType) {
    throw new ActionError("WRONG_COIN_TYPE", `Expected a ${coinType} coin, got ${coin.coinType}`);
  }
  if (coin.value !== amount) {
    throw new ActionError("WRONG_VALUE", `Expected a coin worth ${amount}, got ${coin.value}`);
  }
  const rules = coinRules(account, coinType);
  if (!rules.canBurn) {
    throw new ActionError("BURN_DISABLED", `Burning ${coinType} is disabled`);
  }
  account.replaceManagedData(
    capKey(coinType),
    {
      ...rules,
      cap: { ...rules.cap, totalSupply: rules.cap.totalSupply - amount },
      totalBurned: rules.totalBurned + amount,
    },
    ACTIONS_VERSION,
  );
}

export function deleteBurn(expired: Expired): void {
  expired.removeAction(BurnAction);
}

// ─── Disable ────────────────────────────────────────────────────────

export function newDisable<C, O>(
  intent: Intent<O>,
  account: Account<C, O>,
  coinType: string,
  flags: { readonly mint: boolean; readonly burn: boolean },
  witness: Witness,
): void {
  coinRules(account, coinType);
  intent.addAction(DisableAction, { coinType, mint: flags.mint, burn: flags.burn }, witness);
}

export function doDisable<C, O>(executable: Executable, account: Account<C, O>, witness: Witness): void {
  const { coinType, mint, burn } = account.processAction(
    executable,
    DisableAction,
    ACTIONS_VERSION,
    witness,
  );
  const rules = coinRules(account, coinType);
  account.replaceManagedData(
    capKey(coinType),
    {
      ...rules,
      canMint: rules.canMint && !mint,
      canBurn: rules.canBurn && !burn,
    },
    ACTIONS_VERSION,
  );
}

export function deleteDisable(expired: Expired): void {
  expired.removeAction(DisableAction);
}
