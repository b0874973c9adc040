/**
 * Tests for locked treasury caps: mint, burn and disable rules through
 * the currency intents.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { authenticate, emptyApprovals } from "@covenant/multisig";
import type { MultisigAccount } from "@covenant/multisig";
import { coinRules, hasCap, lockCap } from "../src/currency.js";
import {
  deleteMintAndTransfer,
  deleteWithdrawAndBurn,
  executeDisableRules,
  executeMintAndTransfer,
  executeWithdrawAndBurn,
  requestDisableRules,
  requestMintAndTransfer,
  requestWithdrawAndBurn,
} from "../src/intents.js";
import type { TreasuryCap } from "@covenant/types";
import { ACTIONS_ADDRESS, ACTIONS_VERSION } from "../src/version.js";
import {
  BOB,
  CAROL,
  CREATOR,
  ManualClock,
  USD,
  approveAndRun,
  codeOf,
  coin,
  newTreasury,
  params,
  treasuryCap,
} from "./helpers.js";

function auth(account: MultisigAccount) {
  return authenticate(account, CREATOR);
}

/** Hand the account a treasury cap and lock it. */
function lock(account: MultisigAccount, cap: TreasuryCap, maxSupply?: bigint): void {
  account.keep(cap);
  lockCap(auth(account), account, cap.id, maxSupply);
}

// =============================================================================
// Locking
// =============================================================================

describe("lockCap", () => {
  let account: MultisigAccount;

  beforeEach(() => {
    account = newTreasury();
  });

  it("stores the cap with open rules", () => {
    lock(account, treasuryCap(500n), 1000n);

    expect(hasCap(account, USD)).toBe(true);
    expect(coinRules(account, USD)).toEqual({
      cap: treasuryCap(500n),
      maxSupply: 1000n,
      totalMinted: 0n,
      totalBurned: 0n,
      canMint: true,
      canBurn: true,
    });
    expect(account.ownedObjects()).toEqual([]);
  });

  it("leaves the supply unbounded without a max", () => {
    lock(account, treasuryCap());
    expect(coinRules(account, USD).maxSupply).toBeNull();
  });

  it("holds one cap per coin type", () => {
    lock(account, treasuryCap());
    expect(codeOf(() => lock(account, treasuryCap()))).toBe("CAP_ALREADY_LOCKED");
    expect(account.ownedObjects()).toEqual([treasuryCap()]);
  });

  it("only locks a treasury cap the account owns", () => {
    expect(codeOf(() => lockCap(auth(account), account, "0xcab"))).toBe("OBJECT_NOT_FOUND");

    account.keep(coin("0xc01", 5n));
    expect(codeOf(() => lockCap(auth(account), account, "0xc01"))).toBe("NOT_TREASURY_CAP");
    expect(hasCap(account, USD)).toBe(false);
    expect(account.ownedObjects()).toEqual([coin("0xc01", 5n)]);
  });

  it("refuses a cap locked by a pending intent", () => {
    account.keep(treasuryCap());
    account.lockObject("0xcab", ACTIONS_VERSION);
    expect(codeOf(() => lockCap(auth(account), account, "0xcab"))).toBe("OBJECT_LOCKED");
  });

  it("fails on a coin type without a cap", () => {
    expect(hasCap(account, USD)).toBe(false);
    expect(codeOf(() => coinRules(account, USD))).toBe("CAP_NOT_LOCKED");
    expect(
      codeOf(() =>
        requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [1n], [BOB]),
      ),
    ).toBe("CAP_NOT_LOCKED");
  });
});

// =============================================================================
// Mint and transfer
// =============================================================================

describe("mint and transfer", () => {
  let account: MultisigAccount;

  beforeEach(() => {
    account = newTreasury();
    lock(account, treasuryCap(0n), 100n);
  });

  it("mints a coin for each recipient", () => {
    requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [40n, 60n], [BOB, CAROL]);
    expect(account.intents.get("mint").role).toBe(`${ACTIONS_ADDRESS}::currency_intents::${USD}`);

    approveAndRun(account, "mint", (executable) => executeMintAndTransfer(executable, account));

    expect(account.objects.listOwned(BOB)).toEqual([
      expect.objectContaining({ type: "coin", coinType: USD, value: 40n }),
    ]);
    expect(account.objects.listOwned(CAROL)).toEqual([
      expect.objectContaining({ type: "coin", coinType: USD, value: 60n }),
    ]);
    const rules = coinRules(account, USD);
    expect(rules.cap.totalSupply).toBe(100n);
    expect(rules.totalMinted).toBe(100n);
    expect(account.intents.has("mint")).toBe(false);
  });

  it("rolls back a batch that passes the max supply", () => {
    requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [60n, 50n], [BOB, CAROL]);

    expect(
      codeOf(() => approveAndRun(account, "mint", (executable) => executeMintAndTransfer(executable, account))),
    ).toBe("MAX_SUPPLY_REACHED");
    expect(coinRules(account, USD).cap.totalSupply).toBe(0n);
    expect(account.objects.listOwned(BOB)).toEqual([]);
  });

  it("rejects mismatched amounts and recipients", () => {
    expect(
      codeOf(() =>
        requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [1n, 2n], [BOB]),
      ),
    ).toBe("NOT_SAME_LENGTH");
  });

  it("drops the actions of an expired request", () => {
    const clock = new ManualClock(0);
    requestMintAndTransfer(auth(account), account, params("mint", clock, 3), emptyApprovals(), USD, [1n], [BOB]);
    clock.set(3);

    account.transaction(() => {
      deleteMintAndTransfer(account.deleteExpiredIntent("mint", clock));
    });
    expect(account.intents.size).toBe(0);
    expect(coinRules(account, USD).totalMinted).toBe(0n);
  });
});

// =============================================================================
// Withdraw and burn
// =============================================================================

describe("withdraw and burn", () => {
  let account: MultisigAccount;

  beforeEach(() => {
    account = newTreasury();
    lock(account, treasuryCap(100n));
  });

  it("burns a coin held by the account", () => {
    account.keep(coin("0xc01", 30n));
    requestWithdrawAndBurn(auth(account), account, params("burn"), emptyApprovals(), USD, "0xc01", 30n);
    expect(account.intents.isLocked("0xc01")).toBe(true);

    approveAndRun(account, "burn", (executable) => executeWithdrawAndBurn(executable, account));

    expect(account.ownedObjects()).toEqual([]);
    expect(account.intents.isLocked("0xc01")).toBe(false);
    const rules = coinRules(account, USD);
    expect(rules.cap.totalSupply).toBe(70n);
    expect(rules.totalBurned).toBe(30n);
  });

  it("refuses an object that is not a coin", () => {
    account.keep({ id: "0xa7", type: "badge" });
    requestWithdrawAndBurn(auth(account), account, params("burn"), emptyApprovals(), USD, "0xa7", 1n);

    expect(
      codeOf(() => approveAndRun(account, "burn", (executable) => executeWithdrawAndBurn(executable, account))),
    ).toBe("NOT_COIN");
    expect(account.ownedObjects()).toEqual([{ id: "0xa7", type: "badge" }]);
  });

  it("refuses a coin worth another amount", () => {
    account.keep(coin("0xc01", 30n));
    requestWithdrawAndBurn(auth(account), account, params("burn"), emptyApprovals(), USD, "0xc01", 25n);

    expect(
      codeOf(() => approveAndRun(account, "burn", (executable) => executeWithdrawAndBurn(executable, account))),
    ).toBe("WRONG_VALUE");
    expect(coinRules(account, USD).cap.totalSupply).toBe(100n);
  });

  it("unlocks the coin when the request expires", () => {
    const clock = new ManualClock(0);
    account.keep(coin("0xc01", 30n));
    requestWithdrawAndBurn(auth(account), account, params("burn", clock, 4), emptyApprovals(), USD, "0xc01", 30n);
    clock.set(9);

    account.transaction(() => {
      deleteWithdrawAndBurn(account.deleteExpiredIntent("burn", clock), account);
    });
    expect(account.intents.isLocked("0xc01")).toBe(false);
    expect(account.ownedObjects()).toEqual([coin("0xc01", 30n)]);
  });
});

// =============================================================================
// Disable rules
// =============================================================================

describe("disable rules", () => {
  let account: MultisigAccount;

  function disable(key: string, flags: { mint: boolean; burn: boolean }): void {
    requestDisableRules(auth(account), account, params(key), emptyApprovals(), USD, flags);
    approveAndRun(account, key, (executable) => executeDisableRules(executable, account));
  }

  beforeEach(() => {
    account = newTreasury();
    lock(account, treasuryCap(10n));
  });

  it("turns off minting for good", () => {
    disable("no-mint", { mint: true, burn: false });
    expect(coinRules(account, USD)).toMatchObject({ canMint: false, canBurn: true });

    disable("no-burn", { mint: false, burn: true });
    expect(coinRules(account, USD)).toMatchObject({ canMint: false, canBurn: false });
  });

  it("refuses new mint and burn requests once disabled", () => {
    disable("off", { mint: true, burn: true });

    expect(
      codeOf(() =>
        requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [1n], [BOB]),
      ),
    ).toBe("MINT_DISABLED");
    account.keep(coin("0xc01", 1n));
    expect(
      codeOf(() =>
        requestWithdrawAndBurn(auth(account), account, params("burn"), emptyApprovals(), USD, "0xc01", 1n),
      ),
    ).toBe("BURN_DISABLED");
    expect(account.intents.isLocked("0xc01")).toBe(false);
    expect(account.intents.size).toBe(0);
  });

  it("stops a pending mint proposed before the rules changed", () => {
    requestMintAndTransfer(auth(account), account, params("mint"), emptyApprovals(), USD, [5n], [BOB]);
    disable("off", { mint: true, burn: false });

    expect(
      codeOf(() => approveAndRun(account, "mint", (executable) => executeMintAndTransfer(executable, account))),
    ).toBe("MINT_DISABLED");
    expect(coinRules(account, USD).cap.totalSupply).toBe(10n);
  });
});
