/**
 * @covenant/actions — Action modules and composed intents for accounts.
 */

export { ActionError } from "./errors.js";
export type { ActionErrorCode } from "./errors.js";

export { ACTIONS_NAME, ACTIONS_ADDRESS, ACTIONS_VERSION_NUMBER } from "./version.js";

export { TransferAction, newTransfer, doTransfer, deleteTransfer } from "./transfer.js";
export type { Transfer } from "./transfer.js";

export {
  SpendAction,
  DepositAction,
  vaultKey,
  openVault,
  deposit,
  closeVault,
  hasVault,
  getVault,
  vaultBalance,
  newSpend,
  doSpend,
  deleteSpend,
  newDeposit,
  doDeposit,
  deleteDeposit,
} from "./vault.js";
export type { Vault, Spend, Deposit } from "./vault.js";

export {
  MintAction,
  BurnAction,
  DisableAction,
  capKey,
  lockCap,
  hasCap,
  coinRules,
  newMint,
  doMint,
  deleteMint,
  newBurn,
  doBurn,
  deleteBurn,
  newDisable,
  doDisable,
  deleteDisable,
} from "./currency.js";
export type { CurrencyRules, Mint, Burn, Disable } from "./currency.js";

export {
  ACTIONS_INTENT_TYPES,
  requestWithdrawAndTransfer,
  executeWithdrawAndTransfer,
  deleteWithdrawAndTransfer,
  requestSpendAndTransfer,
  executeSpendAndTransfer,
  deleteSpendAndTransfer,
  requestMintAndTransfer,
  executeMintAndTransfer,
  deleteMintAndTransfer,
  requestWithdrawAndBurn,
  executeWithdrawAndBurn,
  deleteWithdrawAndBurn,
  requestDisableRules,
  executeDisableRules,
  deleteDisableRules,
} from "./intents.js";
