/**
 * @covenant/multisig — Weighted-threshold approval policy for accounts.
 */

export { MultisigError } from "./errors.js";
export type { MultisigErrorCode } from "./errors.js";

export { MemberSchema, RoleSchema, MultisigConfigSchema } from "./types.js";
export type {
  Member,
  Role,
  MultisigConfig,
  MultisigRulesInput,
} from "./types.js";
export type { Approvals, ApprovalWeights } from "./approvals.js";

export {
  newConfig,
  verifyRules,
  isMember,
  getMember,
  memberWeight,
  totalWeight,
  getRole,
} from "./rules.js";

export {
  MULTISIG_NAME,
  MULTISIG_ADDRESS,
  MULTISIG_VERSION_NUMBER,
  multisigPolicy,
  emptyApprovals,
  newAccount,
  authenticate,
  approveIntent,
  disapproveIntent,
  executeIntent,
} from "./multisig.js";
export type { MultisigAccount, NewMultisigOptions } from "./multisig.js";

export {
  ConfigMultisigAction,
  CONFIG_MULTISIG_INTENT_TYPE,
  requestConfigMultisig,
  executeConfigMultisig,
  deleteConfigMultisig,
} from "./config-intent.js";

export { sendInvite, join, leave } from "./members.js";
