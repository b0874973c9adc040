/**
 * Multisig types.
 *
 * Config is the account's policy state, an immutable value replaced on
 * change.
 */

import { z } from "zod";
import type { Address } from "@covenant/types";

export const MemberSchema = z.object({
  addr: z.string(),
  weight: z.number().int(),
  roles: z.array(z.string()),
});

export const RoleSchema = z.object({
  name: z.string(),
  threshold: z.number().int(),
});

export const MultisigConfigSchema = z.object({
  members: z.array(MemberSchema),
  global: z.number().int(),
  roles: z.array(RoleSchema),
});

export interface Member {
  readonly addr: Address;
  readonly weight: number;
  /** Roles this member's approval counts towards */
  readonly roles: readonly string[];
}

export interface Role {
  readonly name: string;
  readonly threshold: number;
}

export interface MultisigConfig {
  readonly members: readonly Member[];
  /** Total weight that approves any intent */
  readonly global: number;
  readonly roles: readonly Role[];
}

/**
 * Arguments for a config change, one entry per member and per role.
 */
export interface MultisigRulesInput {
  readonly addresses: readonly Address[];
  readonly weights: readonly number[];
  readonly roles: readonly (readonly string[])[];
  readonly global: number;
  readonly roleNames: readonly string[];
  readonly roleThresholds: readonly number[];
}
